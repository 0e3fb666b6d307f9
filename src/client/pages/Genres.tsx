/**
 * Genres page — lists active genres. Admins can also create a genre and
 * disable one (after confirmation); a disabled genre leaves the list.
 */
import { useEffect, useState, type FormEvent } from "react";
import { useAuth } from "../lib/auth";
import { useApi } from "../lib/api-context";
import { describeError } from "../lib/api";
import { useMounted } from "../lib/useMounted";
import { useToast } from "../components/Toast";
import ConfirmDialog from "../components/ConfirmDialog";
import Spinner from "../components/Spinner";
import type { Genre } from "../../shared/types";

export default function Genres() {
  const api = useApi();
  const { user } = useAuth();
  const isAdmin = user?.role === "admin";
  const [genres, setGenres] = useState<Genre[] | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let cancelled = false;
    api
      .get<Genre[]>("/genre")
      .then((rows) => {
        if (!cancelled) setGenres(rows);
      })
      .catch((err: unknown) => {
        if (!cancelled) setError(describeError(err));
      });
    return () => {
      cancelled = true;
    };
  }, [api]);

  const added = (genre: Genre) =>
    setGenres((prev) =>
      [...(prev ?? []), genre].sort((a, b) => a.name.localeCompare(b.name)),
    );

  const removed = (id: number) => setGenres((prev) => prev?.filter((g) => g.id !== id) ?? null);

  return (
    <div className="mx-auto max-w-3xl">
      <h1 className="text-2xl font-bold">Genres</h1>

      {isAdmin && <CreateGenreForm onCreated={added} />}

      {error ? (
        <p role="alert" className="mt-6 text-sm text-red-400">
          {error}
        </p>
      ) : genres === null ? (
        <Spinner />
      ) : genres.length === 0 ? (
        <p className="mt-6 text-cadence-slate-400">No genres yet.</p>
      ) : (
        <ul className="mt-6 divide-y divide-cadence-border rounded-lg border border-cadence-border bg-cadence-surface">
          {genres.map((genre) => (
            <GenreItem key={genre.id} genre={genre} canDisable={isAdmin} onDisabled={removed} />
          ))}
        </ul>
      )}
    </div>
  );
}

// ---------------------------------------------------------------------------
// Sub-components
// ---------------------------------------------------------------------------

function CreateGenreForm({ onCreated }: { onCreated: (genre: Genre) => void }) {
  const api = useApi();
  const toast = useToast();
  const mounted = useMounted();
  const [name, setName] = useState("");
  const [description, setDescription] = useState("");
  const [saving, setSaving] = useState(false);

  const handleSubmit = async (e: FormEvent) => {
    e.preventDefault();
    setSaving(true);
    try {
      const genre = await api.post<Genre>("/genre", {
        name: name.trim(),
        description: description.trim() || undefined,
      });
      toast.success(`Genre "${genre.name}" created`);
      if (!mounted.current) return;
      onCreated(genre);
      setName("");
      setDescription("");
    } catch (err) {
      toast.error(describeError(err));
    } finally {
      if (mounted.current) setSaving(false);
    }
  };

  return (
    <form
      onSubmit={handleSubmit}
      aria-label="New genre"
      className="mt-6 flex flex-col gap-2 rounded-lg border border-cadence-border bg-cadence-surface p-4 sm:flex-row"
    >
      <input
        aria-label="Genre name"
        placeholder="Name"
        value={name}
        onChange={(e) => setName(e.target.value)}
        className="flex-1 rounded-md border border-cadence-border bg-transparent px-3 py-2 text-white"
      />
      <input
        aria-label="Description"
        placeholder="Description (optional)"
        value={description}
        onChange={(e) => setDescription(e.target.value)}
        className="flex-[2] rounded-md border border-cadence-border bg-transparent px-3 py-2 text-white"
      />
      <button
        type="submit"
        disabled={saving || !name.trim()}
        className="rounded-md bg-cadence-teal-500 px-4 py-2 text-sm font-medium text-white hover:bg-cadence-teal-400 disabled:opacity-50"
      >
        {saving ? "Adding..." : "Add genre"}
      </button>
    </form>
  );
}

function GenreItem({
  genre,
  canDisable,
  onDisabled,
}: {
  genre: Genre;
  canDisable: boolean;
  onDisabled: (id: number) => void;
}) {
  const api = useApi();
  const toast = useToast();
  const mounted = useMounted();
  const [confirming, setConfirming] = useState(false);
  const [disabling, setDisabling] = useState(false);

  const disable = async () => {
    setDisabling(true);
    try {
      await api.post<Genre>(`/genre/${genre.id}/disable`);
      toast.success(`Genre "${genre.name}" disabled`);
      if (mounted.current) onDisabled(genre.id);
    } catch (err) {
      toast.error(describeError(err));
      if (mounted.current) {
        setDisabling(false);
        setConfirming(false);
      }
    }
  };

  return (
    <li className="flex items-center justify-between px-4 py-3">
      <div>
        <p className="font-medium">{genre.name}</p>
        {genre.description && (
          <p className="text-sm text-cadence-slate-400">{genre.description}</p>
        )}
      </div>
      {canDisable && (
        <button
          type="button"
          onClick={() => setConfirming(true)}
          className="text-sm text-red-400 hover:text-red-300"
        >
          Disable
        </button>
      )}
      <ConfirmDialog
        open={confirming}
        title={`Disable ${genre.name}?`}
        description="Songs in this genre stay in the catalogue. The genre can be enabled again later."
        confirmLabel="Disable"
        loading={disabling}
        onConfirm={disable}
        onCancel={() => setConfirming(false)}
      />
    </li>
  );
}
