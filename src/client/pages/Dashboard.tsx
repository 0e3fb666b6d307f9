/**
 * Dashboard page — the first screen users see after login.
 *
 * Content branches on the user's role:
 *   - listener: the newest songs and a link to the full catalogue.
 *   - artist:   quick links for managing their presence in the catalogue.
 *   - admin:    catalogue links plus session maintenance.
 */
import { useEffect, useState } from "react";
import { Link } from "react-router-dom";
import { useAuth } from "../lib/auth";
import { useApi } from "../lib/api-context";
import { describeError } from "../lib/api";
import { useMounted } from "../lib/useMounted";
import { useToast } from "../components/Toast";
import Spinner from "../components/Spinner";
import type { Page, ProfileSnapshot, Role, Song } from "../../shared/types";

export const LATEST_SONGS_LIMIT = 5;

export default function Dashboard() {
  const { user } = useAuth();
  if (!user) return null;

  return (
    <div className="mx-auto max-w-4xl">
      <h1 className="text-2xl font-bold">Welcome back, {user.username}</h1>
      <p className="mt-1 text-cadence-slate-400">{ROLE_TAGLINES[user.role]}</p>
      <RoleView user={user} />
    </div>
  );
}

const ROLE_TAGLINES: Record<Role, string> = {
  listener: "Discover something new today",
  artist: "Your music, your audience",
  admin: "Catalogue administration",
};

function RoleView({ user }: { user: ProfileSnapshot }) {
  switch (user.role) {
    case "listener":
      return <ListenerView />;
    case "artist":
      return <ArtistView />;
    case "admin":
      return <AdminView />;
    default: {
      const unreachable: never = user.role;
      return unreachable;
    }
  }
}

// ---------------------------------------------------------------------------
// Role views
// ---------------------------------------------------------------------------

function ListenerView() {
  const api = useApi();
  const [songs, setSongs] = useState<Song[] | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let cancelled = false;
    api
      .get<Page<Song>>(`/song?limit=${LATEST_SONGS_LIMIT}`)
      .then((page) => {
        if (!cancelled) setSongs(page.items);
      })
      .catch((err: unknown) => {
        if (!cancelled) setError(describeError(err));
      });
    return () => {
      cancelled = true;
    };
  }, [api]);

  return (
    <section className="mt-8">
      <div className="flex items-center justify-between">
        <h2 className="text-lg font-semibold text-cadence-teal-300">New releases</h2>
        <Link to="/songs" className="text-sm text-cadence-teal-300 hover:underline">
          Browse all songs
        </Link>
      </div>

      {error ? (
        <p role="alert" className="mt-4 text-sm text-red-400">
          {error}
        </p>
      ) : songs === null ? (
        <div className="mt-6 flex justify-center">
          <Spinner />
        </div>
      ) : songs.length === 0 ? (
        <p className="mt-4 text-cadence-slate-400">No songs yet.</p>
      ) : (
        <ul className="mt-4 divide-y divide-cadence-border rounded-lg border border-cadence-border bg-cadence-surface">
          {songs.map((song) => (
            <li key={song.id} className="px-4 py-3">
              {song.title}
            </li>
          ))}
        </ul>
      )}
    </section>
  );
}

function ArtistView() {
  return (
    <div className="mt-8 grid gap-4 sm:grid-cols-2">
      <QuickLink to="/songs" title="Catalogue" desc="See where your songs sit among the latest releases" />
      <QuickLink to="/genres" title="Genres" desc="Find the genres your music belongs to" />
    </div>
  );
}

function AdminView() {
  const api = useApi();
  const toast = useToast();
  const mounted = useMounted();
  const [running, setRunning] = useState(false);

  const cleanup = async () => {
    setRunning(true);
    try {
      const res = await api.post<{ message: string; tokens_removed: number }>(
        "/auth/cleanup-expired",
      );
      toast.success(res.message);
    } catch (err) {
      toast.error(describeError(err));
    } finally {
      if (mounted.current) setRunning(false);
    }
  };

  return (
    <>
      <div className="mt-8 grid gap-4 sm:grid-cols-2">
        <QuickLink to="/genres" title="Manage genres" desc="Create and disable genres" />
        <QuickLink to="/songs" title="Catalogue" desc="Browse every active song" />
      </div>

      <section className="mt-8 rounded-lg border border-cadence-border bg-cadence-surface p-6">
        <h2 className="text-lg font-semibold text-cadence-teal-300">Sessions</h2>
        <p className="mt-1 text-sm text-cadence-slate-400">
          Expired refresh tokens stay in the database until removed.
        </p>
        <button
          type="button"
          onClick={cleanup}
          disabled={running}
          className="mt-4 rounded-lg bg-cadence-teal-500 px-4 py-2 text-sm font-medium text-white transition-colors hover:bg-cadence-teal-400 disabled:opacity-50"
        >
          {running ? "Removing..." : "Remove expired sessions"}
        </button>
      </section>
    </>
  );
}

// ---------------------------------------------------------------------------
// Sub-components
// ---------------------------------------------------------------------------

function QuickLink({ to, title, desc }: { to: string; title: string; desc: string }) {
  return (
    <Link
      to={to}
      className="rounded-lg border border-cadence-border bg-cadence-surface p-5 transition-colors hover:border-cadence-teal-500/50"
    >
      <h3 className="font-semibold text-cadence-teal-300">{title}</h3>
      <p className="mt-1 text-sm text-cadence-slate-400">{desc}</p>
    </Link>
  );
}
