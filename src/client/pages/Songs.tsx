/**
 * Songs page — browse and search the public catalogue.
 *
 * Results are fetched a page at a time (PAGE_SIZE). A search replaces the
 * listing and starts again from the first page. "Next" is enabled only when
 * the last page came back full.
 */
import { useEffect, useMemo, useState, type FormEvent } from "react";
import { useApi } from "../lib/api-context";
import { describeError } from "../lib/api";
import Spinner from "../components/Spinner";
import type { Genre, Page, Song } from "../../shared/types";

export const PAGE_SIZE = 20;

/** Seconds as m:ss, e.g. 245 → "4:05". */
export function formatDuration(totalSeconds: number): string {
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}:${String(seconds).padStart(2, "0")}`;
}

function songsPath(search: string, skip: number): string {
  const params = new URLSearchParams({ skip: String(skip), limit: String(PAGE_SIZE) });
  if (search) {
    params.set("query", search);
    return `/song/search?${params}`;
  }
  return `/song?${params}`;
}

export default function Songs() {
  const api = useApi();
  const [input, setInput] = useState("");
  const [search, setSearch] = useState("");
  const [skip, setSkip] = useState(0);
  const [songs, setSongs] = useState<Song[]>([]);
  const [genres, setGenres] = useState<Genre[]>([]);
  const [genresError, setGenresError] = useState<string | null>(null);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let cancelled = false;
    setLoading(true);
    setError(null);

    api
      .get<Page<Song>>(songsPath(search, skip))
      .then((page) => {
        if (!cancelled) setSongs(page.items);
      })
      .catch((err: unknown) => {
        if (!cancelled) setError(describeError(err));
      })
      .finally(() => {
        if (!cancelled) setLoading(false);
      });

    return () => {
      cancelled = true;
    };
  }, [api, search, skip]);

  // Genre names are decoration; the list still renders without them.
  useEffect(() => {
    let cancelled = false;
    api
      .get<Genre[]>("/genre")
      .then((rows) => {
        if (!cancelled) setGenres(rows);
      })
      .catch((err: unknown) => {
        if (!cancelled) setGenresError(describeError(err));
      });
    return () => {
      cancelled = true;
    };
  }, [api]);

  const genreNames = useMemo(() => new Map(genres.map((g) => [g.id, g.name])), [genres]);

  const handleSearch = (e: FormEvent) => {
    e.preventDefault();
    setSearch(input.trim());
    setSkip(0);
  };

  const clearSearch = () => {
    setInput("");
    setSearch("");
    setSkip(0);
  };

  return (
    <div className="mx-auto max-w-4xl">
      <h1 className="text-2xl font-bold">Songs</h1>

      <form onSubmit={handleSearch} className="mt-6 flex gap-2" role="search">
        <input
          type="search"
          aria-label="Search songs"
          placeholder="Search by title"
          value={input}
          onChange={(e) => setInput(e.target.value)}
          className="flex-1 rounded-md border border-cadence-border bg-cadence-surface px-3 py-2 text-white"
        />
        <button
          type="submit"
          className="rounded-md bg-cadence-teal-500 px-4 py-2 text-sm font-medium text-white hover:bg-cadence-teal-400"
        >
          Search
        </button>
        {search && (
          <button
            type="button"
            onClick={clearSearch}
            className="rounded-md px-4 py-2 text-sm text-cadence-slate-400 hover:text-white"
          >
            Clear
          </button>
        )}
      </form>

      {genresError && (
        <p className="mt-2 text-xs text-cadence-slate-500">
          Genre names are unavailable: {genresError}
        </p>
      )}

      {error ? (
        <p role="alert" className="mt-6 text-sm text-red-400">
          {error}
        </p>
      ) : loading ? (
        <Spinner />
      ) : songs.length === 0 ? (
        <p className="mt-6 text-cadence-slate-400">
          {search ? `No songs match "${search}".` : "No songs yet."}
        </p>
      ) : (
        <table className="mt-6 w-full text-left text-sm">
          <thead className="text-cadence-slate-400">
            <tr>
              <th className="py-2 font-medium">Title</th>
              <th className="py-2 font-medium">Genre</th>
              <th className="py-2 font-medium">Released</th>
              <th className="py-2 text-right font-medium">Length</th>
            </tr>
          </thead>
          <tbody className="divide-y divide-cadence-border">
            {songs.map((song) => (
              <tr key={song.id}>
                <td className="py-2">{song.title}</td>
                <td className="py-2 text-cadence-slate-400">{genreNames.get(song.genreId) ?? "—"}</td>
                <td className="py-2 text-cadence-slate-400">{song.releaseDate.slice(0, 10)}</td>
                <td className="py-2 text-right tabular-nums">{formatDuration(song.durationSeconds)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}

      <div className="mt-6 flex items-center justify-between">
        <button
          type="button"
          onClick={() => setSkip((s) => Math.max(0, s - PAGE_SIZE))}
          disabled={loading || skip === 0}
          className="rounded-md border border-cadence-border px-4 py-2 text-sm disabled:opacity-40"
        >
          Previous
        </button>
        <span className="text-sm text-cadence-slate-400">Page {skip / PAGE_SIZE + 1}</span>
        <button
          type="button"
          onClick={() => setSkip((s) => s + PAGE_SIZE)}
          disabled={loading || songs.length < PAGE_SIZE}
          className="rounded-md border border-cadence-border px-4 py-2 text-sm disabled:opacity-40"
        >
          Next
        </button>
      </div>
    </div>
  );
}
