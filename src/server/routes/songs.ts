/**
 * Song catalogue (public)
 *
 *   GET /song            - Newest songs first, offset/limit paginated
 *   GET /song/search     - Case-insensitive title search
 *   GET /song/:id        - One song, 404 when missing or disabled
 */
import { Hono } from "hono";
import { NotFoundError, ValidationError } from "../lib/errors";
import { parseQuery } from "../lib/validation";
import type { SongRow } from "../db/schema";
import type { Services } from "../types";
import {
  idParamSchema,
  paginationSchema,
  songSearchSchema,
} from "../../shared/validators/catalogue";
import type { Page, Song } from "../../shared/types";

export function toSong(row: SongRow): Song {
  return {
    id: row.id,
    title: row.title,
    genreId: row.genreId,
    artistId: row.artistId,
    releaseDate: row.releaseDate.toISOString(),
    durationSeconds: row.durationSeconds,
    coverImage: row.coverImage,
    createdAt: row.createdAt.toISOString(),
  };
}

export function parseId(raw: string): number {
  const parsed = idParamSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError({ id: ["Must be a positive integer"] });
  }
  return parsed.data;
}

export function createSongRoutes({ catalogue }: Services) {
  return new Hono()
    .get("/", async (c) => {
      const page = parseQuery(c, paginationSchema);
      const rows = await catalogue.listSongs(page);
      return c.json<Page<Song>>({ items: rows.map(toSong), ...page });
    })

    // Registered before "/:id" so "search" is not read as an id
    .get("/search", async (c) => {
      const { query, ...page } = parseQuery(c, songSearchSchema);
      const rows = await catalogue.searchSongs(query, page);
      return c.json<Page<Song>>({ items: rows.map(toSong), ...page });
    })

    .get("/:id", async (c) => {
      const song = await catalogue.findSong(parseId(c.req.param("id")));
      if (!song) throw new NotFoundError("Song");
      return c.json<Song>(toSong(song));
    });
}
