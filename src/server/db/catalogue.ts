/**
 * Song and genre queries. Listing and search are plain offset/limit queries;
 * disabled songs and inactive genres are hidden from every public read.
 */

import { and, asc, desc, eq, ilike } from "drizzle-orm";
import type { Database } from "./index";
import { genres, songs, type GenreRow, type SongRow } from "./schema";

export interface PageRequest {
  skip: number;
  limit: number;
}

export interface CatalogueRepository {
  listSongs(page: PageRequest): Promise<SongRow[]>;
  searchSongs(query: string, page: PageRequest): Promise<SongRow[]>;
  findSong(id: number): Promise<SongRow | null>;
  listGenres(): Promise<GenreRow[]>;
  findGenre(id: number, options?: { includeInactive?: boolean }): Promise<GenreRow | null>;
  findGenreByName(name: string): Promise<GenreRow | null>;
  createGenre(input: { name: string; description: string | null }): Promise<GenreRow>;
  setGenreActive(id: number, active: boolean, at: Date): Promise<GenreRow | null>;
}

/** Escape LIKE wildcards so user input matches literally. */
export function escapeLikePattern(input: string): string {
  return input.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export class DrizzleCatalogueRepository implements CatalogueRepository {
  constructor(private readonly db: Database) {}

  async listSongs(page: PageRequest): Promise<SongRow[]> {
    return await this.db
      .select()
      .from(songs)
      .where(eq(songs.isDisabled, false))
      .orderBy(desc(songs.createdAt), desc(songs.id))
      .limit(page.limit)
      .offset(page.skip);
  }

  async searchSongs(query: string, page: PageRequest): Promise<SongRow[]> {
    return await this.db
      .select()
      .from(songs)
      .where(
        and(
          eq(songs.isDisabled, false),
          ilike(songs.title, `%${escapeLikePattern(query)}%`),
        ),
      )
      .orderBy(asc(songs.title), asc(songs.id))
      .limit(page.limit)
      .offset(page.skip);
  }

  async findSong(id: number): Promise<SongRow | null> {
    const song = await this.db.query.songs.findFirst({
      where: and(eq(songs.id, id), eq(songs.isDisabled, false)),
    });
    return song ?? null;
  }

  async listGenres(): Promise<GenreRow[]> {
    return await this.db
      .select()
      .from(genres)
      .where(eq(genres.isActive, true))
      .orderBy(asc(genres.name));
  }

  async findGenre(
    id: number,
    options: { includeInactive?: boolean } = {},
  ): Promise<GenreRow | null> {
    const genre = await this.db.query.genres.findFirst({
      where: options.includeInactive
        ? eq(genres.id, id)
        : and(eq(genres.id, id), eq(genres.isActive, true)),
    });
    return genre ?? null;
  }

  async findGenreByName(name: string): Promise<GenreRow | null> {
    const genre = await this.db.query.genres.findFirst({
      where: eq(genres.name, name),
    });
    return genre ?? null;
  }

  async createGenre(input: { name: string; description: string | null }): Promise<GenreRow> {
    const [genre] = await this.db.insert(genres).values(input).returning();
    return genre;
  }

  async setGenreActive(id: number, active: boolean, at: Date): Promise<GenreRow | null> {
    const [genre] = await this.db
      .update(genres)
      .set({ isActive: active, disabledAt: active ? null : at })
      .where(eq(genres.id, id))
      .returning();
    return genre ?? null;
  }
}
