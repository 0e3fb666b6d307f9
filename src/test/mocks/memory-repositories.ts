/**
 * In-memory implementations of the repository interfaces.
 *
 * They mirror the Postgres semantics the services rely on: unique usernames,
 * emails and stage names, soft-deleted users hidden from lookups, and a
 * `consume()` that checks and sets in one synchronous step, so two
 * concurrent refreshes see exactly one winner.
 */
import type { CatalogueRepository, PageRequest } from "../../server/db/catalogue";
import type {
  NewRefreshToken,
  RefreshTokenRepository,
} from "../../server/db/refresh-tokens";
import type {
  ConflictCandidate,
  ConflictField,
  NewArtistRow,
  NewUserRow,
  ProfileChanges,
  UserRepository,
} from "../../server/db/users";
import type {
  ArtistRow,
  GenreRow,
  RefreshTokenRow,
  SongRow,
  UserRow,
} from "../../server/db/schema";

// ---------------------------------------------------------------------------
// Users
// ---------------------------------------------------------------------------

export class MemoryUserRepository implements UserRepository {
  readonly users = new Map<string, UserRow>();
  readonly artists = new Map<string, ArtistRow>();

  async findByUsername(username: string): Promise<UserRow | null> {
    for (const user of this.users.values()) {
      if (user.username === username && !user.deletedAt) return user;
    }
    return null;
  }

  async findById(id: string): Promise<UserRow | null> {
    const user = this.users.get(id);
    return user && !user.deletedAt ? user : null;
  }

  async findConflict(candidate: ConflictCandidate): Promise<ConflictField | null> {
    return this.conflictFor(candidate);
  }

  async insertUser(row: NewUserRow): Promise<UserRow> {
    return this.store(row);
  }

  async insertUserWithArtist(
    user: NewUserRow,
    artist: NewArtistRow,
  ): Promise<{ user: UserRow; artist: ArtistRow }> {
    const conflict = this.conflictFor({ ...user, stageName: artist.stageName });
    if (conflict) throw uniqueViolation(conflict);

    const storedUser = this.store(user);
    const storedArtist: ArtistRow = {
      ...artist,
      isDisabled: false,
      createdAt: new Date(),
    };
    this.artists.set(storedArtist.id, storedArtist);
    return { user: storedUser, artist: storedArtist };
  }

  async touchLastLogin(id: string, at: Date): Promise<void> {
    const user = this.users.get(id);
    if (user) {
      this.users.set(id, { ...user, lastLoginAt: at, updatedAt: at });
    }
  }

  async updateProfile(
    id: string,
    changes: ProfileChanges,
    at: Date,
  ): Promise<UserRow | null> {
    const user = await this.findById(id);
    if (!user) return null;
    const next = { ...user, ...changes };
    const conflict = this.conflictFor({ ...next, excludeUserId: id });
    if (conflict) throw uniqueViolation(conflict);

    const updated: UserRow = { ...next, updatedAt: at };
    this.users.set(id, updated);
    return updated;
  }

  async updatePasswordHash(id: string, passwordHash: string, at: Date): Promise<void> {
    const user = await this.findById(id);
    if (user) {
      this.users.set(id, { ...user, passwordHash, updatedAt: at });
    }
  }

  async softDelete(id: string, at: Date): Promise<boolean> {
    const user = await this.findById(id);
    if (!user) return false;
    this.users.set(id, { ...user, deletedAt: at, isActive: false, updatedAt: at });
    return true;
  }

  /** Test helper: insert a fully-formed row, bypassing conflict checks. */
  seed(row: UserRow): UserRow {
    this.users.set(row.id, row);
    return row;
  }

  private store(row: NewUserRow): UserRow {
    const conflict = this.conflictFor(row);
    if (conflict) throw uniqueViolation(conflict);

    const now = new Date();
    const user: UserRow = {
      ...row,
      isActive: true,
      isVerified: false,
      lastLoginAt: null,
      createdAt: now,
      updatedAt: now,
      deletedAt: null,
    };
    this.users.set(user.id, user);
    return user;
  }

  private conflictFor(candidate: ConflictCandidate): ConflictField | null {
    for (const user of this.users.values()) {
      if (user.id === candidate.excludeUserId) continue;
      if (user.username === candidate.username) return "username";
      if (user.email === candidate.email) return "email";
    }
    if (candidate.stageName !== undefined) {
      for (const artist of this.artists.values()) {
        if (artist.stageName === candidate.stageName) return "stage_name";
      }
    }
    return null;
  }
}

/** Shaped like the error the Postgres driver raises for SQLSTATE 23505. */
function uniqueViolation(field: ConflictField): Error {
  return Object.assign(new Error("duplicate key value violates unique constraint"), {
    code: "23505",
    constraint: `${field === "stage_name" ? "artists" : "users"}_${field}_unique`,
  });
}

// ---------------------------------------------------------------------------
// Refresh tokens
// ---------------------------------------------------------------------------

export class MemoryRefreshTokenRepository implements RefreshTokenRepository {
  readonly rows = new Map<string, RefreshTokenRow>();

  async insert(record: NewRefreshToken): Promise<void> {
    this.rows.set(record.jti, {
      ...record,
      rotatedAt: null,
      revokedAt: null,
      createdAt: new Date(),
    });
  }

  async consume(jti: string, at: Date): Promise<RefreshTokenRow | null> {
    const row = this.rows.get(jti);
    if (
      !row ||
      row.rotatedAt ||
      row.revokedAt ||
      row.expiresAt <= at ||
      this.sessionRevoked(row.sessionId)
    ) {
      return null;
    }
    this.rows.set(jti, { ...row, rotatedAt: at });
    return row;
  }

  async find(jti: string): Promise<RefreshTokenRow | null> {
    return this.rows.get(jti) ?? null;
  }

  async isSessionRevoked(sessionId: string): Promise<boolean> {
    return this.sessionRevoked(sessionId);
  }

  async revokeSession(sessionId: string, at: Date): Promise<number> {
    let count = 0;
    for (const row of this.rows.values()) {
      if (row.sessionId === sessionId && !row.revokedAt) {
        this.rows.set(row.jti, { ...row, revokedAt: at });
        count++;
      }
    }
    return count;
  }

  async revokeAllForUser(userId: string, at: Date): Promise<number> {
    const liveSessions = new Set<string>();
    for (const row of this.rows.values()) {
      if (row.userId !== userId || row.revokedAt) continue;
      if (row.expiresAt > at) liveSessions.add(row.sessionId);
      this.rows.set(row.jti, { ...row, revokedAt: at });
    }
    return liveSessions.size;
  }

  async deleteExpired(before: Date): Promise<number> {
    let count = 0;
    for (const row of [...this.rows.values()]) {
      if (row.expiresAt < before) {
        this.rows.delete(row.jti);
        count++;
      }
    }
    return count;
  }

  private sessionRevoked(sessionId: string): boolean {
    for (const row of this.rows.values()) {
      if (row.sessionId === sessionId && row.revokedAt) return true;
    }
    return false;
  }
}

// ---------------------------------------------------------------------------
// Catalogue
// ---------------------------------------------------------------------------

export class MemoryCatalogueRepository implements CatalogueRepository {
  readonly songs: SongRow[] = [];
  readonly genres: GenreRow[] = [];
  private nextGenreId = 1;

  async listSongs(page: PageRequest): Promise<SongRow[]> {
    return this.songs
      .filter((s) => !s.isDisabled)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
      .slice(page.skip, page.skip + page.limit);
  }

  async searchSongs(query: string, page: PageRequest): Promise<SongRow[]> {
    const needle = query.toLowerCase();
    return this.songs
      .filter((s) => !s.isDisabled && s.title.toLowerCase().includes(needle))
      .sort((a, b) => a.title.localeCompare(b.title) || a.id - b.id)
      .slice(page.skip, page.skip + page.limit);
  }

  async findSong(id: number): Promise<SongRow | null> {
    return this.songs.find((s) => s.id === id && !s.isDisabled) ?? null;
  }

  async listGenres(): Promise<GenreRow[]> {
    return this.genres
      .filter((g) => g.isActive)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async findGenre(
    id: number,
    options: { includeInactive?: boolean } = {},
  ): Promise<GenreRow | null> {
    return (
      this.genres.find((g) => g.id === id && (options.includeInactive || g.isActive)) ??
      null
    );
  }

  async findGenreByName(name: string): Promise<GenreRow | null> {
    return this.genres.find((g) => g.name === name) ?? null;
  }

  async createGenre(input: { name: string; description: string | null }): Promise<GenreRow> {
    const genre: GenreRow = {
      id: this.nextGenreId++,
      name: input.name,
      description: input.description,
      isActive: true,
      createdAt: new Date(),
      disabledAt: null,
    };
    this.genres.push(genre);
    return genre;
  }

  async setGenreActive(id: number, active: boolean, at: Date): Promise<GenreRow | null> {
    const index = this.genres.findIndex((g) => g.id === id);
    if (index === -1) return null;
    const updated: GenreRow = {
      ...this.genres[index],
      isActive: active,
      disabledAt: active ? null : at,
    };
    this.genres[index] = updated;
    return updated;
  }

  /** Test helper: add genres keeping ids in step with `createGenre`. */
  seedGenre(genre: Omit<GenreRow, "id">): GenreRow {
    const row: GenreRow = { ...genre, id: this.nextGenreId++ };
    this.genres.push(row);
    return row;
  }
}
