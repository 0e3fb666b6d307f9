/**
 * User and artist persistence over Drizzle.
 *
 * `UserRepository` is the seam the credential store depends on; tests swap
 * in an in-memory implementation (see `src/test/mocks/memory-repositories.ts`).
 */

import { and, eq, isNull, ne, or } from "drizzle-orm";
import type { Database } from "./index";
import { artists, users, type ArtistRow, type UserRow } from "./schema";
import type { Role } from "../../shared/types";

export interface NewUserRow {
  id: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  passwordHash: string;
  role: Role;
}

export interface NewArtistRow {
  id: string;
  userId: string;
  stageName: string;
  bio: string | null;
}

/** Which unique field of a prospective account is already taken, if any. */
export type ConflictField = "username" | "email" | "stage_name";

export interface ConflictCandidate {
  username: string;
  email: string;
  stageName?: string;
  /** The account being edited; its own values never conflict. */
  excludeUserId?: string;
}

/** Profile fields a user may change on their own account. */
export interface ProfileChanges {
  username?: string;
  email?: string;
  firstName?: string;
  lastName?: string;
}

export interface UserRepository {
  findByUsername(username: string): Promise<UserRow | null>;
  findById(id: string): Promise<UserRow | null>;
  findConflict(candidate: ConflictCandidate): Promise<ConflictField | null>;
  insertUser(row: NewUserRow): Promise<UserRow>;
  /** Inserts both rows in one transaction. */
  insertUserWithArtist(
    user: NewUserRow,
    artist: NewArtistRow,
  ): Promise<{ user: UserRow; artist: ArtistRow }>;
  touchLastLogin(id: string, at: Date): Promise<void>;
  /** Null when the user does not exist or is soft-deleted. */
  updateProfile(id: string, changes: ProfileChanges, at: Date): Promise<UserRow | null>;
  updatePasswordHash(id: string, passwordHash: string, at: Date): Promise<void>;
  /** Stamp `deletedAt` and deactivate. False if already gone. */
  softDelete(id: string, at: Date): Promise<boolean>;
}

/**
 * Map a Postgres unique violation (SQLSTATE 23505) to the field it guards.
 * Drizzle may wrap the driver error, so the cause chain is walked too.
 */
export function uniqueViolationField(err: unknown): ConflictField | null {
  let current: unknown = err;
  for (let depth = 0; depth < 3 && current instanceof Error; depth++) {
    const code = "code" in current ? current.code : undefined;
    if (code === "23505") {
      const constraint =
        "constraint" in current && typeof current.constraint === "string"
          ? current.constraint
          : "";
      if (constraint.includes("stage_name")) return "stage_name";
      if (constraint.includes("email")) return "email";
      return "username";
    }
    current = current.cause;
  }
  return null;
}

export class DrizzleUserRepository implements UserRepository {
  constructor(private readonly db: Database) {}

  async findByUsername(username: string): Promise<UserRow | null> {
    const user = await this.db.query.users.findFirst({
      where: and(eq(users.username, username), isNull(users.deletedAt)),
    });
    return user ?? null;
  }

  async findById(id: string): Promise<UserRow | null> {
    const user = await this.db.query.users.findFirst({
      where: and(eq(users.id, id), isNull(users.deletedAt)),
    });
    return user ?? null;
  }

  async findConflict(candidate: ConflictCandidate): Promise<ConflictField | null> {
    // Soft-deleted rows still hold their unique values, so they count here
    const sameName = or(
      eq(users.username, candidate.username),
      eq(users.email, candidate.email),
    );
    const [existing] = await this.db
      .select({ username: users.username, email: users.email })
      .from(users)
      .where(
        candidate.excludeUserId === undefined
          ? sameName
          : and(sameName, ne(users.id, candidate.excludeUserId)),
      )
      .limit(1);

    if (existing) {
      return existing.username === candidate.username ? "username" : "email";
    }

    if (candidate.stageName !== undefined) {
      const [artist] = await this.db
        .select({ id: artists.id })
        .from(artists)
        .where(eq(artists.stageName, candidate.stageName))
        .limit(1);
      if (artist) return "stage_name";
    }

    return null;
  }

  async insertUser(row: NewUserRow): Promise<UserRow> {
    const [user] = await this.db.insert(users).values(row).returning();
    return user;
  }

  async insertUserWithArtist(
    user: NewUserRow,
    artist: NewArtistRow,
  ): Promise<{ user: UserRow; artist: ArtistRow }> {
    // neon-http has no interactive transactions; batch() runs the statements
    // in a single implicit one
    const [[insertedUser], [insertedArtist]] = await this.db.batch([
      this.db.insert(users).values(user).returning(),
      this.db.insert(artists).values(artist).returning(),
    ]);
    return { user: insertedUser, artist: insertedArtist };
  }

  async touchLastLogin(id: string, at: Date): Promise<void> {
    await this.db
      .update(users)
      .set({ lastLoginAt: at, updatedAt: at })
      .where(eq(users.id, id));
  }
  async updateProfile(
    id: string,
    changes: ProfileChanges,
    at: Date,
  ): Promise<UserRow | null> {
    const [user] = await this.db
      .update(users)
      .set({ ...changes, updatedAt: at })
      .where(and(eq(users.id, id), isNull(users.deletedAt)))
      .returning();
    return user ?? null;
  }

  async updatePasswordHash(id: string, passwordHash: string, at: Date): Promise<void> {
    await this.db
      .update(users)
      .set({ passwordHash, updatedAt: at })
      .where(and(eq(users.id, id), isNull(users.deletedAt)));
  }

  async softDelete(id: string, at: Date): Promise<boolean> {
    const deleted = await this.db
      .update(users)
      .set({ deletedAt: at, isActive: false, updatedAt: at })
      .where(and(eq(users.id, id), isNull(users.deletedAt)))
      .returning({ id: users.id });
    return deleted.length > 0;
  }
}
