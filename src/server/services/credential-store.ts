/**
 * Credential Store: account lookup, password verification, signup, and the
 * self-service account changes (profile edit, password change, deletion).
 *
 * The password hash never leaves this module: callers get `UserRow`s back
 * only to hand them to the session manager, and API responses go through
 * `toProfile()`.
 */

import type {
  UserRepository,
  ConflictField,
  NewUserRow,
  ProfileChanges,
} from "../db/users";
import { uniqueViolationField } from "../db/users";
import type { ArtistRow, UserRow } from "../db/schema";
import type { PasswordHasher } from "../lib/password";
import { ConflictError, NotFoundError, ValidationError } from "../lib/errors";
import type { ArtistSummary, Profile, Role } from "../../shared/types";

export interface SignupInput {
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  password: string;
}

export interface ArtistSignupInput extends SignupInput {
  stageName: string;
  bio?: string;
}

const CONFLICT_MESSAGES: Record<ConflictField, string> = {
  username: "Username already registered",
  email: "Email already registered",
  stage_name: "Stage name already taken",
};

function conflict(field: ConflictField): ConflictError {
  return new ConflictError(field, CONFLICT_MESSAGES[field]);
}

export function toProfile(user: UserRow): Profile {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
    role: user.role,
    isActive: user.isActive,
    isVerified: user.isVerified,
    createdAt: user.createdAt.toISOString(),
  };
}

export function toArtistSummary(artist: ArtistRow): ArtistSummary {
  return { id: artist.id, stageName: artist.stageName, bio: artist.bio };
}

export class CredentialStore {
  constructor(
    private readonly users: UserRepository,
    private readonly hasher: PasswordHasher,
    private readonly newId: () => string = () => crypto.randomUUID(),
  ) {}

  findByUsername(username: string): Promise<UserRow | null> {
    return this.users.findByUsername(username);
  }

  findById(id: string): Promise<UserRow | null> {
    return this.users.findById(id);
  }

  /**
   * Check `plaintext` against the user's hash. With no user, a dummy hash is
   * verified instead so both failure modes take the same time.
   */
  async verifyPassword(user: UserRow | null, plaintext: string): Promise<boolean> {
    if (!user) {
      return this.hasher.verifyDummy(plaintext);
    }
    return this.hasher.verify(user.passwordHash, plaintext);
  }

  /**
   * Resolve credentials to an active user, or null. Unknown username, wrong
   * password and a disabled account are not distinguished.
   */
  async authenticate(username: string, password: string): Promise<UserRow | null> {
    const user = await this.users.findByUsername(username);
    const valid = await this.verifyPassword(user, password);
    if (!user || !valid || !user.isActive) {
      return null;
    }
    return user;
  }

  async recordLogin(userId: string): Promise<void> {
    await this.users.touchLastLogin(userId, new Date());
  }

  async createUser(input: SignupInput, role: Role = "listener"): Promise<UserRow> {
    const taken = await this.users.findConflict(input);
    if (taken) throw conflict(taken);

    const row = await this.buildUserRow(input, role);
    try {
      return await this.users.insertUser(row);
    } catch (err) {
      // Lost a race with a concurrent signup for the same name
      const field = uniqueViolationField(err);
      if (field) throw conflict(field);
      throw err;
    }
  }

  async createArtist(
    input: ArtistSignupInput,
  ): Promise<{ user: UserRow; artist: ArtistRow }> {
    const taken = await this.users.findConflict(input);
    if (taken) throw conflict(taken);

    const user = await this.buildUserRow(input, "artist");
    try {
      return await this.users.insertUserWithArtist(user, {
        id: this.newId(),
        userId: user.id,
        stageName: input.stageName,
        bio: input.bio ?? null,
      });
    } catch (err) {
      const field = uniqueViolationField(err);
      if (field) throw conflict(field);
      throw err;
    }
  }

  /**
   * Apply `changes` to a live account. A new username or email is checked
   * against every other account, soft-deleted ones included.
   */
  async updateProfile(userId: string, changes: ProfileChanges): Promise<UserRow> {
    const user = await this.requireUser(userId);

    if (changes.username !== undefined || changes.email !== undefined) {
      const taken = await this.users.findConflict({
        username: changes.username ?? user.username,
        email: changes.email ?? user.email,
        excludeUserId: user.id,
      });
      if (taken) throw conflict(taken);
    }

    try {
      const updated = await this.users.updateProfile(user.id, changes, new Date());
      if (!updated) throw new NotFoundError("User");
      return updated;
    } catch (err) {
      const field = uniqueViolationField(err);
      if (field) throw conflict(field);
      throw err;
    }
  }

  /**
   * Replace the password after checking the current one. A wrong current
   * password is a 422 on `current_password`, not a 401, so clients do not
   * mistake it for an expired session.
   */
  async changePassword(userId: string, current: string, next: string): Promise<void> {
    const user = await this.requireUser(userId);

    if (!(await this.hasher.verify(user.passwordHash, current))) {
      throw new ValidationError(
        { current_password: ["Current password is incorrect"] },
        "Current password is incorrect",
      );
    }

    await this.users.updatePasswordHash(user.id, await this.hasher.hash(next), new Date());
  }

  /** Soft delete: the row stays, hidden from lookups and unable to log in. */
  async deleteAccount(userId: string): Promise<void> {
    const deleted = await this.users.softDelete(userId, new Date());
    if (!deleted) throw new NotFoundError("User");
  }

  private async requireUser(userId: string): Promise<UserRow> {
    const user = await this.users.findById(userId);
    if (!user) throw new NotFoundError("User");
    return user;
  }

  private async buildUserRow(input: SignupInput, role: Role): Promise<NewUserRow> {
    return {
      id: this.newId(),
      username: input.username,
      email: input.email,
      firstName: input.firstName,
      lastName: input.lastName,
      passwordHash: await this.hasher.hash(input.password),
      role,
    };
  }
}
