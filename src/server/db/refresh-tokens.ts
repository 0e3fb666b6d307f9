/**
 * Refresh-token (session chain) persistence.
 *
 * The only shared mutable state in the API. `consume()` is a single
 * conditional UPDATE, so when two requests race to rotate the same token
 * exactly one of them gets the row back.
 */

import { and, countDistinct, eq, gt, isNotNull, isNull, lt, sql } from "drizzle-orm";
import type { Database } from "./index";
import { refreshTokens, type RefreshTokenRow } from "./schema";

export interface NewRefreshToken {
  jti: string;
  sessionId: string;
  userId: string;
  previousJti: string | null;
  expiresAt: Date;
}

export interface RefreshTokenRepository {
  insert(record: NewRefreshToken): Promise<void>;
  /**
   * Mark `jti` rotated if it is live: not rotated, not revoked, not expired
   * at `at`, and its session has not been revoked. Returns the row as it was
   * before rotation, or null when nothing was consumed.
   */
  consume(jti: string, at: Date): Promise<RefreshTokenRow | null>;
  find(jti: string): Promise<RefreshTokenRow | null>;
  isSessionRevoked(sessionId: string): Promise<boolean>;
  /** Stamp `revoked_at` on every not-yet-revoked row of the chain. */
  revokeSession(sessionId: string, at: Date): Promise<number>;
  /** Revoke every live chain of a user; returns the number of chains. */
  revokeAllForUser(userId: string, at: Date): Promise<number>;
  deleteExpired(before: Date): Promise<number>;
}

export class DrizzleRefreshTokenRepository implements RefreshTokenRepository {
  constructor(private readonly db: Database) {}

  async insert(record: NewRefreshToken): Promise<void> {
    await this.db.insert(refreshTokens).values(record);
  }

  async consume(jti: string, at: Date): Promise<RefreshTokenRow | null> {
    const [row] = await this.db
      .update(refreshTokens)
      .set({ rotatedAt: at })
      .where(
        and(
          eq(refreshTokens.jti, jti),
          isNull(refreshTokens.rotatedAt),
          isNull(refreshTokens.revokedAt),
          gt(refreshTokens.expiresAt, at),
          sql`not exists (
            select 1 from ${refreshTokens} as chain
            where chain.session_id = ${refreshTokens.sessionId}
              and chain.revoked_at is not null
          )`,
        ),
      )
      .returning();
    return row ?? null;
  }

  async find(jti: string): Promise<RefreshTokenRow | null> {
    const row = await this.db.query.refreshTokens.findFirst({
      where: eq(refreshTokens.jti, jti),
    });
    return row ?? null;
  }

  async isSessionRevoked(sessionId: string): Promise<boolean> {
    const [row] = await this.db
      .select({ jti: refreshTokens.jti })
      .from(refreshTokens)
      .where(and(eq(refreshTokens.sessionId, sessionId), isNotNull(refreshTokens.revokedAt)))
      .limit(1);
    return row !== undefined;
  }

  async revokeSession(sessionId: string, at: Date): Promise<number> {
    const rows = await this.db
      .update(refreshTokens)
      .set({ revokedAt: at })
      .where(and(eq(refreshTokens.sessionId, sessionId), isNull(refreshTokens.revokedAt)))
      .returning({ jti: refreshTokens.jti });
    return rows.length;
  }

  async revokeAllForUser(userId: string, at: Date): Promise<number> {
    const [live] = await this.db
      .select({ sessions: countDistinct(refreshTokens.sessionId) })
      .from(refreshTokens)
      .where(
        and(
          eq(refreshTokens.userId, userId),
          isNull(refreshTokens.revokedAt),
          gt(refreshTokens.expiresAt, at),
        ),
      );

    await this.db
      .update(refreshTokens)
      .set({ revokedAt: at })
      .where(and(eq(refreshTokens.userId, userId), isNull(refreshTokens.revokedAt)));

    return live?.sessions ?? 0;
  }

  async deleteExpired(before: Date): Promise<number> {
    const rows = await this.db
      .delete(refreshTokens)
      .where(lt(refreshTokens.expiresAt, before))
      .returning({ jti: refreshTokens.jti });
    return rows.length;
  }
}
