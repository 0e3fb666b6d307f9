/**
 * Session Manager — bearer authentication, refresh-token rotation with reuse
 * detection, and revocation.
 *
 * A session is the chain of refresh tokens descended from one login, keyed
 * by `sid`. Each refresh consumes the presented token and records its
 * successor in the same chain. Presenting a token that was already consumed
 * is treated as theft: the whole chain is revoked, so both the attacker's and
 * the victim's newest tokens stop working.
 */

import type { RefreshTokenRepository } from "../db/refresh-tokens";
import type { UserRow } from "../db/schema";
import { TokenError } from "../lib/errors";
import type { TokenIssuer } from "../lib/tokens";
import type { Role, TokenPair } from "../../shared/types";
import type { CredentialStore } from "./credential-store";

export interface UserContext {
  id: string;
  role: Role;
  username: string;
  sessionId: string;
}

export interface SessionTokens extends TokenPair {
  /** Seconds until the access token expires. */
  expiresIn: number;
  user: UserRow;
}

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

export function parseBearer(header: string | undefined | null): string | null {
  if (!header) return null;
  const match = BEARER_PATTERN.exec(header.trim());
  return match ? match[1] : null;
}

export class SessionManager {
  constructor(
    private readonly issuer: TokenIssuer,
    private readonly tokens: RefreshTokenRepository,
    private readonly credentials: CredentialStore,
    private readonly newSessionId: () => string = () => crypto.randomUUID(),
  ) {}

  async authenticate(authorizationHeader: string | undefined | null): Promise<UserContext> {
    const token = parseBearer(authorizationHeader);
    if (!token) throw new TokenError("missing");

    const claims = await this.issuer.verifyAccess(token);
    if (await this.tokens.isSessionRevoked(claims.sid)) {
      throw new TokenError("revoked");
    }

    return {
      id: claims.sub,
      role: claims.role,
      username: claims.username,
      sessionId: claims.sid,
    };
  }

  async startSession(user: UserRow): Promise<SessionTokens> {
    const sessionId = this.newSessionId();
    const issued = await this.issuer.issue(user, sessionId);
    await this.tokens.insert({
      jti: issued.refreshJti,
      sessionId,
      userId: user.id,
      previousJti: null,
      expiresAt: issued.refreshExpiresAt,
    });
    return {
      accessToken: issued.accessToken,
      refreshToken: issued.refreshToken,
      expiresIn: issued.accessExpiresIn,
      user,
    };
  }

  async refresh(refreshToken: string): Promise<SessionTokens> {
    const claims = await this.issuer.verifyRefresh(refreshToken);
    const now = new Date();

    const consumed = await this.tokens.consume(claims.jti, now);
    if (!consumed) {
      throw new TokenError(await this.classifyUnusable(claims.jti, now));
    }

    const user = await this.credentials.findById(consumed.userId);
    if (!user || !user.isActive) {
      await this.tokens.revokeSession(consumed.sessionId, now);
      throw new TokenError("unknown_user");
    }

    const issued = await this.issuer.issue(user, consumed.sessionId);
    await this.tokens.insert({
      jti: issued.refreshJti,
      sessionId: consumed.sessionId,
      userId: user.id,
      previousJti: consumed.jti,
      expiresAt: issued.refreshExpiresAt,
    });

    return {
      accessToken: issued.accessToken,
      refreshToken: issued.refreshToken,
      expiresIn: issued.accessExpiresIn,
      user,
    };
  }

  /**
   * Revoke the chain `refreshToken` belongs to. Returns false, revoking
   * nothing, when the token is invalid, unknown, or owned by someone other
   * than `userId`.
   */
  async revoke(refreshToken: string, userId?: string): Promise<boolean> {
    let jti: string;
    try {
      ({ jti } = await this.issuer.verifyRefresh(refreshToken));
    } catch (err) {
      if (err instanceof TokenError) return false;
      throw err;
    }

    const record = await this.tokens.find(jti);
    if (!record) return false;
    if (userId !== undefined && record.userId !== userId) return false;

    await this.tokens.revokeSession(record.sessionId, new Date());
    return true;
  }

  revokeAll(userId: string): Promise<number> {
    return this.tokens.revokeAllForUser(userId, new Date());
  }

  cleanupExpired(): Promise<number> {
    return this.tokens.deleteExpired(new Date());
  }

  // ---- internal ----

  /** Explain why `consume()` refused a token, revoking the chain on reuse. */
  private async classifyUnusable(
    jti: string,
    now: Date,
  ): Promise<"unknown_token" | "revoked" | "reused" | "expired"> {
    const record = await this.tokens.find(jti);
    // Signed by us but never stored, or already swept by cleanup
    if (!record) return "unknown_token";
    if (record.revokedAt) return "revoked";
    if (record.rotatedAt) {
      await this.tokens.revokeSession(record.sessionId, now);
      return "reused";
    }
    if (record.expiresAt <= now) return "expired";
    return "revoked";
  }
}
