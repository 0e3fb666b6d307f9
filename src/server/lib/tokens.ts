/**
 * Token Issuer — mints and verifies the HS256 access/refresh JWT pair.
 *
 * Access tokens carry id, role and username so handlers never load the user.
 * Both tokens carry the `sid` of the session chain they belong to, and
 * refresh tokens a unique `jti`; whether a session or `jti` is still usable
 * is decided by the session manager, not here.
 *
 * Expiry is enforced at second granularity: a token is rejected once
 * `now >= exp`.
 */

import { sign, verify } from "hono/jwt";
import {
  JwtTokenExpired,
  JwtTokenSignatureMismatched,
} from "hono/utils/jwt/types";
import { z } from "zod";
import { ROLES, type Role } from "../../shared/types";
import { TokenError } from "./errors";

const ALGORITHM = "HS256";

const accessClaimsSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(ROLES),
  username: z.string(),
  sid: z.string().min(1),
  type: z.literal("access"),
  iat: z.number().int(),
  exp: z.number().int(),
});

const refreshClaimsSchema = z.object({
  sub: z.string().min(1),
  jti: z.string().min(1),
  sid: z.string().min(1),
  type: z.literal("refresh"),
  iat: z.number().int(),
  exp: z.number().int(),
});

export type AccessClaims = z.infer<typeof accessClaimsSchema>;
export type RefreshClaims = z.infer<typeof refreshClaimsSchema>;

export interface TokenSubject {
  id: string;
  role: Role;
  username: string;
}

export interface IssuedTokens {
  accessToken: string;
  refreshToken: string;
  refreshJti: string;
  /** Seconds until the access token expires. */
  accessExpiresIn: number;
  refreshExpiresAt: Date;
}

export interface TokenIssuerOptions {
  secret: string;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
  newId?: () => string;
}

export class TokenIssuer {
  private readonly secret: string;
  private readonly accessTtl: number;
  private readonly refreshTtl: number;
  private readonly newId: () => string;

  constructor(options: TokenIssuerOptions) {
    this.secret = options.secret;
    this.accessTtl = options.accessTtlSeconds;
    this.refreshTtl = options.refreshTtlSeconds;
    this.newId = options.newId ?? (() => crypto.randomUUID());
  }

  async issue(subject: TokenSubject, sessionId: string): Promise<IssuedTokens> {
    const iat = this.nowSeconds();
    const refreshJti = this.newId();

    const [accessToken, refreshToken] = await Promise.all([
      sign(
        {
          sub: subject.id,
          role: subject.role,
          username: subject.username,
          sid: sessionId,
          type: "access",
          iat,
          exp: iat + this.accessTtl,
        },
        this.secret,
        ALGORITHM,
      ),
      sign(
        {
          sub: subject.id,
          jti: refreshJti,
          sid: sessionId,
          type: "refresh",
          iat,
          exp: iat + this.refreshTtl,
        },
        this.secret,
        ALGORITHM,
      ),
    ]);

    return {
      accessToken,
      refreshToken,
      refreshJti,
      accessExpiresIn: this.accessTtl,
      refreshExpiresAt: new Date((iat + this.refreshTtl) * 1000),
    };
  }

  async verifyAccess(token: string): Promise<AccessClaims> {
    const payload = await this.verifySignature(token);
    const parsed = accessClaimsSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TokenError(readType(payload) === "refresh" ? "wrong_type" : "malformed");
    }
    this.assertNotExpired(parsed.data.exp);
    return parsed.data;
  }

  async verifyRefresh(token: string): Promise<RefreshClaims> {
    const payload = await this.verifySignature(token);
    const parsed = refreshClaimsSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TokenError(readType(payload) === "access" ? "wrong_type" : "malformed");
    }
    this.assertNotExpired(parsed.data.exp);
    return parsed.data;
  }

  // ---- internal ----

  private nowSeconds(): number {
    return Math.floor(Date.now() / 1000);
  }

  private assertNotExpired(exp: number): void {
    if (this.nowSeconds() >= exp) {
      throw new TokenError("expired");
    }
  }

  private async verifySignature(token: string): Promise<unknown> {
    try {
      return await verify(token, this.secret, ALGORITHM);
    } catch (err) {
      if (err instanceof JwtTokenExpired) throw new TokenError("expired");
      if (err instanceof JwtTokenSignatureMismatched) {
        throw new TokenError("bad_signature");
      }
      throw new TokenError("malformed");
    }
  }
}

function readType(payload: unknown): unknown {
  return typeof payload === "object" && payload !== null && "type" in payload
    ? payload.type
    : undefined;
}
