/**
 * Authentication routes
 *
 *   POST /auth/login           - Exchange username/password for a token pair
 *   POST /auth/refresh         - Rotate a refresh token into a new pair
 *   POST /auth/logout          - Revoke the session a refresh token belongs to
 *   POST /auth/logout-all      - Revoke every session of the caller
 *   GET  /auth/me              - Return the caller's profile
 *   POST /auth/validate        - 200 if the bearer token is still accepted
 *   POST /auth/cleanup-expired - Admin: purge expired refresh-token rows
 *
 * Every token failure surfaces as the same 401 body; the reason is only
 * logged (see `onError` in ../index.ts).
 */
import { Hono } from "hono";
import { authGuard, requireRole } from "../middleware/session";
import { InvalidCredentialsError, TokenError } from "../lib/errors";
import { parseJsonBody } from "../lib/validation";
import { toProfile } from "../services/credential-store";
import type { SessionTokens } from "../services/session-manager";
import type { Services } from "../types";
import { loginSchema, refreshSchema } from "../../shared/validators/auth";
import type { MessageResponse, Profile, TokenResponse } from "../../shared/types";

function toTokenResponse(session: SessionTokens): TokenResponse {
  return {
    access_token: session.accessToken,
    refresh_token: session.refreshToken,
    token_type: "bearer",
    expires_in: session.expiresIn,
    user_id: session.user.id,
    username: session.user.username,
    email: session.user.email,
    role: session.user.role,
  };
}

export function createAuthRoutes({ credentials, sessions }: Services) {
  const guard = authGuard(sessions);

  return new Hono()
    .post("/login", async (c) => {
      const { username, password } = await parseJsonBody(c, loginSchema);

      const user = await credentials.authenticate(username, password);
      if (!user) {
        c.get("logger").warn("login failed");
        throw new InvalidCredentialsError();
      }

      const session = await sessions.startSession(user);
      await credentials.recordLogin(user.id);
      c.get("logger").info("login", { user_id: user.id });

      return c.json<TokenResponse>(toTokenResponse(session));
    })

    .post("/refresh", async (c) => {
      const { refresh_token } = await parseJsonBody(c, refreshSchema);
      const session = await sessions.refresh(refresh_token);
      return c.json<TokenResponse>(toTokenResponse(session));
    })

    .post("/logout", guard, async (c) => {
      const { refresh_token } = await parseJsonBody(c, refreshSchema);
      const user = c.get("user");

      // Unknown or foreign tokens still get a 200 so the endpoint cannot be
      // used to test which tokens exist
      const revoked = await sessions.revoke(refresh_token, user.id);
      c.get("logger").info("logout", { user_id: user.id, revoked });

      return c.json<MessageResponse>({ message: "Successfully logged out" });
    })

    .post("/logout-all", guard, async (c) => {
      const user = c.get("user");
      const count = await sessions.revokeAll(user.id);
      return c.json({
        message: "Logged out from all sessions",
        sessions_revoked: count,
      });
    })

    .get("/me", guard, async (c) => {
      const user = await credentials.findById(c.get("user").id);
      // Deleted or deactivated since the token was issued
      if (!user || !user.isActive) {
        throw new TokenError("unknown_user");
      }
      return c.json<Profile>(toProfile(user));
    })

    .post("/validate", guard, (c) => {
      return c.json<MessageResponse>({ message: "Token is valid" });
    })

    .post("/cleanup-expired", guard, requireRole("admin"), async (c) => {
      const removed = await sessions.cleanupExpired();
      c.get("logger").info("expired refresh tokens removed", { count: removed });
      return c.json({
        message: `Removed ${removed} expired tokens`,
        tokens_removed: removed,
      });
    });
}
