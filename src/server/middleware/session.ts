/**
 * Bearer-token authentication guard and role gate.
 *
 * `authGuard` resolves the `Authorization: Bearer <access token>` header
 * through the session manager and stores the caller on the context as
 * `c.get("user")`. Failures throw `TokenError`, which the app's `onError`
 * renders as a generic 401. Once the caller is known, the request logger is
 * swapped for a child that tags every later entry with `user_id`.
 */

import { createMiddleware } from "hono/factory";
import { ForbiddenError } from "../lib/errors";
import type { Logger } from "../lib/logger";
import type { SessionManager, UserContext } from "../services/session-manager";
import type { Role } from "../../shared/types";

// Extend Hono's context so `c.get("user")` is typed across all routes
declare module "hono" {
  interface ContextVariableMap {
    user: UserContext;
  }
}

/**
 * Route-level guard that rejects unauthenticated requests with 401.
 * Apply to any route group that requires a logged-in user.
 */
export function authGuard(sessions: SessionManager) {
  return createMiddleware(async (c, next) => {
    const user = await sessions.authenticate(c.req.header("Authorization"));
    c.set("user", user);

    // Absent when the guard is mounted without the instrumentation middleware
    const log: Logger | undefined = c.get("logger");
    if (log) {
      c.set("logger", log.child({ user_id: user.id }));
    }
    await next();
  });
}

/** Allow only the listed roles. Must run after `authGuard`. */
export function requireRole(...roles: Role[]) {
  return createMiddleware(async (c, next) => {
    const user: UserContext | undefined = c.get("user");
    if (!user || !roles.includes(user.role)) {
      throw new ForbiddenError();
    }
    await next();
  });
}
