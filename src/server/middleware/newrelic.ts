/**
 * New Relic request instrumentation middleware.
 *
 * Records timing, status, and metadata for every request, then flushes the
 * buffered log entries to New Relic's Log API through `tasks.waitUntil()` so
 * the response is never delayed by observability overhead.
 *
 * Also acts as the outermost error boundary: Hono routes thrown `Error`s to
 * the app's `onError`, so only non-Error throws reach the catch here. They
 * are logged as errors and a generic 500 is returned.
 */

import { createMiddleware } from "hono/factory";
import { Logger } from "../lib/logger";
import type { BackgroundTasks } from "../lib/background";
import type { AppConfig } from "../types";
import type { UserContext } from "../services/session-manager";

// Extend Hono's context so `c.get("logger")` is typed across all routes
declare module "hono" {
  interface ContextVariableMap {
    logger: Logger;
  }
}

export interface InstrumentationOptions {
  config: AppConfig;
  tasks: BackgroundTasks;
}

/**
 * Must be registered BEFORE the routes so it wraps the entire request
 * lifecycle and captures the full duration.
 */
export function newrelicMiddleware({ config, tasks }: InstrumentationOptions) {
  const flush = (log: Logger) =>
    log.flush((promise) => tasks.waitUntil(promise), config.newRelicLicenseKey);

  return createMiddleware(async (c, next) => {
    const start = Date.now();
    const requestId: string | undefined = c.get("requestId");
    const log = new Logger({
      environment: config.environment,
      attributes: requestId ? { request_id: requestId } : {},
    });
    c.set("logger", log);

    try {
      await next();
    } catch (err) {
      const message =
        err instanceof Error ? err.message : "Unknown internal error";
      const stack = err instanceof Error ? err.stack : undefined;

      log.error("Unhandled exception", {
        "error.message": message,
        "error.stack": stack,
        "http.method": c.req.method,
        "http.url": new URL(c.req.url).pathname,
      });
      flush(log);

      return c.json({ detail: "Internal Server Error" }, 500);
    }

    // Set by authGuard on protected routes only
    const user: UserContext | undefined = c.get("user");

    log.info("request", {
      "http.method": c.req.method,
      "http.url": new URL(c.req.url).pathname,
      "http.status_code": c.res.status,
      duration_ms: Date.now() - start,
      user_agent: c.req.header("user-agent") ?? "",
      ...(user && { user_id: user.id }),
    });

    flush(log);
  });
}
