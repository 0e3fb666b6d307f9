/**
 * Hono API application for Cadence.
 *
 * `createApp()` wires middleware and route modules around an injected
 * `Services` object; nothing here reads the environment or opens a
 * connection. The Node entry point (`main.ts`) builds the real services,
 * tests build in-memory ones.
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { requestId } from "hono/request-id";
import { ApiError, TokenError } from "./lib/errors";
import { newrelicMiddleware } from "./middleware/newrelic";
import { createArtistRoutes } from "./routes/artist";
import { createAuthRoutes } from "./routes/auth";
import { createGenreRoutes } from "./routes/genres";
import { createSongRoutes } from "./routes/songs";
import { createUserRoutes } from "./routes/user";
import type { Services } from "./types";
import type { ApiErrorBody } from "../shared/types";

export function createApp(services: Services) {
  const app = new Hono()
    // One access line per request on stdout, next to the structured logs
    .use("*", logger())
    .use("*", cors({ origin: services.config.corsOrigin ?? "*" }))
    .use("*", requestId())
    .use("*", newrelicMiddleware(services))
    // --- Feature routes ---
    .route("/auth", createAuthRoutes(services))
    .route("/user", createUserRoutes(services))
    .route("/artist", createArtistRoutes(services))
    .route("/song", createSongRoutes(services))
    .route("/genre", createGenreRoutes(services))
    // Liveness check, no auth
    .get("/health", (c) => c.json({ status: "ok" }));

  app.notFound((c) => c.json<ApiErrorBody>({ detail: "Not Found" }, 404));

  app.onError((err, c) => {
    const log = c.get("logger");

    if (err instanceof TokenError) {
      log.warn("token rejected", {
        reason: err.reason,
        "http.url": new URL(c.req.url).pathname,
      });
    }

    if (err instanceof ApiError) {
      const body: ApiErrorBody = err.errors
        ? { detail: err.detail, errors: err.errors }
        : { detail: err.detail };
      return c.json(body, err.status);
    }

    log.error("Unhandled exception", {
      "error.message": err.message,
      "error.stack": err.stack,
      "http.method": c.req.method,
      "http.url": new URL(c.req.url).pathname,
    });
    return c.json<ApiErrorBody>({ detail: "Internal Server Error" }, 500);
  });

  return app;
}

// Exported so the client can derive route types if it wants to.
export type AppType = ReturnType<typeof createApp>;
