/**
 * Node entry point: load `.env`, validate configuration, build the services
 * and serve the API with `@hono/node-server`.
 *
 * On SIGINT/SIGTERM the HTTP server stops accepting connections and pending
 * background work (log shipping) is drained before the process exits.
 */

import "dotenv/config";
import { serve } from "@hono/node-server";
import { createDb } from "./db";
import { DrizzleCatalogueRepository } from "./db/catalogue";
import { DrizzleRefreshTokenRepository } from "./db/refresh-tokens";
import { DrizzleUserRepository } from "./db/users";
import { createApp } from "./index";
import { createBackgroundTasks } from "./lib/background";
import { validateEnv } from "./lib/env";
import { createPasswordHasher } from "./lib/password";
import { TokenIssuer } from "./lib/tokens";
import { CredentialStore } from "./services/credential-store";
import { SessionManager } from "./services/session-manager";
import type { Services } from "./types";

const env = validateEnv(process.env);
const db = createDb(env.DATABASE_URL);

const credentials = new CredentialStore(
  new DrizzleUserRepository(db),
  createPasswordHasher(env.PASSWORD_PEPPER),
);

const services: Services = {
  config: {
    environment: env.ENVIRONMENT,
    newRelicLicenseKey: env.NEW_RELIC_LICENSE_KEY,
    corsOrigin: env.CORS_ORIGIN,
  },
  credentials,
  sessions: new SessionManager(
    new TokenIssuer({
      secret: env.JWT_SECRET,
      accessTtlSeconds: env.ACCESS_TOKEN_TTL_SECONDS,
      refreshTtlSeconds: env.REFRESH_TOKEN_TTL_SECONDS,
    }),
    new DrizzleRefreshTokenRepository(db),
    credentials,
  ),
  catalogue: new DrizzleCatalogueRepository(db),
  tasks: createBackgroundTasks(),
};

const app = createApp(services);

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  console.log(`[server] Listening on http://localhost:${info.port}`);
});

function shutdown(signal: string) {
  console.log(`[server] ${signal} received, shutting down`);
  server.close();
  services.tasks
    .drain()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      console.error("[server] Failed to drain background tasks:", err);
      process.exit(1);
    });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
