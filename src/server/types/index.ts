/**
 * Server-side wiring types.
 *
 * `createApp()` receives everything it needs through `Services`, built once
 * in `main.ts` from the validated environment. Tests build the same object
 * from in-memory repositories.
 */

import type { CatalogueRepository } from "../db/catalogue";
import type { BackgroundTasks } from "../lib/background";
import type { CredentialStore } from "../services/credential-store";
import type { SessionManager } from "../services/session-manager";

export interface AppConfig {
  environment: "development" | "production" | "test";
  /** Absent in local development: logs go to the console. */
  newRelicLicenseKey?: string;
  /** Allowed CORS origin; every origin when unset. */
  corsOrigin?: string;
}

export interface Services {
  config: AppConfig;
  credentials: CredentialStore;
  sessions: SessionManager;
  catalogue: CatalogueRepository;
  tasks: BackgroundTasks;
}
