/**
 * Drizzle Kit configuration — used by the `db:generate`, `db:migrate`,
 * `db:push`, and `db:studio` npm scripts.
 *
 * Drizzle Kit reads this file at CLI invocation time, so .env is loaded
 * here with dotenv rather than by the server entry point.
 */

import { config } from "dotenv";
import { defineConfig } from "drizzle-kit";

config({ path: ".env" });

const url = process.env.DATABASE_URL;
if (!url) {
  throw new Error("DATABASE_URL is not set; copy .env.example to .env first");
}

export default defineConfig({
  dialect: "postgresql", // Neon is PostgreSQL-compatible
  schema: "./src/server/db/schema.ts", // Single source of truth for table definitions
  out: "./drizzle", // Generated migration SQL files land here
  dbCredentials: {
    url, // Neon connection string (pooled or direct)
  },
  strict: true, // Fail on destructive changes unless explicitly confirmed
  verbose: true, // Log SQL statements during migrations for easier debugging
});
