/**
 * Database connection factory for Neon serverless PostgreSQL.
 *
 * Uses the HTTP-based neon driver (`@neondatabase/serverless`): every query
 * is a single fetch to Neon's SQL endpoint, so the Node process holds no
 * connection pool. Each statement runs as its own implicit transaction,
 * which is why the stores express their check-and-set steps as single
 * conditional statements.
 */

import { neon } from "@neondatabase/serverless";
import { drizzle } from "drizzle-orm/neon-http";
import * as schema from "./schema";

export function createDb(databaseUrl: string) {
  const sql = neon(databaseUrl);
  // Pass the full schema so Drizzle's relational query API (e.g. `db.query.*`)
  // can resolve relations and column types at runtime.
  return drizzle({ client: sql, schema });
}

// Convenience type used by the stores
export type Database = ReturnType<typeof createDb>;
