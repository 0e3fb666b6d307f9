/**
 * Builds a complete `Services` object over the in-memory repositories, with
 * a cheap Argon2 cost so password hashing stays fast in tests.
 *
 * Usage:
 *   const t = createTestServices();
 *   const user = await t.seedUser({ username: "alice" });
 *   const app = createApp(t.services);
 */
import { vi } from "vitest";
import type { UserRow } from "../../server/db/schema";
import type { BackgroundTasks } from "../../server/lib/background";
import { createPasswordHasher, type HashCost } from "../../server/lib/password";
import { TokenIssuer } from "../../server/lib/tokens";
import { CredentialStore } from "../../server/services/credential-store";
import { SessionManager } from "../../server/services/session-manager";
import type { AppConfig, Services } from "../../server/types";
import {
  MemoryCatalogueRepository,
  MemoryRefreshTokenRepository,
  MemoryUserRepository,
} from "./memory-repositories";

export const TEST_JWT_SECRET = "test-secret-test-secret-test-secret";
export const TEST_PEPPER = "test-pepper-value";
export const TEST_PASSWORD = "Str0ng!Pw";

/** Lowest cost node-argon2 accepts. */
export const TEST_HASH_COST: HashCost = {
  timeCost: 2,
  memoryCost: 1024,
  parallelism: 1,
};

export const testConfig: AppConfig = { environment: "test" };

/** Runs background work inline and remembers it so tests can await it. */
export function createTestTasks() {
  const pending: Promise<unknown>[] = [];
  return {
    waitUntil: vi.fn((promise: Promise<unknown>) => {
      pending.push(promise);
    }),
    async drain() {
      await Promise.allSettled(pending);
    },
    get size() {
      return pending.length;
    },
  } satisfies BackgroundTasks;
}

export function createTestServices(
  options: { accessTtlSeconds?: number; refreshTtlSeconds?: number } = {},
) {
  const users = new MemoryUserRepository();
  const refreshTokens = new MemoryRefreshTokenRepository();
  const catalogue = new MemoryCatalogueRepository();
  const hasher = createPasswordHasher(TEST_PEPPER, TEST_HASH_COST);
  const issuer = new TokenIssuer({
    secret: TEST_JWT_SECRET,
    accessTtlSeconds: options.accessTtlSeconds ?? 900,
    refreshTtlSeconds: options.refreshTtlSeconds ?? 30 * 24 * 60 * 60,
  });
  const credentials = new CredentialStore(users, hasher);
  const sessions = new SessionManager(issuer, refreshTokens, credentials);
  const tasks = createTestTasks();

  const services: Services = {
    config: testConfig,
    credentials,
    sessions,
    catalogue,
    tasks,
  };

  /** Insert a user with a real hash of `TEST_PASSWORD` (or `password`). */
  async function seedUser(
    overrides: Partial<UserRow> & { password?: string } = {},
  ): Promise<UserRow> {
    const { password = TEST_PASSWORD, ...fields } = overrides;
    const username = fields.username ?? "alice";
    const now = new Date("2024-01-01T00:00:00Z");
    return users.seed({
      id: crypto.randomUUID(),
      username,
      email: `${username}@example.com`,
      firstName: "Test",
      lastName: "User",
      passwordHash: await hasher.hash(password),
      role: "listener",
      isActive: true,
      isVerified: false,
      lastLoginAt: null,
      createdAt: now,
      updatedAt: now,
      deletedAt: null,
      ...fields,
    });
  }

  return {
    services,
    users,
    refreshTokens,
    catalogue,
    hasher,
    issuer,
    credentials,
    sessions,
    tasks,
    seedUser,
  };
}
