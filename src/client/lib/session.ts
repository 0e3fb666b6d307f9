/**
 * Client session cache — the persisted token pair and profile snapshot.
 *
 * One `SessionCache` is created at app start and injected into the API
 * client and `AuthProvider`. State is replaced wholesale, never patched;
 * storage writes happen before the in-memory snapshot changes, and
 * subscribers are told after both.
 */

import { z } from "zod";
import { ROLES, type ProfileSnapshot, type TokenResponse } from "../../shared/types";
import type { KeyValueStore, SecretStore } from "./storage";

export const STORAGE_KEYS = {
  accessToken: "cadence.access_token",
  refreshToken: "cadence.refresh_token",
  profile: "cadence.profile",
} as const;

export interface ClientAuthState {
  accessToken: string;
  refreshToken: string;
  profile: ProfileSnapshot;
}

type Listener = (state: ClientAuthState | null) => void;

const profileSnapshotSchema = z.object({
  id: z.string().min(1),
  username: z.string(),
  email: z.string(),
  role: z.enum(ROLES),
});

function parseProfile(raw: string): ProfileSnapshot | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = profileSnapshotSchema.safeParse(json);
  return result.success ? result.data : null;
}

/** Build the cached state from a login or refresh response. */
export function stateFromTokens(tokens: TokenResponse): ClientAuthState {
  return {
    accessToken: tokens.access_token,
    refreshToken: tokens.refresh_token,
    profile: {
      id: tokens.user_id,
      username: tokens.username,
      email: tokens.email,
      role: tokens.role,
    },
  };
}

export class SessionCache {
  private state: ClientAuthState | null = null;
  private readonly listeners = new Set<Listener>();

  constructor(
    private readonly secrets: SecretStore,
    private readonly storage: KeyValueStore,
  ) {}

  get current(): ClientAuthState | null {
    return this.state;
  }

  /**
   * Read the persisted state. A partial or unreadable entry set is treated
   * as logged out and wiped.
   */
  load(): ClientAuthState | null {
    const accessToken = this.secrets.getItem(STORAGE_KEYS.accessToken);
    const refreshToken = this.secrets.getItem(STORAGE_KEYS.refreshToken);
    const rawProfile = this.storage.getItem(STORAGE_KEYS.profile);
    const profile = rawProfile === null ? null : parseProfile(rawProfile);

    if (!accessToken || !refreshToken || !profile) {
      this.clear();
      return null;
    }

    this.state = { accessToken, refreshToken, profile };
    this.emit();
    return this.state;
  }

  /** Optimistic: the server may still reject the cached token. */
  isLoggedIn(): boolean {
    return Boolean(this.state?.accessToken);
  }

  attachAuth(headers: Headers): Headers {
    if (this.state?.accessToken) {
      headers.set("Authorization", `Bearer ${this.state.accessToken}`);
    }
    return headers;
  }

  replace(next: ClientAuthState): void {
    this.secrets.setItem(STORAGE_KEYS.accessToken, next.accessToken);
    this.secrets.setItem(STORAGE_KEYS.refreshToken, next.refreshToken);
    this.storage.setItem(STORAGE_KEYS.profile, JSON.stringify(next.profile));
    this.state = next;
    this.emit();
  }

  clear(): void {
    this.secrets.removeItem(STORAGE_KEYS.accessToken);
    this.secrets.removeItem(STORAGE_KEYS.refreshToken);
    this.storage.removeItem(STORAGE_KEYS.profile);
    const hadState = this.state !== null;
    this.state = null;
    if (hadState) this.emit();
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(): void {
    for (const listener of this.listeners) {
      listener(this.state);
    }
  }
}
