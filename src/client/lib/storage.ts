/**
 * Synchronous key/value stores behind the client session cache.
 *
 * Tokens go to the `SecretStore`, the cached profile to an ordinary
 * `KeyValueStore`. In the browser both are backed by `localStorage`; tests
 * use the in-memory implementation.
 */

export interface KeyValueStore {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

/** Same contract, kept as its own name so callers state intent. */
export type SecretStore = KeyValueStore;

export class MemoryStore implements KeyValueStore {
  readonly entries = new Map<string, string>();

  getItem(key: string): string | null {
    return this.entries.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.entries.set(key, value);
  }

  removeItem(key: string): void {
    this.entries.delete(key);
  }
}

export function browserStores(): { secrets: SecretStore; storage: KeyValueStore } {
  return { secrets: window.localStorage, storage: window.localStorage };
}
