/**
 * Tracks fire-and-forget work (log shipping) started during a request so it
 * never delays the response, while still letting the process wait for it
 * on shutdown. Plays the role a Workers `waitUntil()` would.
 */

export interface BackgroundTasks {
  waitUntil(promise: Promise<unknown>): void;
  /** Resolves once every task registered so far has settled. */
  drain(): Promise<void>;
  readonly size: number;
}

export function createBackgroundTasks(
  onError: (err: unknown) => void = (err) =>
    console.error("[background] Task failed:", err),
): BackgroundTasks {
  const pending = new Set<Promise<void>>();

  return {
    waitUntil(promise) {
      const tracked: Promise<void> = promise
        .then(() => undefined, onError)
        .finally(() => {
          pending.delete(tracked);
        });
      pending.add(tracked);
    },
    async drain() {
      await Promise.all([...pending]);
    },
    get size() {
      return pending.size;
    },
  };
}
