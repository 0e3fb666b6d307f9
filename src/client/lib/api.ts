/**
 * Typed fetch wrapper for all client → server API calls.
 *
 * Usage:
 *   const api = new ApiClient(session, { baseUrl: "http://localhost:5173/api" });
 *   const me = await api.get<Profile>("/auth/me");
 *
 * Every request times out after `timeoutMs` (15 s by default) with a
 * `NetworkError`. An authorized request that comes back 401 triggers one
 * token refresh and is retried once; concurrent 401s share the same
 * in-flight refresh. When the refresh itself is refused the session cache
 * is cleared and `SessionExpiredError` is thrown.
 */

import { z } from "zod";
import type { FieldErrors, TokenResponse } from "../../shared/types";
import { stateFromTokens, type SessionCache } from "./session";

export class ApiError extends Error {
  constructor(
    readonly status: number,
    readonly detail: string,
    readonly errors: FieldErrors = {},
  ) {
    super(detail);
    this.name = "ApiError";
  }
}

/** Timeout or transport failure; the server never answered. */
export class NetworkError extends Error {
  constructor(message = "Network request failed") {
    super(message);
    this.name = "NetworkError";
  }
}

export class SessionExpiredError extends Error {
  constructor() {
    super("Session expired, please log in again");
    this.name = "SessionExpiredError";
  }
}

export interface ApiClientOptions {
  /** Absolute base, e.g. `https://cadence.example/api`. */
  baseUrl: string;
  timeoutMs?: number;
}

export interface RequestOptions {
  method?: "GET" | "POST";
  body?: unknown;
  /** Send the bearer token and refresh on 401. Defaults to true. */
  auth?: boolean;
}

const errorBodySchema = z.object({
  detail: z.string(),
  errors: z.record(z.array(z.string())).optional(),
});

export class ApiClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private refreshing: Promise<void> | null = null;

  constructor(
    private readonly session: SessionCache,
    options: ApiClientOptions,
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  get<T>(path: string, options: Omit<RequestOptions, "method" | "body"> = {}): Promise<T> {
    return this.request<T>(path, { ...options, method: "GET" });
  }

  post<T>(path: string, body?: unknown, options: Omit<RequestOptions, "method" | "body"> = {}): Promise<T> {
    return this.request<T>(path, { ...options, method: "POST", body });
  }

  async request<T>(path: string, options: RequestOptions = {}): Promise<T> {
    const authorized = options.auth ?? true;
    const sentWith = this.session.current?.accessToken;
    const res = await this.send(path, options, authorized);

    if (res.status === 401 && authorized && sentWith !== undefined) {
      // Another caller may already have rotated the pair while this request
      // was in flight; only refresh if we were using the current token.
      if (this.session.current?.accessToken === sentWith) {
        await this.refreshSession();
      } else if (!this.session.current) {
        throw new SessionExpiredError();
      }
      return this.parse<T>(await this.send(path, options, true));
    }

    return this.parse<T>(res);
  }

  /** Rotate the token pair. Concurrent callers share one request. */
  refreshSession(): Promise<void> {
    if (!this.refreshing) {
      this.refreshing = this.rotate().finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  private async rotate(): Promise<void> {
    const current = this.session.current;
    if (!current) {
      throw new SessionExpiredError();
    }

    // A NetworkError propagates and leaves the cache alone
    const res = await this.send(
      "/auth/refresh",
      { method: "POST", body: { refresh_token: current.refreshToken } },
      false,
    );

    if (res.status === 401) {
      this.session.clear();
      throw new SessionExpiredError();
    }

    const tokens = await this.parse<TokenResponse>(res);
    this.session.replace(stateFromTokens(tokens));
  }

  private async send(path: string, options: RequestOptions, authorized: boolean): Promise<Response> {
    const headers = new Headers({ Accept: "application/json" });
    if (options.body !== undefined) {
      headers.set("Content-Type", "application/json");
    }
    if (authorized) {
      this.session.attachAuth(headers);
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new NetworkError(`Request timed out after ${this.timeoutMs} ms`)),
        this.timeoutMs,
      );
    });

    try {
      return await Promise.race([
        fetch(`${this.baseUrl}${path}`, {
          method: options.method ?? "GET",
          headers,
          body: options.body === undefined ? undefined : JSON.stringify(options.body),
        }),
        timeout,
      ]);
    } catch (err) {
      if (err instanceof NetworkError) throw err;
      throw new NetworkError(err instanceof Error ? err.message : undefined);
    } finally {
      clearTimeout(timer);
    }
  }

  private async parse<T>(res: Response): Promise<T> {
    if (res.ok) {
      return res.json() as Promise<T>;
    }

    const parsed = errorBodySchema.safeParse(await res.json().catch(() => null));
    if (parsed.success) {
      throw new ApiError(res.status, parsed.data.detail, parsed.data.errors);
    }
    throw new ApiError(res.status, res.statusText || `Request failed with status ${res.status}`);
  }
}

/** One line a page can show for any failed call. */
export function describeError(err: unknown): string {
  if (err instanceof ApiError) return err.detail;
  if (err instanceof NetworkError) {
    return "Cannot reach the server. Check your connection and try again.";
  }
  return err instanceof Error ? err.message : "Something went wrong";
}
