/**
 * Small helpers for driving a Hono app with `app.request()` in route tests.
 */

interface RequestApp {
  request(path: string, init?: RequestInit): Response | Promise<Response>;
}

export interface JsonRequestOptions {
  method?: string;
  body?: unknown;
  /** Sent as `Authorization: Bearer <token>`. */
  token?: string;
}

export function jsonRequest(
  app: RequestApp,
  path: string,
  { method = "GET", body, token }: JsonRequestOptions = {},
) {
  const headers: Record<string, string> = {};
  if (body !== undefined) headers["Content-Type"] = "application/json";
  if (token) headers.Authorization = `Bearer ${token}`;

  return app.request(path, {
    method,
    headers,
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

/** Read a JSON response body as a loose record for assertions. */
export async function readJson(res: Response): Promise<Record<string, unknown>> {
  const body: unknown = await res.json();
  if (typeof body !== "object" || body === null) {
    throw new Error(`Expected a JSON object, got ${JSON.stringify(body)}`);
  }
  return Object.fromEntries(Object.entries(body));
}
