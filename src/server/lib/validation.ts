import type { Context } from "hono";
import type { z } from "zod";
import { ValidationError } from "./errors";

/**
 * Read the JSON body and validate it against `schema`, throwing a 422
 * `ValidationError` with field-level messages on failure.
 */
export async function parseJsonBody<T extends z.ZodTypeAny>(
  c: Context,
  schema: T,
): Promise<z.output<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ValidationError({ _: ["Request body must be valid JSON"] }, "Invalid JSON body");
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw ValidationError.fromZod(parsed.error);
  }
  return parsed.data;
}

/** Validate the query string (all values as strings) against `schema`. */
export function parseQuery<T extends z.ZodTypeAny>(
  c: Context,
  schema: T,
): z.output<T> {
  const parsed = schema.safeParse(c.req.query());
  if (!parsed.success) {
    throw ValidationError.fromZod(parsed.error);
  }
  return parsed.data;
}
