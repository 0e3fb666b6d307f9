/**
 * Typed API errors.
 *
 * Services and route handlers throw these; the app-level `onError` handler
 * renders them as `{ detail, errors? }` with the matching status. Anything
 * that is not an `ApiError` becomes a generic 500.
 */

import type { ZodError } from "zod";
import type { FieldErrors } from "../../shared/types";
import { fieldErrorsFromZod } from "../../shared/validators/errors";

export type ApiErrorStatus = 401 | 403 | 404 | 409 | 422;

export abstract class ApiError extends Error {
  abstract readonly status: ApiErrorStatus;

  constructor(
    readonly detail: string,
    readonly errors?: FieldErrors,
  ) {
    super(detail);
    this.name = new.target.name;
  }
}

/** Unknown username, wrong password and disabled account all look alike. */
export class InvalidCredentialsError extends ApiError {
  readonly status = 401;

  constructor() {
    super("Incorrect username or password");
  }
}

/**
 * Why a token was rejected. Kept for logs only; clients always see the same
 * 401 body regardless of reason.
 */
export type TokenFailureReason =
  | "missing"
  | "malformed"
  | "bad_signature"
  | "expired"
  | "wrong_type"
  | "revoked"
  | "reused"
  | "unknown_token"
  | "unknown_user";

export class TokenError extends ApiError {
  readonly status = 401;

  constructor(readonly reason: TokenFailureReason) {
    super("Could not validate credentials");
  }
}

export class ForbiddenError extends ApiError {
  readonly status = 403;

  constructor() {
    super("Insufficient permissions");
  }
}

export class NotFoundError extends ApiError {
  readonly status = 404;

  constructor(resource: string) {
    super(`${resource} not found`);
  }
}

export class ConflictError extends ApiError {
  readonly status = 409;

  constructor(readonly field: string, detail: string) {
    super(detail, { [field]: [detail] });
  }
}

export class ValidationError extends ApiError {
  readonly status = 422;

  constructor(errors: FieldErrors, detail = "Validation failed") {
    super(detail, errors);
  }

  static fromZod(error: ZodError): ValidationError {
    return new ValidationError(fieldErrorsFromZod(error));
  }
}
