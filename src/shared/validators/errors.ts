import type { ZodError } from "zod";
import type { FieldErrors } from "../types";

/**
 * Collapse a ZodError into field → messages. Errors not tied to a field
 * (e.g. a non-object body) are collected under `_`.
 */
export function fieldErrorsFromZod(error: ZodError): FieldErrors {
  const flattened = error.flatten();
  const errors: FieldErrors = {};
  for (const [field, messages] of Object.entries(flattened.fieldErrors)) {
    if (Array.isArray(messages) && messages.length > 0) {
      errors[field] = messages.map(String);
    }
  }
  if (flattened.formErrors.length > 0) {
    errors._ = flattened.formErrors;
  }
  return errors;
}
