/**
 * Zod validators for the authentication, signup and account request bodies.
 *
 * Shared with the client so signup forms can show the same field-level
 * messages the server would return in a 422.
 */

import { z } from "zod";

const shortString = z.string().trim().min(1).max(50);
const emailSchema = z.string().trim().toLowerCase().email();

/**
 * Password policy: 8–255 characters after trimming, with at least one
 * uppercase letter, one lowercase letter, one digit and one special
 * character. Each failed rule yields its own message.
 */
export const passwordSchema = z
  .string()
  .trim()
  .min(8, "Password must be at least 8 characters long.")
  .max(255, "Password must be at most 255 characters long.")
  .regex(/[A-Z]/, "Password must include at least one uppercase letter.")
  .regex(/[a-z]/, "Password must include at least one lowercase letter.")
  .regex(/[0-9]/, "Password must include at least one digit.")
  .regex(/[\W_]/, "Password must include at least one special character.");

// Passwords are trimmed here too so login matches what signup stored
export const loginSchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().trim().min(1),
});

export const refreshSchema = z.object({
  refresh_token: z.string().min(1),
});

export const userSignupSchema = z.object({
  username: shortString,
  first_name: shortString,
  last_name: shortString,
  email: emailSchema,
  password: passwordSchema,
});

export const artistSignupSchema = userSignupSchema.extend({
  stage_name: shortString,
  bio: z.string().trim().max(2000).optional(),
});

/** PUT /user/me: every editable field is sent. */
export const profileReplaceSchema = z.object({
  username: shortString,
  first_name: shortString,
  last_name: shortString,
  email: emailSchema,
});

/** PATCH /user/me: any subset, but not none. */
export const profilePatchSchema = profileReplaceSchema
  .partial()
  .refine((body) => Object.values(body).some((value) => value !== undefined), {
    message: "Provide at least one field to update.",
  });

export const passwordChangeSchema = z
  .object({
    current_password: z.string().trim().min(1),
    new_password: passwordSchema,
  })
  .refine((body) => body.new_password !== body.current_password, {
    message: "New password must differ from the current one.",
    path: ["new_password"],
  });

export type LoginInput = z.infer<typeof loginSchema>;
export type RefreshInput = z.infer<typeof refreshSchema>;
export type UserSignupInput = z.infer<typeof userSignupSchema>;
export type ArtistSignupInput = z.infer<typeof artistSignupSchema>;
export type ProfileReplaceInput = z.infer<typeof profileReplaceSchema>;
export type ProfilePatchInput = z.infer<typeof profilePatchSchema>;
export type PasswordChangeInput = z.infer<typeof passwordChangeSchema>;
