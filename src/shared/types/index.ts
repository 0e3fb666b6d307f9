/**
 * Shared types used by both the React client and the Hono API server.
 *
 * These types define the API contract between client and server. Wire
 * payloads use snake_case field names; everything in memory is camelCase.
 */

/** Closed set of account roles. Adding one is a compile-time-checked change. */
export const ROLES = ["listener", "artist", "admin"] as const;

export type Role = (typeof ROLES)[number];

export function isRole(value: unknown): value is Role {
  return typeof value === "string" && (ROLES as readonly string[]).includes(value);
}

/** Public view of a user — never carries the password hash. */
export interface Profile {
  id: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  role: Role;
  isActive: boolean;
  isVerified: boolean;
  createdAt: string;
}

/** Minimal profile snapshot cached on the client between launches. */
export interface ProfileSnapshot {
  id: string;
  username: string;
  email: string;
  role: Role;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
}

/** Body of POST /auth/login and POST /auth/refresh. */
export interface TokenResponse {
  access_token: string;
  refresh_token: string;
  token_type: "bearer";
  /** Seconds until the access token expires. */
  expires_in: number;
  user_id: string;
  username: string;
  email: string;
  role: Role;
}

export interface ArtistSummary {
  id: string;
  stageName: string;
  bio: string | null;
}

/** Body of POST /artist/signup. */
export interface ArtistSignupResponse {
  message: string;
  user: Pick<Profile, "id" | "username" | "email" | "role">;
  artist: ArtistSummary;
}

export interface Genre {
  id: number;
  name: string;
  description: string | null;
  isActive: boolean;
  createdAt: string;
}

export interface Song {
  id: number;
  title: string;
  genreId: number;
  artistId: string | null;
  releaseDate: string;
  durationSeconds: number;
  coverImage: string | null;
  createdAt: string;
}

/** Offset/limit page returned by the catalogue list endpoints. */
export interface Page<T> {
  items: T[];
  skip: number;
  limit: number;
}

/** Field name → messages, as produced by Zod's `flatten().fieldErrors`. */
export type FieldErrors = Record<string, string[]>;

/** Envelope for error API responses. */
export interface ApiErrorBody {
  detail: string;
  errors?: FieldErrors;
}

export interface MessageResponse {
  message: string;
}
