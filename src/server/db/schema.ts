/**
 * Drizzle ORM schema definitions — the single source of truth for the DB
 * structure. Run `npm run db:generate` after changes to produce migration
 * files, or `npm run db:push` to apply directly during development.
 */

import {
  boolean,
  index,
  integer,
  pgEnum,
  pgTable,
  serial,
  text,
  timestamp,
  uuid,
  varchar,
} from "drizzle-orm/pg-core";
import { ROLES } from "../../shared/types";

export const userRole = pgEnum("user_role", ROLES);

/**
 * Accounts for every role. Rows are soft-deleted (`deleted_at`) rather than
 * removed so that songs and audit history keep a valid owner.
 */
export const users = pgTable(
  "users",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    username: varchar("username", { length: 50 }).notNull().unique(),
    email: text("email").notNull().unique(),
    firstName: varchar("first_name", { length: 50 }).notNull(),
    lastName: varchar("last_name", { length: 50 }).notNull(),
    // Argon2id PHC string; never selected into API responses
    passwordHash: text("password_hash").notNull(),
    role: userRole("role").notNull().default("listener"),
    isActive: boolean("is_active").notNull().default(true),
    isVerified: boolean("is_verified").notNull().default(false),
    lastLoginAt: timestamp("last_login_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
    deletedAt: timestamp("deleted_at", { withTimezone: true }),
  },
  (table) => [index("users_role_idx").on(table.role)],
);

/** Artist profile attached one-to-one to a user with the "artist" role. */
export const artists = pgTable("artists", {
  id: uuid("id").primaryKey().defaultRandom(),
  userId: uuid("user_id")
    .references(() => users.id)
    .notNull()
    .unique(),
  stageName: varchar("stage_name", { length: 50 }).notNull().unique(),
  bio: text("bio"),
  isDisabled: boolean("is_disabled").notNull().default(false),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
});

/**
 * One row per issued refresh token. Rows sharing a `session_id` form one
 * login's rotation chain; revoking a session stamps `revoked_at` on every
 * row of the chain.
 */
export const refreshTokens = pgTable(
  "refresh_tokens",
  {
    jti: uuid("jti").primaryKey(),
    sessionId: uuid("session_id").notNull(),
    userId: uuid("user_id")
      .references(() => users.id)
      .notNull(),
    previousJti: uuid("previous_jti"),
    expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(),
    // Set exactly once, by the refresh that consumed this token
    rotatedAt: timestamp("rotated_at", { withTimezone: true }),
    revokedAt: timestamp("revoked_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index("refresh_tokens_session_idx").on(table.sessionId),
    index("refresh_tokens_user_idx").on(table.userId),
    index("refresh_tokens_expires_idx").on(table.expiresAt),
  ],
);

export const genres = pgTable("genres", {
  id: serial("id").primaryKey(),
  name: varchar("name", { length: 255 }).notNull().unique(),
  description: text("description"),
  isActive: boolean("is_active").notNull().default(true),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  disabledAt: timestamp("disabled_at", { withTimezone: true }),
});

export const songs = pgTable(
  "songs",
  {
    id: serial("id").primaryKey(),
    title: varchar("title", { length: 150 }).notNull(),
    genreId: integer("genre_id")
      .references(() => genres.id)
      .notNull(),
    artistId: uuid("artist_id").references(() => artists.id),
    releaseDate: timestamp("release_date", { withTimezone: true }).notNull(),
    durationSeconds: integer("duration_seconds").notNull(),
    coverImage: text("cover_image"),
    isDisabled: boolean("is_disabled").notNull().default(false),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index("songs_title_idx").on(table.title),
    index("songs_genre_idx").on(table.genreId),
    index("songs_artist_idx").on(table.artistId),
  ],
);

export type UserRow = typeof users.$inferSelect;
export type ArtistRow = typeof artists.$inferSelect;
export type RefreshTokenRow = typeof refreshTokens.$inferSelect;
export type GenreRow = typeof genres.$inferSelect;
export type SongRow = typeof songs.$inferSelect;
