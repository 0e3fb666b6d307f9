/**
 * Query and body validators for the song and genre endpoints.
 *
 * Query-string values arrive as strings, so pagination uses `z.coerce`.
 */

import { z } from "zod";

export const paginationSchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const songSearchSchema = paginationSchema.extend({
  query: z.string().trim().min(1),
});

export const genreCreateSchema = z.object({
  name: z.string().trim().min(1).max(255),
  description: z.string().trim().max(2000).optional(),
});

export const idParamSchema = z.coerce.number().int().positive();

export type Pagination = z.infer<typeof paginationSchema>;
export type SongSearch = z.infer<typeof songSearchSchema>;
export type GenreCreateInput = z.infer<typeof genreCreateSchema>;
