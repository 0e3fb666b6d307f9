/**
 * Genres
 *
 *   GET  /genre              - Active genres by name
 *   GET  /genre/:id          - One active genre
 *   POST /genre              - Admin: create a genre
 *   POST /genre/:id/disable  - Admin: hide a genre
 *   POST /genre/:id/enable   - Admin: restore a genre
 */
import { Hono } from "hono";
import { authGuard, requireRole } from "../middleware/session";
import { ConflictError, NotFoundError } from "../lib/errors";
import { parseJsonBody } from "../lib/validation";
import type { GenreRow } from "../db/schema";
import type { Services } from "../types";
import { genreCreateSchema } from "../../shared/validators/catalogue";
import type { Genre } from "../../shared/types";
import { parseId } from "./songs";

export function toGenre(row: GenreRow): Genre {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    isActive: row.isActive,
    createdAt: row.createdAt.toISOString(),
  };
}

export function createGenreRoutes({ catalogue, sessions }: Services) {
  const guard = authGuard(sessions);
  const adminOnly = requireRole("admin");

  async function setActive(rawId: string, active: boolean): Promise<Genre> {
    const genre = await catalogue.setGenreActive(parseId(rawId), active, new Date());
    if (!genre) throw new NotFoundError("Genre");
    return toGenre(genre);
  }

  return new Hono()
    .get("/", async (c) => {
      const rows = await catalogue.listGenres();
      return c.json<Genre[]>(rows.map(toGenre));
    })

    .get("/:id", async (c) => {
      const genre = await catalogue.findGenre(parseId(c.req.param("id")));
      if (!genre) throw new NotFoundError("Genre");
      return c.json<Genre>(toGenre(genre));
    })

    .post("/", guard, adminOnly, async (c) => {
      const body = await parseJsonBody(c, genreCreateSchema);
      if (await catalogue.findGenreByName(body.name)) {
        throw new ConflictError("name", "Genre already exists");
      }
      const genre = await catalogue.createGenre({
        name: body.name,
        description: body.description ?? null,
      });
      c.get("logger").info("genre created", { genre_id: genre.id });
      return c.json<Genre>(toGenre(genre), 201);
    })

    .post("/:id/disable", guard, adminOnly, async (c) => {
      return c.json<Genre>(await setActive(c.req.param("id"), false));
    })

    .post("/:id/enable", guard, adminOnly, async (c) => {
      return c.json<Genre>(await setActive(c.req.param("id"), true));
    });
}
