/**
 * Artist signup
 *
 *   POST /artist/signup - Create an artist account and its artist profile
 */
import { Hono } from "hono";
import { parseJsonBody } from "../lib/validation";
import { toArtistSummary } from "../services/credential-store";
import type { Services } from "../types";
import { artistSignupSchema } from "../../shared/validators/auth";
import type { ArtistSignupResponse } from "../../shared/types";

export function createArtistRoutes({ credentials }: Services) {
  return new Hono().post("/signup", async (c) => {
    const body = await parseJsonBody(c, artistSignupSchema);

    const { user, artist } = await credentials.createArtist({
      username: body.username,
      email: body.email,
      firstName: body.first_name,
      lastName: body.last_name,
      password: body.password,
      stageName: body.stage_name,
      bio: body.bio,
    });
    c.get("logger").info("artist signup", { user_id: user.id, artist_id: artist.id });

    return c.json<ArtistSignupResponse>(
      {
        message: "Artist account created",
        user: { id: user.id, username: user.username, email: user.email, role: user.role },
        artist: toArtistSummary(artist),
      },
      201,
    );
  });
}
