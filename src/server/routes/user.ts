/**
 * Listener signup and self-service account routes
 *
 *   POST   /user/signup      - Create a listener account, 201 with its profile
 *   GET    /user/me          - The caller's profile
 *   PUT    /user/me          - Replace every editable profile field
 *   PATCH  /user/me          - Change some profile fields
 *   PUT    /user/me/password - Change password; ends every session
 *   DELETE /user/me          - Soft-delete the account; ends every session
 */
import { Hono, type Context } from "hono";
import { authGuard } from "../middleware/session";
import { TokenError } from "../lib/errors";
import { parseJsonBody } from "../lib/validation";
import { toProfile } from "../services/credential-store";
import type { ProfileChanges } from "../db/users";
import type { Services } from "../types";
import {
  passwordChangeSchema,
  profilePatchSchema,
  profileReplaceSchema,
  userSignupSchema,
  type ProfilePatchInput,
} from "../../shared/validators/auth";
import type { MessageResponse, Profile } from "../../shared/types";

function toProfileChanges(body: ProfilePatchInput): ProfileChanges {
  const changes: ProfileChanges = {};
  if (body.username !== undefined) changes.username = body.username;
  if (body.email !== undefined) changes.email = body.email;
  if (body.first_name !== undefined) changes.firstName = body.first_name;
  if (body.last_name !== undefined) changes.lastName = body.last_name;
  return changes;
}

export function createUserRoutes({ credentials, sessions }: Services) {
  const guard = authGuard(sessions);

  async function updateProfile(c: Context, body: ProfilePatchInput) {
    const userId = c.get("user").id;
    const user = await credentials.updateProfile(userId, toProfileChanges(body));
    c.get("logger").info("profile updated", { fields: Object.keys(body) });
    return c.json<Profile>(toProfile(user));
  }

  return new Hono()
    .post("/signup", async (c) => {
      const body = await parseJsonBody(c, userSignupSchema);

      const user = await credentials.createUser({
        username: body.username,
        email: body.email,
        firstName: body.first_name,
        lastName: body.last_name,
        password: body.password,
      });
      c.get("logger").info("user signup", { user_id: user.id });

      return c.json<Profile>(toProfile(user), 201);
    })

    .get("/me", guard, async (c) => {
      const user = await credentials.findById(c.get("user").id);
      if (!user || !user.isActive) {
        throw new TokenError("unknown_user");
      }
      return c.json<Profile>(toProfile(user));
    })

    .put("/me", guard, async (c) => {
      return updateProfile(c, await parseJsonBody(c, profileReplaceSchema));
    })

    .patch("/me", guard, async (c) => {
      return updateProfile(c, await parseJsonBody(c, profilePatchSchema));
    })

    .put("/me/password", guard, async (c) => {
      const body = await parseJsonBody(c, passwordChangeSchema);
      const userId = c.get("user").id;

      await credentials.changePassword(userId, body.current_password, body.new_password);
      const revoked = await sessions.revokeAll(userId);
      c.get("logger").info("password changed", { sessions_revoked: revoked });

      return c.json<MessageResponse>({ message: "Password updated successfully" });
    })

    .delete("/me", guard, async (c) => {
      const userId = c.get("user").id;

      await credentials.deleteAccount(userId);
      const revoked = await sessions.revokeAll(userId);
      c.get("logger").info("account deleted", { sessions_revoked: revoked });

      return c.json<MessageResponse>({ message: "Account deleted successfully" });
    });
}
