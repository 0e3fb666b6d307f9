import { describe, it, expect, beforeEach, vi } from "vitest";
import { createApp } from "../index";
import { createTestServices, TEST_PASSWORD } from "../../test/mocks/services";
import type { UserRow } from "../db/schema";
import { jsonRequest, readJson } from "../../test/mocks/requests";

let t: ReturnType<typeof createTestServices>;
let app: ReturnType<typeof createApp>;

const validSignup = {
  username: "alice",
  first_name: "Alice",
  last_name: "Liddell",
  email: "a@x.com",
  password: "Str0ng!Pw",
};

function signup(body: unknown) {
  return jsonRequest(app, "/user/signup", { method: "POST", body });
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  t = createTestServices();
  app = createApp(t.services);
});

describe("POST /user/signup", () => {
  it("creates a listener and returns its profile", async () => {
    const res = await signup(validSignup);

    expect(res.status).toBe(201);
    const body = await readJson(res);
    expect(body).toMatchObject({
      username: "alice",
      email: "a@x.com",
      firstName: "Alice",
      lastName: "Liddell",
      role: "listener",
      isActive: true,
      isVerified: false,
    });
    expect(body).not.toHaveProperty("passwordHash");
  });

  it("returns 409 for a second signup with the same username", async () => {
    await signup(validSignup);

    const res = await signup({ ...validSignup, email: "other@x.com" });

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      detail: "Username already registered",
      errors: { username: ["Username already registered"] },
    });
  });

  it("returns 409 for a taken email", async () => {
    await signup(validSignup);

    const res = await signup({ ...validSignup, username: "bob" });

    expect(res.status).toBe(409);
    expect(await readJson(res)).toMatchObject({ detail: "Email already registered" });
  });

  it("normalises the email before storing it", async () => {
    const res = await signup({ ...validSignup, email: "  A@X.com " });

    expect(await readJson(res)).toMatchObject({ email: "a@x.com" });
  });

  it("lets the new account log in", async () => {
    await signup(validSignup);

    const res = await jsonRequest(app, "/auth/login", {
      method: "POST",
      body: { username: "alice", password: "Str0ng!Pw" },
    });

    expect(res.status).toBe(200);
  });

  it("returns 422 with every failed password rule", async () => {
    const res = await signup({ ...validSignup, password: "weak" });

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      detail: "Validation failed",
      errors: {
        password: [
          "Password must be at least 8 characters long.",
          "Password must include at least one uppercase letter.",
          "Password must include at least one digit.",
          "Password must include at least one special character.",
        ],
      },
    });
  });

  it("returns 422 naming each missing field", async () => {
    const res = await signup({ username: "alice" });

    expect(res.status).toBe(422);
    const body = await readJson(res);
    expect(Object.keys(Object(body.errors)).sort()).toEqual([
      "email",
      "first_name",
      "last_name",
      "password",
    ]);
  });

  it("rejects an invalid email", async () => {
    const res = await signup({ ...validSignup, email: "not-an-email" });

    expect(res.status).toBe(422);
    expect(await readJson(res)).toMatchObject({ errors: { email: ["Invalid email"] } });
  });
});

// ---------------------------------------------------------------------------
// /user/me
// ---------------------------------------------------------------------------

describe("/user/me", () => {
  let alice: UserRow;
  let access: string;
  let refresh: string;

  beforeEach(async () => {
    alice = await t.seedUser({ username: "alice", firstName: "Alice", lastName: "Liddell" });
    const session = await t.sessions.startSession(alice);
    access = session.accessToken;
    refresh = session.refreshToken;
  });

  function me(method: string, body?: unknown, path = "/user/me") {
    return jsonRequest(app, path, { method, body, token: access });
  }

  function refreshWith(token: string) {
    return jsonRequest(app, "/auth/refresh", { method: "POST", body: { refresh_token: token } });
  }

  describe("GET", () => {
    it("returns the caller's profile", async () => {
      const res = await me("GET");

      expect(res.status).toBe(200);
      expect(await readJson(res)).toMatchObject({
        id: alice.id,
        username: "alice",
        email: "alice@example.com",
        firstName: "Alice",
      });
    });

    it("returns 401 without a token", async () => {
      const res = await jsonRequest(app, "/user/me");

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ detail: "Could not validate credentials" });
    });
  });

  describe("PATCH", () => {
    it("changes only the fields sent", async () => {
      const res = await me("PATCH", { last_name: "Pleasance" });

      expect(res.status).toBe(200);
      expect(await readJson(res)).toMatchObject({
        username: "alice",
        firstName: "Alice",
        lastName: "Pleasance",
      });
    });

    it("returns 422 for an empty body", async () => {
      const res = await me("PATCH", {});

      expect(res.status).toBe(422);
      expect(await res.json()).toEqual({
        detail: "Validation failed",
        errors: { _: ["Provide at least one field to update."] },
      });
    });

    it("ignores an attempt to change the role", async () => {
      const res = await me("PATCH", { first_name: "Al", role: "admin" });

      expect(res.status).toBe(200);
      expect(await readJson(res)).toMatchObject({ firstName: "Al", role: "listener" });
    });
  });

  describe("PUT", () => {
    const replacement = {
      username: "alice2",
      first_name: "Alicia",
      last_name: "Pleasance",
      email: "Alicia@Example.com",
    };

    it("replaces every editable field", async () => {
      const res = await me("PUT", replacement);

      expect(res.status).toBe(200);
      expect(await readJson(res)).toMatchObject({
        username: "alice2",
        firstName: "Alicia",
        lastName: "Pleasance",
        email: "alicia@example.com",
      });
    });

    it("returns 422 when a field is missing", async () => {
      const res = await me("PUT", { username: "alice2" });

      expect(res.status).toBe(422);
      const body = await readJson(res);
      expect(Object.keys(Object(body.errors)).sort()).toEqual([
        "email",
        "first_name",
        "last_name",
      ]);
    });

    it("returns 409 for a username another account holds", async () => {
      await t.seedUser({ username: "bob" });

      const res = await me("PUT", { ...replacement, username: "bob" });

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({
        detail: "Username already registered",
        errors: { username: ["Username already registered"] },
      });
    });
  });

  describe("PUT /password", () => {
    const change = { current_password: TEST_PASSWORD, new_password: "N3w!Passw0rd" };

    it("switches the password and ends every session", async () => {
      const res = await me("PUT", change, "/user/me/password");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ message: "Password updated successfully" });
      expect((await refreshWith(refresh)).status).toBe(401);
      expect((await me("GET")).status).toBe(401);

      const oldLogin = await jsonRequest(app, "/auth/login", {
        method: "POST",
        body: { username: "alice", password: TEST_PASSWORD },
      });
      const newLogin = await jsonRequest(app, "/auth/login", {
        method: "POST",
        body: { username: "alice", password: "N3w!Passw0rd" },
      });
      expect(oldLogin.status).toBe(401);
      expect(newLogin.status).toBe(200);
    });

    it("returns 422 on current_password when it is wrong and keeps the session", async () => {
      const res = await me(
        "PUT",
        { ...change, current_password: "Wr0ng!Pass" },
        "/user/me/password",
      );

      expect(res.status).toBe(422);
      expect(await res.json()).toEqual({
        detail: "Current password is incorrect",
        errors: { current_password: ["Current password is incorrect"] },
      });
      expect((await refreshWith(refresh)).status).toBe(200);
    });

    it("applies the password policy to the new password", async () => {
      const res = await me("PUT", { ...change, new_password: "weak" }, "/user/me/password");

      expect(res.status).toBe(422);
      expect(await readJson(res)).toMatchObject({
        errors: { new_password: expect.arrayContaining(["Password must include at least one digit."]) },
      });
    });
  });

  describe("DELETE", () => {
    it("soft-deletes the account and ends every session", async () => {
      const res = await me("DELETE");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ message: "Account deleted successfully" });
      expect(t.users.users.get(alice.id)?.deletedAt).toBeInstanceOf(Date);
      expect((await refreshWith(refresh)).status).toBe(401);
      expect((await me("GET")).status).toBe(401);
    });

    it("blocks logging in again", async () => {
      await me("DELETE");

      const res = await jsonRequest(app, "/auth/login", {
        method: "POST",
        body: { username: "alice", password: TEST_PASSWORD },
      });

      expect(res.status).toBe(401);
    });
  });
});
