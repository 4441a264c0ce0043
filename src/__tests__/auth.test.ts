/**
 * Registration, login and token tests.
 *
 * The app runs against in-memory stores, so every expectation here is exact:
 * ids start at 1 and rows can be inspected directly.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import request from "supertest";
import jwt from "jsonwebtoken";
import type { Express } from "express";
import { createApp } from "../app";
import { verifyAccessToken } from "../services/authService";
import { DuplicateUserError } from "../services/userStore";
import { createTestContext } from "./helpers/testContext";
import type { TestContext } from "./helpers/testContext";

const ALICE = {
  username: "alice",
  email: "alice@example.com",
  password: "correct-horse",
};

let ctx: TestContext;
let app: Express;

beforeEach(() => {
  ctx = createTestContext();
  app = createApp(ctx);
});

// ---------------------------------------------------------------------------
// POST /auth/register
// ---------------------------------------------------------------------------

describe("POST /auth/register", () => {
  it("creates the user and never returns the password", async () => {
    const res = await request(app).post("/auth/register").send(ALICE);

    expect(res.status).toBe(201);
    expect(res.body).toEqual({
      user: { id: 1, username: "alice", email: "alice@example.com", is_admin: false },
    });
    expect(res.body.user).not.toHaveProperty("password");
    expect(res.body.user).not.toHaveProperty("password_hash");
  });

  it("stores a bcrypt hash instead of the plaintext password", async () => {
    await request(app).post("/auth/register").send(ALICE);

    const stored = ctx.users.rows[0];
    expect(stored.password_hash).not.toBe(ALICE.password);
    expect(stored.password_hash.startsWith("$2b$04$")).toBe(true);
  });

  it("lower-cases and trims the email", async () => {
    const res = await request(app)
      .post("/auth/register")
      .send({ ...ALICE, email: "  Alice@Example.COM " });

    expect(res.status).toBe(201);
    expect(res.body.user.email).toBe("alice@example.com");
  });

  it("accepts a registration without a username", async () => {
    const res = await request(app)
      .post("/auth/register")
      .send({ email: "bob@example.com", password: "long-enough" });

    expect(res.status).toBe(201);
    expect(res.body.user.username).toBeNull();
  });

  it("returns 400 for an empty body", async () => {
    const res = await request(app).post("/auth/register").send({});

    expect(res.status).toBe(400);
    expect(res.body.code).toBe("VALIDATION_ERROR");
    expect(res.body.details).toEqual(
      expect.arrayContaining([
        expect.objectContaining({ field: "email" }),
        expect.objectContaining({ field: "password" }),
      ])
    );
  });

  it("returns 400 for an invalid email", async () => {
    const res = await request(app)
      .post("/auth/register")
      .send({ ...ALICE, email: "not-an-email" });

    expect(res.status).toBe(400);
    expect(res.body.details).toEqual([{ field: "email", message: "Invalid email format" }]);
  });

  it("returns 400 for a password shorter than 8 characters", async () => {
    const res = await request(app)
      .post("/auth/register")
      .send({ ...ALICE, password: "seven77" });

    expect(res.status).toBe(400);
    expect(res.body.details).toEqual([
      { field: "password", message: "Password must be at least 8 characters" },
    ]);
    expect(ctx.users.rows).toHaveLength(0);
  });

  it("rejects an email longer than 120 characters instead of shortening it", async () => {
    // 109 + "@example.com" (12) = 121 characters
    const res = await request(app)
      .post("/auth/register")
      .send({ ...ALICE, email: `${"a".repeat(109)}@example.com` });

    expect(res.status).toBe(400);
    expect(res.body.details).toEqual([{ field: "email", message: "Email must be at most 120 characters" }]);
    expect(ctx.users.rows).toHaveLength(0);
  });

  it("rejects a username longer than 80 characters", async () => {
    const res = await request(app)
      .post("/auth/register")
      .send({ ...ALICE, username: "u".repeat(81) });

    expect(res.status).toBe(400);
    expect(res.body.details).toEqual([
      { field: "username", message: "Username must be at most 80 characters" },
    ]);
    expect(ctx.users.rows).toHaveLength(0);
  });

  it("keeps a username at the 80-character limit whole", async () => {
    const res = await request(app)
      .post("/auth/register")
      .send({ ...ALICE, username: "u".repeat(80) });

    expect(res.status).toBe(201);
    expect(res.body.user.username).toBe("u".repeat(80));
  });

  it("accepts name as the username", async () => {
    const res = await request(app)
      .post("/auth/register")
      .send({ name: "carol", email: "carol@example.com", password: "long-enough" });

    expect(res.status).toBe(201);
    expect(res.body.user.username).toBe("carol");
    expect(ctx.users.rows[0].username).toBe("carol");
  });

  it("prefers username over name when both are sent", async () => {
    const res = await request(app)
      .post("/auth/register")
      .send({ ...ALICE, name: "someone-else" });

    expect(res.status).toBe(201);
    expect(res.body.user.username).toBe("alice");
  });

  it("rejects a duplicate email and leaves the existing row untouched", async () => {
    await request(app).post("/auth/register").send(ALICE);
    const before = { ...ctx.users.rows[0] };

    const res = await request(app)
      .post("/auth/register")
      .send({ username: "alice2", email: "alice@example.com", password: "another-password" });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Email already exists", code: "DUPLICATE_EMAIL" });
    expect(ctx.users.rows).toHaveLength(1);
    expect(ctx.users.rows[0]).toEqual(before);
  });

  it("rejects a duplicate username", async () => {
    await request(app).post("/auth/register").send(ALICE);

    const res = await request(app)
      .post("/auth/register")
      .send({ username: "alice", email: "other@example.com", password: "another-password" });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Username already exists", code: "DUPLICATE_USERNAME" });
    expect(ctx.users.rows).toHaveLength(1);
  });

  it("translates a unique violation from the insert into 400", async () => {
    vi.spyOn(ctx.users, "create").mockRejectedValueOnce(new DuplicateUserError("email"));

    const res = await request(app).post("/auth/register").send(ALICE);

    expect(res.status).toBe(400);
    expect(res.body.code).toBe("DUPLICATE_EMAIL");
  });

  it("honours is_admin when admin registration is allowed", async () => {
    const res = await request(app)
      .post("/auth/register")
      .send({ ...ALICE, is_admin: true });

    expect(res.status).toBe(201);
    expect(res.body.user.is_admin).toBe(true);
  });

  it("ignores is_admin when admin registration is disallowed", async () => {
    const locked = createTestContext({ ALLOW_ADMIN_REGISTRATION: false });

    const res = await request(createApp(locked))
      .post("/auth/register")
      .send({ ...ALICE, is_admin: true });

    expect(res.status).toBe(201);
    expect(res.body.user.is_admin).toBe(false);
    expect(locked.users.rows[0].is_admin).toBe(false);
  });

  it("returns a generic 500 without leaking the underlying error", async () => {
    vi.spyOn(ctx.users, "create").mockRejectedValueOnce(new Error("connection reset by peer"));

    const res = await request(app).post("/auth/register").send(ALICE);

    expect(res.status).toBe(500);
    expect(res.body.error).toBe("Internal server error");
    expect(res.body.code).toBe("INTERNAL_ERROR");
  });
});

// ---------------------------------------------------------------------------
// POST /auth/login
// ---------------------------------------------------------------------------

describe("POST /auth/login", () => {
  beforeEach(async () => {
    await request(app).post("/auth/register").send(ALICE);
  });

  it("logs in by email and returns a token for the user's id", async () => {
    const res = await request(app)
      .post("/auth/login")
      .send({ email: ALICE.email, password: ALICE.password });

    expect(res.status).toBe(200);
    expect(res.body.email).toBe("alice@example.com");
    expect(res.body.is_admin).toBe(false);
    expect(verifyAccessToken(res.body.token, "test-secret")).toEqual({ userId: 1 });
  });

  it("issues a token that expires one day after issue", async () => {
    const res = await request(app)
      .post("/auth/login")
      .send({ email: ALICE.email, password: ALICE.password });

    const payload = jwt.decode(res.body.token);
    expect(payload).not.toBeNull();
    if (payload === null || typeof payload === "string") {
      throw new Error("expected an object payload");
    }
    expect(payload.sub).toBe("1");
    expect(payload.exp).toBeDefined();
    expect(payload.iat).toBeDefined();
    expect((payload.exp ?? 0) - (payload.iat ?? 0)).toBe(86_400);
  });

  it("logs in by username", async () => {
    const res = await request(app)
      .post("/auth/login")
      .send({ username: "alice", password: ALICE.password });

    expect(res.status).toBe(200);
    expect(res.body.email).toBe("alice@example.com");
  });

  it("falls back to the email when the username matches nobody", async () => {
    const res = await request(app)
      .post("/auth/login")
      .send({ username: "nobody", email: ALICE.email, password: ALICE.password });

    expect(res.status).toBe(200);
  });

  it("sets the token as an HTTP-only cookie", async () => {
    const res = await request(app)
      .post("/auth/login")
      .send({ email: ALICE.email, password: ALICE.password });

    const cookies = res.headers["set-cookie"];
    const cookie = Array.isArray(cookies) ? cookies[0] : String(cookies);
    expect(cookie.startsWith(`access_token_cookie=${res.body.token};`)).toBe(true);
    expect(cookie).toContain("Max-Age=86400");
    expect(cookie).toContain("HttpOnly");
    expect(cookie).toContain("SameSite=Lax");
  });

  it("answers a wrong password and an unknown email identically", async () => {
    const wrongPassword = await request(app)
      .post("/auth/login")
      .send({ email: ALICE.email, password: "wrong-password" });
    const unknownUser = await request(app)
      .post("/auth/login")
      .send({ email: "ghost@example.com", password: ALICE.password });

    expect(wrongPassword.status).toBe(401);
    expect(unknownUser.status).toBe(401);
    expect(wrongPassword.body).toEqual({ error: "Invalid credentials", code: "INVALID_CREDENTIALS" });
    expect(unknownUser.body).toEqual(wrongPassword.body);
  });

  it("returns 400 when the password is missing", async () => {
    const res = await request(app).post("/auth/login").send({ email: ALICE.email });

    expect(res.status).toBe(400);
    expect(res.body.details).toEqual(
      expect.arrayContaining([expect.objectContaining({ field: "password" })])
    );
  });

  it("returns 400 when neither username nor email is given", async () => {
    const res = await request(app).post("/auth/login").send({ password: ALICE.password });

    expect(res.status).toBe(400);
    expect(res.body.details).toEqual([{ field: "username", message: "Username or email is required" }]);
  });
});

// ---------------------------------------------------------------------------
// Token lifetime
// ---------------------------------------------------------------------------

describe("token expiry", () => {
  const ISSUED_AT = new Date("2026-03-01T12:00:00Z").getTime();
  const ONE_DAY_MS = 24 * 60 * 60 * 1000;

  afterEach(() => {
    vi.useRealTimers();
  });

  it("accepts a token until one day after issue and rejects it afterwards", async () => {
    await request(app).post("/auth/register").send(ALICE);

    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(ISSUED_AT);
    const login = await request(app)
      .post("/auth/login")
      .send({ email: ALICE.email, password: ALICE.password });
    const auth = `Bearer ${login.body.token}`;

    vi.setSystemTime(ISSUED_AT + ONE_DAY_MS - 1000);
    const stillValid = await request(app)
      .post("/products")
      .set("Authorization", auth)
      .send({ name: "Fruit", price: 15.99 });
    expect(stillValid.status).toBe(201);

    vi.setSystemTime(ISSUED_AT + ONE_DAY_MS + 1000);
    const expired = await request(app)
      .post("/products")
      .set("Authorization", auth)
      .send({ name: "Fruit", price: 15.99 });
    expect(expired.status).toBe(401);
    expect(expired.body.code).toBe("INVALID_TOKEN");
  });
});

// ---------------------------------------------------------------------------
// GET /auth/me and GET /auth/is-admin
// ---------------------------------------------------------------------------

describe("current user endpoints", () => {
  async function tokenFor(body: Record<string, unknown>): Promise<string> {
    await request(app).post("/auth/register").send(body);
    const res = await request(app)
      .post("/auth/login")
      .send({ email: body.email, password: body.password });
    return res.body.token;
  }

  it("returns the current user without the password", async () => {
    const token = await tokenFor(ALICE);

    const res = await request(app).get("/auth/me").set("Authorization", `Bearer ${token}`);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      user: { id: 1, username: "alice", email: "alice@example.com", is_admin: false },
    });
  });

  it("returns 401 without an Authorization header", async () => {
    const res = await request(app).get("/auth/me");

    expect(res.status).toBe(401);
    expect(res.body.code).toBe("AUTH_REQUIRED");
  });

  it("returns 401 for a malformed Authorization header", async () => {
    const res = await request(app).get("/auth/me").set("Authorization", "NotBearer sometoken");

    expect(res.status).toBe(401);
    expect(res.body.code).toBe("AUTH_REQUIRED");
  });

  it("returns 404 once the account has been removed", async () => {
    const token = await tokenFor(ALICE);
    ctx.users.delete(1);

    const res = await request(app).get("/auth/me").set("Authorization", `Bearer ${token}`);

    expect(res.status).toBe(404);
    expect(res.body.code).toBe("USER_NOT_FOUND");
  });

  it("reports admin status", async () => {
    const userToken = await tokenFor(ALICE);
    const adminToken = await tokenFor({
      email: "admin@example.com",
      password: "admin-password",
      is_admin: true,
    });

    const asUser = await request(app).get("/auth/is-admin").set("Authorization", `Bearer ${userToken}`);
    const asAdmin = await request(app).get("/auth/is-admin").set("Authorization", `Bearer ${adminToken}`);

    expect(asUser.body).toEqual({ is_admin: false });
    expect(asAdmin.body).toEqual({ is_admin: true });
  });

  it("treats a removed admin account as not admin", async () => {
    const adminToken = await tokenFor({
      email: "admin@example.com",
      password: "admin-password",
      is_admin: true,
    });
    ctx.users.delete(1);

    const res = await request(app).get("/auth/is-admin").set("Authorization", `Bearer ${adminToken}`);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ is_admin: false });
  });
});
