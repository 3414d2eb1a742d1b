import request from "supertest";
import { beforeEach, describe, expect, it } from "vitest";

import { makeTestContext, type TestContext } from "./test-app.js";
import { loginToken, seedAndLogin, seedUser, TEST_PASSWORD } from "./test-auth.js";

const PUBLIC_IDENTITY_KEYS = [
  "created_at",
  "email",
  "first_name",
  "id",
  "is_active",
  "last_name",
  "role",
  "role_display_name",
  "updated_at",
  "username",
];

function bearer(token: string) {
  return `Bearer ${token}`;
}

describe("Auth routes", () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = makeTestContext();
  });

  it("registers, logs in and is kept out of admin routes", async () => {
    const registered = await request(ctx.app)
      .post("/api/auth/register")
      .send({ username: "alice", email: "alice@x.com", password: "Secret123" });

    expect(registered.status).toBe(201);
    expect(registered.body.success).toBe(true);
    expect(registered.body.data).toEqual({
      token: expect.any(String),
      token_type: "Bearer",
      expires_in: 86_400,
      user: expect.objectContaining({
        username: "alice",
        email: "alice@x.com",
        first_name: null,
        last_name: null,
        role: "CUSTOMER",
        role_display_name: "Customer",
        is_active: true,
      }),
    });

    const login = await request(ctx.app)
      .post("/api/auth/login")
      .send({ usernameOrEmail: "alice", password: "Secret123" });

    expect(login.status).toBe(200);
    expect(Object.keys(login.body.data.user).sort()).toEqual(PUBLIC_IDENTITY_KEYS);
    expect(login.body.data.user.id).toBe(registered.body.data.user.id);

    const admin = await request(ctx.app).get("/api/admin/users").set("Authorization", bearer(login.body.data.token));

    expect(admin.status).toBe(403);
    expect(admin.body.code).toBe("INSUFFICIENT_PERMISSIONS");

    const duplicate = await request(ctx.app)
      .post("/api/auth/register")
      .send({ username: "alice", email: "alice2@x.com", password: "Secret123" });

    expect(duplicate.status).toBe(409);
    expect(duplicate.body).toEqual({
      code: "DUPLICATE_IDENTITY",
      message: "Username or email already exists",
      statusCode: 409,
      details: null,
      timestamp: expect.any(String),
    });
  });

  it("logs in with the email address", async () => {
    await seedUser(ctx, { username: "bob", email: "bob@example.com" });

    const res = await request(ctx.app)
      .post("/api/auth/login")
      .send({ usernameOrEmail: "Bob@Example.com", password: TEST_PASSWORD });

    expect(res.status).toBe(200);
    expect(res.body.data.user.username).toBe("bob");
  });

  it("GET /me returns the caller", async () => {
    const { token } = await seedAndLogin(ctx, "carol", "MODERATOR");

    const res = await request(ctx.app).get("/api/auth/me").set("Authorization", bearer(token));

    expect(res.status).toBe(200);
    expect(res.body.data.user).toEqual(
      expect.objectContaining({ username: "carol", role: "MODERATOR", role_display_name: "Moderator" })
    );
  });

  it("GET /me rejects a missing or forged token", async () => {
    const missing = await request(ctx.app).get("/api/auth/me");
    const forged = await request(ctx.app).get("/api/auth/me").set("Authorization", "Bearer a.b.c");

    expect(missing.status).toBe(401);
    expect(forged.status).toBe(401);
    expect(forged.body.message).toBe(missing.body.message);
    expect(forged.body.code).toBe("AUTHENTICATION_REQUIRED");
  });

  it("answers an unknown user and a wrong password identically", async () => {
    await seedUser(ctx, { username: "dave" });

    const unknown = await request(ctx.app)
      .post("/api/auth/login")
      .send({ usernameOrEmail: "nobody", password: TEST_PASSWORD });
    const wrong = await request(ctx.app)
      .post("/api/auth/login")
      .send({ usernameOrEmail: "dave", password: "Password999" });

    const expected = {
      code: "INVALID_CREDENTIALS",
      message: "Invalid username/email or password",
      statusCode: 401,
      details: null,
      timestamp: expect.any(String),
    };
    expect(unknown.status).toBe(401);
    expect(unknown.body).toEqual(expected);
    expect(wrong.status).toBe(401);
    expect(wrong.body).toEqual(expected);
  });

  it("refuses login for an inactive account", async () => {
    await seedUser(ctx, { username: "erin", isActive: false });

    const res = await request(ctx.app)
      .post("/api/auth/login")
      .send({ usernameOrEmail: "erin", password: TEST_PASSWORD });

    expect(res.status).toBe(401);
    expect(res.body.code).toBe("ACCOUNT_INACTIVE");
    expect(res.body.message).toBe("Account is inactive");
  });

  it("stops honouring a token once the account is deactivated", async () => {
    const { identity, token } = await seedAndLogin(ctx, "frank", "CUSTOMER");
    await ctx.users.setActive(identity.id, false);

    const res = await request(ctx.app).get("/api/auth/me").set("Authorization", bearer(token));

    expect(res.status).toBe(401);
    expect(res.body.code).toBe("AUTHENTICATION_REQUIRED");
  });

  it("applies a role change to an existing token", async () => {
    const { identity, token } = await seedAndLogin(ctx, "grace", "CUSTOMER");
    await ctx.users.setRole(identity.id, "ADMIN");

    const res = await request(ctx.app).get("/api/admin/users").set("Authorization", bearer(token));

    expect(res.status).toBe(200);
  });

  describe("role assignment on registration", () => {
    const body = { username: "henry", email: "henry@example.com", password: "Password123" };

    it("refuses privileged roles for anonymous callers", async () => {
      const res = await request(ctx.app).post("/api/auth/register").send({ ...body, role: "ADMIN" });

      expect(res.status).toBe(403);
      expect(res.body.code).toBe("INSUFFICIENT_PERMISSIONS");
      expect(res.body.message).toBe("Only administrators can assign this role");
      expect(await ctx.users.existsByUsername("henry")).toBe(false);
    });

    it("refuses privileged roles for non-admin callers", async () => {
      const { token } = await seedAndLogin(ctx, "mod", "MODERATOR");

      const res = await request(ctx.app)
        .post("/api/auth/register")
        .set("Authorization", bearer(token))
        .send({ ...body, role: "MODERATOR" });

      expect(res.status).toBe(403);
    });

    it("lets an admin assign a role", async () => {
      const { token } = await seedAndLogin(ctx, "root", "ADMIN");

      const res = await request(ctx.app)
        .post("/api/auth/register")
        .set("Authorization", bearer(token))
        .send({ ...body, role: "moderator" });

      expect(res.status).toBe(201);
      expect(res.body.data.user.role).toBe("MODERATOR");
    });

    it("accepts an explicit customer role from anyone", async () => {
      const res = await request(ctx.app).post("/api/auth/register").send({ ...body, role: "customer" });

      expect(res.status).toBe(201);
      expect(res.body.data.user.role).toBe("CUSTOMER");
    });
  });

  describe("validation", () => {
    it("reports the invalid fields", async () => {
      const res = await request(ctx.app)
        .post("/api/auth/register")
        .send({ username: "bad name", email: "ivy@example.com", password: "Password123" });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        code: "VALIDATION_ERROR",
        message: "Invalid registration input",
        statusCode: 400,
        details: [{ field: "username", message: "Username must be 1-50 characters: letters, digits, '_' or '-'" }],
        timestamp: expect.any(String),
      });
    });

    it("rejects a body with missing fields or an unknown role", async () => {
      const missing = await request(ctx.app).post("/api/auth/register").send({});
      const badRole = await request(ctx.app)
        .post("/api/auth/register")
        .send({ username: "ivy", email: "ivy@example.com", password: "Password123", role: "ROOT" });

      expect(missing.status).toBe(400);
      expect(missing.body.message).toBe("Invalid registration input");
      expect(badRole.status).toBe(400);
      expect(badRole.body.code).toBe("VALIDATION_ERROR");
    });

    it("rejects a login without credentials", async () => {
      const res = await request(ctx.app).post("/api/auth/login").send({ usernameOrEmail: "  " });

      expect(res.status).toBe(400);
      expect(res.body.message).toBe("Username/email and password are required");
    });
  });

  it("POST /logout acknowledges", async () => {
    const res = await request(ctx.app).post("/api/auth/logout");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ success: true, data: { logged_out: true } });
  });

  it("issues tokens that authenticate", async () => {
    await seedUser(ctx, { username: "judy" });
    const token = await loginToken(ctx, "judy");

    const res = await request(ctx.app).get("/api/auth/me").set("Authorization", bearer(token));

    expect(res.body.data.user.username).toBe("judy");
  });
});
