import request from "supertest";
import { beforeEach, describe, expect, it } from "vitest";

import type { Identity } from "../src/modules/auth/auth.types.js";
import { makeTestContext, type TestContext } from "./test-app.js";
import { loginToken, seedAndLogin, seedUser, TEST_PASSWORD } from "./test-auth.js";

describe("Admin routes", () => {
  let ctx: TestContext;
  let adminToken: string;
  let moderatorToken: string;
  let customer: Identity;
  let customerToken: string;

  beforeEach(async () => {
    ctx = makeTestContext();
    adminToken = (await seedAndLogin(ctx, "root", "ADMIN")).token;
    moderatorToken = (await seedAndLogin(ctx, "mod", "MODERATOR")).token;
    ({ identity: customer, token: customerToken } = await seedAndLogin(ctx, "alice", "CUSTOMER"));
    await seedUser(ctx, { username: "sleepy", role: "CUSTOMER", isActive: false });
  });

  function asAdmin(req: request.Test) {
    return req.set("Authorization", `Bearer ${adminToken}`);
  }

  describe("GET /api/admin/users", () => {
    it("lists every user for an admin", async () => {
      const res = await asAdmin(request(ctx.app).get("/api/admin/users"));

      expect(res.status).toBe(200);
      expect(res.body.data.count).toBe(4);
      expect(res.body.data.users.map((u: { username: string }) => u.username)).toEqual([
        "root",
        "mod",
        "alice",
        "sleepy",
      ]);
    });

    it("filters by role and active flag", async () => {
      const customers = await asAdmin(request(ctx.app).get("/api/admin/users?role=customer"));
      const inactive = await asAdmin(request(ctx.app).get("/api/admin/users?active=false"));
      const activeCustomers = await asAdmin(request(ctx.app).get("/api/admin/users?role=CUSTOMER&active=true"));

      expect(customers.body.data.count).toBe(2);
      expect(inactive.body.data.users.map((u: { username: string }) => u.username)).toEqual(["sleepy"]);
      expect(activeCustomers.body.data.users.map((u: { username: string }) => u.username)).toEqual(["alice"]);
    });

    it("rejects an unknown role or flag", async () => {
      const role = await asAdmin(request(ctx.app).get("/api/admin/users?role=ROOT"));
      const flag = await asAdmin(request(ctx.app).get("/api/admin/users?active=yes"));

      expect(role.status).toBe(400);
      expect(role.body.message).toBe("Invalid user list query: Role must be one of ADMIN, CUSTOMER, MODERATOR");
      expect(flag.status).toBe(400);
      expect(flag.body.code).toBe("VALIDATION_ERROR");
    });

    it("is closed to moderators and anonymous callers", async () => {
      const moderator = await request(ctx.app).get("/api/admin/users").set("Authorization", `Bearer ${moderatorToken}`);
      const anonymous = await request(ctx.app).get("/api/admin/users");

      expect(moderator.status).toBe(403);
      expect(anonymous.status).toBe(401);
    });
  });

  describe("GET /api/admin/users/:id", () => {
    it("is open to admins and moderators", async () => {
      const moderator = await request(ctx.app)
        .get(`/api/admin/users/${customer.id}`)
        .set("Authorization", `Bearer ${moderatorToken}`);
      const admin = await asAdmin(request(ctx.app).get(`/api/admin/users/${customer.id}`));

      expect(moderator.status).toBe(200);
      expect(moderator.body.data.user.username).toBe("alice");
      expect(admin.body.data.user.id).toBe(customer.id);
    });

    it("is closed to customers", async () => {
      const res = await request(ctx.app)
        .get(`/api/admin/users/${customer.id}`)
        .set("Authorization", `Bearer ${customerToken}`);

      expect(res.status).toBe(403);
    });

    it("returns 404 for an unknown id and 400 for a malformed one", async () => {
      const missing = await asAdmin(request(ctx.app).get("/api/admin/users/missing"));
      const malformed = await asAdmin(request(ctx.app).get("/api/admin/users/bad.id"));

      expect(missing.status).toBe(404);
      expect(missing.body.message).toBe("User with ID 'missing' not found");
      expect(malformed.status).toBe(400);
      expect(malformed.body.message).toBe("Invalid user id: Invalid user id");
    });
  });

  describe("PATCH /api/admin/users/:id/status", () => {
    it("deactivates a user, which locks them out", async () => {
      const res = await asAdmin(
        request(ctx.app).patch(`/api/admin/users/${customer.id}/status`).send({ is_active: false })
      );

      expect(res.status).toBe(200);
      expect(res.body.data.user.is_active).toBe(false);

      const me = await request(ctx.app).get("/api/auth/me").set("Authorization", `Bearer ${customerToken}`);
      const login = await request(ctx.app)
        .post("/api/auth/login")
        .send({ usernameOrEmail: "alice", password: TEST_PASSWORD });

      expect(me.status).toBe(401);
      expect(login.body.code).toBe("ACCOUNT_INACTIVE");
    });

    it("reactivates a user", async () => {
      const sleepy = await ctx.users.findWithCredentialByUsername("sleepy");
      const id = sleepy?.identity.id ?? "";

      const res = await asAdmin(request(ctx.app).patch(`/api/admin/users/${id}/status`).send({ is_active: true }));

      expect(res.body.data.user.is_active).toBe(true);
      expect(await loginToken(ctx, "sleepy")).toEqual(expect.any(String));
    });

    it("validates the body and the target", async () => {
      const badBody = await asAdmin(
        request(ctx.app).patch(`/api/admin/users/${customer.id}/status`).send({ is_active: "no" })
      );
      const missing = await asAdmin(request(ctx.app).patch("/api/admin/users/missing/status").send({ is_active: true }));

      expect(badBody.status).toBe(400);
      expect(missing.status).toBe(404);
    });

    it("is admin-only", async () => {
      const res = await request(ctx.app)
        .patch(`/api/admin/users/${customer.id}/status`)
        .set("Authorization", `Bearer ${moderatorToken}`)
        .send({ is_active: false });

      expect(res.status).toBe(403);
      expect((await ctx.users.findById(customer.id))?.isActive).toBe(true);
    });
  });

  describe("PATCH /api/admin/users/:id/role", () => {
    it("changes the role, effective on the user's next request", async () => {
      const res = await asAdmin(
        request(ctx.app).patch(`/api/admin/users/${customer.id}/role`).send({ role: "moderator" })
      );

      expect(res.status).toBe(200);
      expect(res.body.data.user.role).toBe("MODERATOR");
      expect(res.body.data.user.role_display_name).toBe("Moderator");

      const promoted = await request(ctx.app)
        .get(`/api/admin/users/${customer.id}`)
        .set("Authorization", `Bearer ${customerToken}`);
      expect(promoted.status).toBe(200);
    });

    it("rejects an unknown role", async () => {
      const res = await asAdmin(request(ctx.app).patch(`/api/admin/users/${customer.id}/role`).send({ role: "OWNER" }));

      expect(res.status).toBe(400);
      expect(res.body.message).toBe("Invalid role update: Role must be one of ADMIN, CUSTOMER, MODERATOR");
    });
  });

  describe("GET /api/admin/users/stats", () => {
    it("counts users by status and role", async () => {
      const res = await asAdmin(request(ctx.app).get("/api/admin/users/stats"));

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        success: true,
        data: {
          total_users: 4,
          active_users: 3,
          inactive_users: 1,
          by_role: { ADMIN: 1, CUSTOMER: 2, MODERATOR: 1 },
        },
      });
    });

    it("follows status changes", async () => {
      await asAdmin(request(ctx.app).patch(`/api/admin/users/${customer.id}/status`)).send({ is_active: false });

      const res = await asAdmin(request(ctx.app).get("/api/admin/users/stats"));

      expect(res.body.data.active_users).toBe(2);
      expect(res.body.data.inactive_users).toBe(2);
    });

    it("is limited to admins", async () => {
      const moderator = await request(ctx.app)
        .get("/api/admin/users/stats")
        .set("Authorization", `Bearer ${moderatorToken}`);
      const anonymous = await request(ctx.app).get("/api/admin/users/stats");

      expect(moderator.status).toBe(403);
      expect(anonymous.status).toBe(401);
    });
  });
});
