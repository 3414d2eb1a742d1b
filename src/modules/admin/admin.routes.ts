/**
 * Admin Routes
 * ============
 * User management, gated by role.
 */

import { type Request, type Response, Router } from "express";

import { type AccessGate, requireRequestIdentity } from "../../middleware/access-gate.js";
import { asyncHandler } from "../../middleware/async-handler.js";
import { ok } from "../../shared/http.js";
import { toPublicIdentity } from "../auth/auth.service.js";
import {
  validateListUsersQuery,
  validateUpdateUserRoleInput,
  validateUpdateUserStatusInput,
  validateUserId,
} from "./admin.schemas.js";
import type { AdminService } from "./admin.service.js";

export type AdminRouterDeps = {
  adminService: AdminService;
  gate: AccessGate;
};

export function createAdminRouter({ adminService, gate }: AdminRouterDeps): Router {
  const router = Router();

  /**
   * @swagger
   * /api/admin/users:
   *   get:
   *     summary: List users
   *     tags: [Admin]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: query
   *         name: role
   *         schema:
   *           type: string
   *           enum: [ADMIN, CUSTOMER, MODERATOR]
   *       - in: query
   *         name: active
   *         schema:
   *           type: boolean
   *     responses:
   *       200:
   *         description: Users
   *       403:
   *         description: ADMIN role required
   */
  router.get(
    "/users",
    gate.requireRole("ADMIN"),
    asyncHandler(async (req: Request, res: Response) => {
      const query = validateListUsersQuery(req.query);
      const users = await adminService.listUsers(query);
      return ok(res, { users: users.map(toPublicIdentity), count: users.length });
    })
  );

  /**
   * @swagger
   * /api/admin/users/stats:
   *   get:
   *     summary: Count users by status and role
   *     tags: [Admin]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: User counts
   *       403:
   *         description: ADMIN role required
   */
  router.get(
    "/users/stats",
    gate.requireRole("ADMIN"),
    asyncHandler(async (_req: Request, res: Response) => {
      const stats = await adminService.userStats();
      return ok(res, {
        total_users: stats.total,
        active_users: stats.active,
        inactive_users: stats.inactive,
        by_role: stats.byRole,
      });
    })
  );

  /**
   * @swagger
   * /api/admin/users/{id}:
   *   get:
   *     summary: Get a user
   *     tags: [Admin]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: The user
   *       404:
   *         description: Not found
   */
  router.get(
    "/users/:id",
    gate.requireAnyRole("ADMIN", "MODERATOR"),
    asyncHandler(async (req: Request, res: Response) => {
      const id = validateUserId(req.params.id);
      const user = await adminService.getUser(id);
      return ok(res, { user: toPublicIdentity(user) });
    })
  );

  /**
   * @swagger
   * /api/admin/users/{id}/status:
   *   patch:
   *     summary: Activate or deactivate a user
   *     tags: [Admin]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [is_active]
   *             properties:
   *               is_active:
   *                 type: boolean
   *     responses:
   *       200:
   *         description: Updated user
   */
  router.patch(
    "/users/:id/status",
    gate.requireRole("ADMIN"),
    asyncHandler(async (req: Request, res: Response) => {
      const id = validateUserId(req.params.id);
      const input = validateUpdateUserStatusInput(req.body);
      const user = await adminService.setUserActive(id, input.is_active, requireRequestIdentity(req));
      return ok(res, { user: toPublicIdentity(user) });
    })
  );

  /**
   * @swagger
   * /api/admin/users/{id}/role:
   *   patch:
   *     summary: Change a user's role
   *     tags: [Admin]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [role]
   *             properties:
   *               role:
   *                 type: string
   *                 enum: [ADMIN, CUSTOMER, MODERATOR]
   *     responses:
   *       200:
   *         description: Updated user
   */
  router.patch(
    "/users/:id/role",
    gate.requireRole("ADMIN"),
    asyncHandler(async (req: Request, res: Response) => {
      const id = validateUserId(req.params.id);
      const input = validateUpdateUserRoleInput(req.body);
      const user = await adminService.setUserRole(id, input.role, requireRequestIdentity(req));
      return ok(res, { user: toPublicIdentity(user) });
    })
  );

  return router;
}
