/**
 * Admin Module
 * ============
 * User management for administrators
 */

export { AdminService, type UserStats } from "./admin.service.js";
export { createAdminRouter } from "./admin.routes.js";
export * from "./admin.schemas.js";
