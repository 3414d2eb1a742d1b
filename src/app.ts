/**
 * Express Application Factory
 * ============================
 * Creates and configures the Express app with all routes and middleware.
 * Stores and configuration are passed in, so tests can wire in-memory stores.
 */

import cors from "cors";
import express from "express";
import swaggerUi from "swagger-ui-express";

import type { AppConfig } from "./config/app-config.js";
import { swaggerSpec } from "./config/swagger.js";
import { AccessGate } from "./middleware/access-gate.js";
import { createErrorHandler, notFoundHandler } from "./middleware/error-handler.js";
import { AdminService, createAdminRouter } from "./modules/admin/index.js";
import { AuthService, createAuthRouter, type UserStore } from "./modules/auth/index.js";
import { createProductsRouter, type ProductStore, ProductsService } from "./modules/products/index.js";
import { type AppLogger, logger as rootLogger } from "./shared/logger.js";
import { PasswordHasher } from "./shared/password.js";

export const SERVICE_NAME = "collectibles-admin-api";
export const SERVICE_VERSION = "1.0.0";

export type AppDeps = {
  config: Readonly<AppConfig>;
  users: UserStore;
  products: ProductStore;
  hasher?: PasswordHasher;
  logger?: AppLogger;
  /** Clock override (tests). */
  now?: () => Date;
};

export function createApp(deps: AppDeps) {
  const { config } = deps;
  const log = deps.logger ?? rootLogger;
  const hasher = deps.hasher ?? new PasswordHasher(config.auth.hashCost);

  const authService = new AuthService({
    users: deps.users,
    hasher,
    config: config.auth,
    logger: deps.logger,
    now: deps.now,
  });
  const gate = new AccessGate(authService);
  const adminService = new AdminService(deps.users, deps.logger);
  const productsService = new ProductsService(deps.products, deps.logger);

  const app = express();

  app.use(
    cors({
      origin: config.corsOrigins,
      credentials: true,
    })
  );
  app.use(express.json({ limit: "1mb" }));

  // Swagger UI
  app.use("/api-docs", swaggerUi.serve, swaggerUi.setup(swaggerSpec));
  app.get("/api-docs.json", (_req, res) => {
    res.json(swaggerSpec);
  });

  /**
   * @swagger
   * /health:
   *   get:
   *     summary: Health check
   *     tags: [Health]
   *     responses:
   *       200:
   *         description: Service is up
   */
  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      environment: config.env,
      store: config.database.driver,
    });
  });

  // Register module routes
  app.use("/api/auth", createAuthRouter({ authService, gate }));
  app.use("/api/admin", createAdminRouter({ adminService, gate }));
  app.use("/api/products", createProductsRouter({ productsService, gate }));

  // 404 + error handling (keep last)
  app.use(notFoundHandler);
  app.use(createErrorHandler(log));

  return app;
}
