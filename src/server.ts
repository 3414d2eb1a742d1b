/**
 * Server Entry Point
 * ==================
 * Loads configuration, builds the stores and starts the Express server.
 */

import "dotenv/config";

import type { Pool } from "pg";

import { createApp } from "./app.js";
import { type AppConfig, loadAppConfig } from "./config/app-config.js";
import { InMemoryUserStore, PostgresUserStore, type UserStore } from "./modules/auth/index.js";
import { InMemoryProductStore, PostgresProductStore, type ProductStore } from "./modules/products/index.js";
import { logger } from "./shared/logger.js";
import { createPool } from "./shared/postgres.js";

type Stores = {
  users: UserStore;
  products: ProductStore;
  pool: Pool | null;
};

function buildStores(config: Readonly<AppConfig>): Stores {
  if (config.database.driver === "memory") {
    logger.warn("Using in-memory stores: data is lost on restart");
    return { users: new InMemoryUserStore(), products: new InMemoryProductStore(), pool: null };
  }
  const pool = createPool(config.database);
  return { users: new PostgresUserStore(pool), products: new PostgresProductStore(pool), pool };
}

const config = loadAppConfig();
logger.setLevel(config.logLevel);

const stores = buildStores(config);
const app = createApp({ config, users: stores.users, products: stores.products });

const server = app.listen(config.port, () => {
  logger.info("Collectibles Admin API started", {
    url: `http://localhost:${config.port}`,
    env: config.env,
    store: config.database.driver,
    docs: `http://localhost:${config.port}/api-docs`,
  });
});

// Graceful shutdown
function shutdown(signal: string) {
  logger.info(`${signal} received, closing server...`);
  server.close(() => {
    const closePool = stores.pool ? stores.pool.end() : Promise.resolve();
    void closePool
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error("Error while closing the database pool", error instanceof Error ? error : { error: String(error) });
        process.exit(1);
      });
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

export default app;
