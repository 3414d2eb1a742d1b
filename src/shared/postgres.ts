/**
 * PostgreSQL Pool
 * ===============
 * One pool per process, sized and timed out from configuration.
 */

import pg from "pg";
import type { Pool } from "pg";

import type { DatabaseConfig } from "../config/app-config.js";
import { ConfigurationError } from "./errors.js";
import { logger } from "./logger.js";

export function createPool(config: DatabaseConfig): Pool {
  if (!config.url) {throw new ConfigurationError("DATABASE_URL is required for the postgres store");}

  const pool = new pg.Pool({
    connectionString: config.url,
    max: config.maxConnections,
    connectionTimeoutMillis: config.connectionTimeoutMs,
  });

  // Idle client errors would otherwise crash the process.
  pool.on("error", (error) => {
    logger.error("PostgreSQL pool error", error);
  });

  return pool;
}
