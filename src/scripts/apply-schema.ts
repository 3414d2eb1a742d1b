/* eslint-disable no-console */
/**
 * Applies sql/schema.sql to DATABASE_URL.
 *
 *   npm run db:schema
 */

import "dotenv/config";

import { readFile } from "node:fs/promises";

import { loadAppConfig } from "../config/app-config.js";
import { createPool } from "../shared/postgres.js";

async function main() {
  const config = loadAppConfig({ ...process.env, STORE_DRIVER: "postgres" });
  const sql = await readFile(new URL("../../sql/schema.sql", import.meta.url), "utf8");

  const pool = createPool(config.database);
  try {
    await pool.query(sql);
    console.log("✅ Schema applied");
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  console.error("❌ Failed to apply schema:", error instanceof Error ? error.message : error);
  process.exit(1);
});
