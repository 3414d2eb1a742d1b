/* eslint-disable no-console */
/**
 * Creates the first ADMIN account in the PostgreSQL store.
 *
 *   ADMIN_USERNAME=admin ADMIN_EMAIL=admin@example.com ADMIN_PASSWORD=... npm run seed:admin
 */

import "dotenv/config";

import { loadAppConfig } from "../config/app-config.js";
import { AuthService } from "../modules/auth/auth.service.js";
import { PostgresUserStore } from "../modules/auth/auth.repository.js";
import { PasswordHasher } from "../shared/password.js";
import { createPool } from "../shared/postgres.js";

function requireEnv(key: string): string {
  const value = (process.env[key] ?? "").trim();
  if (!value) {throw new Error(`${key} is required`);}
  return value;
}

async function main() {
  const config = loadAppConfig({ ...process.env, STORE_DRIVER: "postgres" });
  const pool = createPool(config.database);

  try {
    const authService = new AuthService({
      users: new PostgresUserStore(pool),
      hasher: new PasswordHasher(config.auth.hashCost),
      config: config.auth,
    });

    const result = await authService.register({
      username: requireEnv("ADMIN_USERNAME"),
      email: requireEnv("ADMIN_EMAIL"),
      password: requireEnv("ADMIN_PASSWORD"),
      role: "ADMIN",
    });

    if (!result.ok) {
      if (result.error.kind === "DuplicateIdentity") {
        console.log("ℹ️  Admin user already exists, nothing to do");
        return;
      }
      console.error("❌ Invalid admin data:", result.error.errors.map((e) => `${e.field}: ${e.message}`).join("; "));
      process.exitCode = 1;
      return;
    }

    console.log(`✅ Admin user created: ${result.value.identity.username} (${result.value.identity.id})`);
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  console.error("❌ Seeding failed:", error instanceof Error ? error.message : error);
  process.exit(1);
});
