/**
 * Global test setup
 * =================
 * Deterministic environment for every suite.
 *
 * IMPORTANT:
 * - Never put real secrets here.
 * - Tests use in-memory stores only; nothing touches a database or the network.
 */

process.env.NODE_ENV = "test";
process.env.APP_ENV = "test";

// Keep test output clean; suites that check logging inject their own logger.
process.env.LOG_LEVEL = "silent";

process.env.JWT_SECRET = "test-secret";
process.env.JWT_ISSUER = "collectibles-admin";
process.env.JWT_AUDIENCE = "collectibles-admin";

// Cheapest allowed scrypt cost so hashing does not dominate test time.
process.env.HASH_COST = "4";

process.env.STORE_DRIVER = "memory";
delete process.env.DATABASE_URL;
