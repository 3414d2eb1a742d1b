/**
 * Application Configuration
 * =========================
 * Reads the environment once at startup and returns a frozen config object.
 * Components receive the parts they need; nothing re-reads `process.env`
 * per request.
 */

import { createHash } from "node:crypto";
import { hostname, userInfo } from "node:os";

import { ConfigurationError } from "../shared/errors.js";
import { type AppLogger, logger, type LogLevel, readLogLevel } from "../shared/logger.js";
import { DEFAULT_HASH_COST, isValidHashCost, MAX_HASH_COST, MIN_HASH_COST } from "../shared/password.js";

export type StoreDriver = "memory" | "postgres";

export type AuthConfig = {
  secret: string;
  /** "derived" means the development fallback secret is in use. */
  secretSource: "env" | "derived";
  tokenTtlHours: number;
  tokenTtlSeconds: number;
  hashCost: number;
  issuer: string;
  audience: string;
};

export type DatabaseConfig = {
  driver: StoreDriver;
  url: string | null;
  maxConnections: number;
  connectionTimeoutMs: number;
};

export type AppConfig = {
  env: string;
  isProduction: boolean;
  port: number;
  logLevel: LogLevel;
  corsOrigins: string[];
  auth: AuthConfig;
  database: DatabaseConfig;
};

type Env = Record<string, string | undefined>;

export const DEFAULT_TOKEN_TTL_HOURS = 24;
const DEFAULT_ISSUER = "collectibles-admin";
const DEFAULT_CORS_ORIGINS = ["http://localhost:3000", "http://localhost:5173"];
const DEV_SECRET_LABEL = "collectibles-admin-dev-secret";

function envString(env: Env, key: string): string | undefined {
  const raw = env[key];
  const trimmed = typeof raw === "string" ? raw.trim() : "";
  return trimmed.length > 0 ? trimmed : undefined;
}

function envInt(env: Env, key: string, fallback: number): number {
  const raw = envString(env, key);
  if (!raw) {return fallback;}
  const v = Number(raw);
  return Number.isFinite(v) && v > 0 ? Math.floor(v) : fallback;
}

/** Development and test are the only environments allowed to run without a secret. */
export function isLocalEnvironment(envName: string): boolean {
  return envName === "development" || envName === "test";
}

/**
 * Deterministic, non-secret fallback: anyone on the same machine can
 * recompute it.
 */
export function deriveDevelopmentSecret(): string {
  let user: string;
  try {
    user = userInfo().username;
  } catch {
    user = process.env.USER || process.env.USERNAME || "dev";
  }
  return createHash("sha256")
    .update(`${user}:${hostname()}:${process.version}:${DEV_SECRET_LABEL}`)
    .digest("hex");
}

function resolveSecret(
  env: Env,
  envName: string,
  log: AppLogger
): { secret: string; source: AuthConfig["secretSource"] } {
  const explicit = envString(env, "JWT_SECRET");
  if (explicit) {return { secret: explicit, source: "env" };}

  if (!isLocalEnvironment(envName)) {
    throw new ConfigurationError(`JWT_SECRET is required when APP_ENV is "${envName}"`);
  }

  log.warn(
    "JWT_SECRET is not set: using a derived development secret. Tokens signed with it are NOT secure and this must never run in production.",
    { env: envName }
  );
  return { secret: deriveDevelopmentSecret(), source: "derived" };
}

function resolveTtlHours(env: Env, log: AppLogger): number {
  const raw = envString(env, "JWT_EXPIRATION_HOURS");
  if (!raw) {return DEFAULT_TOKEN_TTL_HOURS;}
  const hours = Number(raw);
  if (!Number.isInteger(hours) || hours <= 0) {
    log.warn("Invalid JWT_EXPIRATION_HOURS, using default", {
      value: raw,
      default: DEFAULT_TOKEN_TTL_HOURS,
    });
    return DEFAULT_TOKEN_TTL_HOURS;
  }
  return hours;
}

/**
 * `HASH_COST`, or the legacy `BCRYPT_ROUNDS`. Out-of-range values are logged
 * and replaced by the default rather than failing startup.
 */
export function resolveHashCost(env: Env, log: AppLogger): number {
  const key = envString(env, "HASH_COST") ? "HASH_COST" : "BCRYPT_ROUNDS";
  const raw = envString(env, key);
  if (!raw) {return DEFAULT_HASH_COST;}
  const cost = Number(raw);
  if (!isValidHashCost(cost)) {
    log.warn(`Invalid ${key}, using default`, {
      value: raw,
      min: MIN_HASH_COST,
      max: MAX_HASH_COST,
      default: DEFAULT_HASH_COST,
    });
    return DEFAULT_HASH_COST;
  }
  return cost;
}

function resolveDriver(env: Env, envName: string): StoreDriver {
  const raw = (envString(env, "STORE_DRIVER") || "").toLowerCase();
  if (raw === "memory" || raw === "postgres") {return raw;}
  if (raw) {
    throw new ConfigurationError(`STORE_DRIVER must be "memory" or "postgres" (got "${raw}")`);
  }
  return isLocalEnvironment(envName) ? "memory" : "postgres";
}

function parseOrigins(raw: string | undefined): string[] {
  if (!raw) {return [...DEFAULT_CORS_ORIGINS];}
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const values: unknown[] = Object.values(value);
  for (const v of values) {
    if (typeof v === "object" && v !== null && !Object.isFrozen(v)) {deepFreeze(v);}
  }
  return Object.freeze(value);
}

export function loadAppConfig(env: Env = process.env, log: AppLogger = logger): Readonly<AppConfig> {
  const envName = (envString(env, "APP_ENV") || envString(env, "NODE_ENV") || "development").toLowerCase();

  const { secret, source } = resolveSecret(env, envName, log);
  const tokenTtlHours = resolveTtlHours(env, log);
  const driver = resolveDriver(env, envName);
  const url = envString(env, "DATABASE_URL") ?? null;
  if (driver === "postgres" && !url) {
    throw new ConfigurationError("DATABASE_URL is required when STORE_DRIVER is postgres");
  }

  return deepFreeze({
    env: envName,
    isProduction: !isLocalEnvironment(envName),
    port: envInt(env, "PORT", 4567),
    logLevel: readLogLevel(envString(env, "LOG_LEVEL"), envName === "development" ? "debug" : "info"),
    corsOrigins: parseOrigins(envString(env, "CORS_ORIGINS")),
    auth: {
      secret,
      secretSource: source,
      tokenTtlHours,
      tokenTtlSeconds: tokenTtlHours * 60 * 60,
      hashCost: resolveHashCost(env, log),
      issuer: envString(env, "JWT_ISSUER") || DEFAULT_ISSUER,
      audience: envString(env, "JWT_AUDIENCE") || DEFAULT_ISSUER,
    },
    database: {
      driver,
      url,
      maxConnections: envInt(env, "DB_MAX_CONNECTIONS", 3),
      connectionTimeoutMs: envInt(env, "DB_CONNECTION_TIMEOUT", 30_000),
    },
  });
}
