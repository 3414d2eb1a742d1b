/**
 * Auth Module
 * ===========
 * Registration, login and bearer-token authentication.
 */

// ═══════════════════════════════════════════════════════════════════════════
// PRESENTATION LAYER
// ═══════════════════════════════════════════════════════════════════════════

export { createAuthRouter, loginError, registrationError } from "./auth.routes.js";

// ═══════════════════════════════════════════════════════════════════════════
// ORCHESTRATION LAYER
// ═══════════════════════════════════════════════════════════════════════════

export { AuthService, toPublicIdentity } from "./auth.service.js";

// ═══════════════════════════════════════════════════════════════════════════
// DATA LAYER
// ═══════════════════════════════════════════════════════════════════════════

export { PostgresUserStore, type UserStore } from "./auth.repository.js";
export { InMemoryUserStore } from "./auth.repository.memory.js";

// ═══════════════════════════════════════════════════════════════════════════
// FOUNDATION LAYER
// ═══════════════════════════════════════════════════════════════════════════

export type * from "./auth.types.js";
export { validateLoginInput, validateRegisterInput } from "./auth.schemas.js";
