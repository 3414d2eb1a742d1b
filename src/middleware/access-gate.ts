/**
 * Access Gate
 * ===========
 * Per-request guards built on AuthService.
 *
 * - `requireAuth()`: valid `Authorization: Bearer <token>` for an existing,
 *   active user; the identity is attached to `req.auth`.
 * - `requireRole(role)` / `requireAnyRole(...roles)`: authenticated, and the
 *   stored role matches exactly / is in the set.
 * - `optionalAuth()`: attaches an identity when one is presented, never
 *   rejects for a missing or invalid token.
 *
 * Every token failure becomes the same 401. Store failures pass through as
 * errors (503), not as "unauthenticated".
 */

import type { Request, RequestHandler } from "express";

import type { AuthService } from "../modules/auth/auth.service.js";
import type { Identity } from "../modules/auth/auth.types.js";
import { getRequestAuth, setRequestAuth } from "../shared/auth-context.js";
import { AuthenticationError, AuthorizationError } from "../shared/errors.js";
import type { Role } from "../shared/roles.js";

export function extractBearerToken(value: unknown): string | null {
  if (typeof value !== "string") {return null;}
  const v = value.trim();
  if (!v) {return null;}
  const m = /^Bearer\s+(.+)$/i.exec(v);
  if (!m) {return null;}
  const token = m[1]?.trim();
  return token ? token : null;
}

type Authenticator = Pick<AuthService, "authenticate">;

export class AccessGate {
  constructor(private readonly auth: Authenticator) {}

  private async resolve(req: Request): Promise<Identity | null> {
    const token = extractBearerToken(req.headers.authorization);
    if (!token) {return null;}
    const result = await this.auth.authenticate(token);
    return result.ok ? result.value : null;
  }

  private guard(check: (identity: Identity) => boolean): RequestHandler {
    return (req, _res, next) => {
      setRequestAuth(req, undefined);
      void this.resolve(req)
        .then((identity) => {
          if (!identity) {return next(new AuthenticationError());}
          setRequestAuth(req, identity);
          if (!check(identity)) {return next(new AuthorizationError());}
          return next();
        })
        .catch(next);
    };
  }

  requireAuth(): RequestHandler {
    return this.guard(() => true);
  }

  requireRole(role: Role): RequestHandler {
    return this.guard((identity) => identity.role === role);
  }

  requireAnyRole(...roles: Role[]): RequestHandler {
    const allowed = new Set<Role>(roles);
    return this.guard((identity) => allowed.has(identity.role));
  }

  optionalAuth(): RequestHandler {
    return (req, _res, next) => {
      setRequestAuth(req, undefined);
      void this.resolve(req)
        .then((identity) => {
          if (identity) {setRequestAuth(req, identity);}
          next();
        })
        .catch(next);
    };
  }
}

/**
 * Identity attached by a gate; throws when the route was not gated.
 */
export function requireRequestIdentity(req: Request): Identity {
  const identity = getRequestAuth(req);
  if (!identity) {throw new AuthenticationError();}
  return identity;
}
