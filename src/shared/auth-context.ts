import type { Identity } from "../modules/auth/auth.types.js";

/**
 * Accessors for the authenticated identity on Express `req`, set by the
 * access gate for the lifetime of one request.
 */
export function getRequestAuth(req: { auth?: Identity }): Identity | undefined {
  return req.auth;
}

export function setRequestAuth(req: { auth?: Identity }, identity: Identity | undefined): void {
  req.auth = identity;
}
