/**
 * Token Codec
 * ===========
 * HS256 JWTs carrying `sub`, `username`, `role`, `iat`, `exp` (+ `iss`/`aud`).
 *
 * `verifyToken` never throws for a bad token: it returns a typed failure so
 * callers decide how to answer. Expired and forged tokens are reported as
 * different failures; the HTTP layer collapses both into one 401.
 */

import { errors, jwtVerify, SignJWT } from "jose";

import { err, ok, type Result } from "./result.js";
import { isRole, type Role } from "./roles.js";

export type Claims = {
  subjectId: string;
  username: string;
  role: Role;
  /** Seconds since epoch. */
  issuedAt: number;
  /** Seconds since epoch. */
  expiresAt: number;
};

export type TokenFailure =
  | "TokenMissing"
  | "TokenMalformed"
  | "TokenExpired"
  | "TokenSignatureInvalid";

export type TokenOptions = {
  issuer: string;
  audience: string;
  /** Clock override (tests). */
  now?: () => Date;
};

export type IssuedToken = {
  token: string;
  claims: Claims;
};

function encodeSecret(secret: string): Uint8Array {
  return new TextEncoder().encode(secret);
}

function nowSeconds(opts: TokenOptions): number {
  const now = opts.now ? opts.now() : new Date();
  return Math.floor(now.getTime() / 1000);
}

export async function issueToken(
  subject: { subjectId: string; username: string; role: Role },
  secret: string,
  ttlSeconds: number,
  opts: TokenOptions
): Promise<IssuedToken> {
  const iat = nowSeconds(opts);
  const exp = iat + Math.max(0, Math.floor(ttlSeconds));

  const token = await new SignJWT({
    username: subject.username,
    role: subject.role,
  })
    .setProtectedHeader({ alg: "HS256", typ: "JWT" })
    .setIssuer(opts.issuer)
    .setAudience(opts.audience)
    .setSubject(subject.subjectId)
    .setIssuedAt(iat)
    .setExpirationTime(exp)
    .sign(encodeSecret(secret));

  return {
    token,
    claims: {
      subjectId: subject.subjectId,
      username: subject.username,
      role: subject.role,
      issuedAt: iat,
      expiresAt: exp,
    },
  };
}

function looksLikeCompactJws(token: string): boolean {
  const parts = token.split(".");
  return parts.length === 3 && parts.every((p) => p.length > 0);
}

function classifyVerifyError(error: unknown): TokenFailure {
  // JWTExpired extends JWTClaimValidationFailed, check it first.
  if (error instanceof errors.JWTExpired) {return "TokenExpired";}
  if (error instanceof errors.JWSSignatureVerificationFailed) {return "TokenSignatureInvalid";}
  return "TokenMalformed";
}

export async function verifyToken(
  token: string | null | undefined,
  secret: string,
  opts: TokenOptions
): Promise<Result<Claims, TokenFailure>> {
  const raw = typeof token === "string" ? token.trim() : "";
  if (!raw) {return err("TokenMissing");}
  if (!looksLikeCompactJws(raw)) {return err("TokenMalformed");}

  const currentDate = opts.now ? opts.now() : new Date();

  let payload: Awaited<ReturnType<typeof jwtVerify>>["payload"];
  try {
    const verified = await jwtVerify(raw, encodeSecret(secret), {
      algorithms: ["HS256"],
      issuer: opts.issuer,
      audience: opts.audience,
      currentDate,
      requiredClaims: ["sub", "iat", "exp"],
    });
    payload = verified.payload;
  } catch (error) {
    return err(classifyVerifyError(error));
  }

  const { sub, iat, exp } = payload;
  const username = payload.username;
  const role = payload.role;
  if (typeof sub !== "string" || !sub) {return err("TokenMalformed");}
  if (typeof username !== "string" || !username) {return err("TokenMalformed");}
  if (!isRole(role)) {return err("TokenMalformed");}
  if (typeof iat !== "number" || typeof exp !== "number") {return err("TokenMalformed");}

  // jose already rejects exp <= now; keep the check local too.
  if (exp <= Math.floor(currentDate.getTime() / 1000)) {return err("TokenExpired");}

  return ok({
    subjectId: sub,
    username,
    role,
    issuedAt: iat,
    expiresAt: exp,
  });
}
