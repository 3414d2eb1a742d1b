import { decodeProtectedHeader, SignJWT } from "jose";
import { describe, expect, it } from "vitest";

import { issueToken, type TokenOptions, verifyToken } from "../src/shared/token-codec.js";

const SECRET = "test-secret";
const ISSUED_AT = new Date("2030-01-01T00:00:00Z");
const ISSUED_AT_SECONDS = 1_893_456_000;

const opts: TokenOptions = {
  issuer: "collectibles-admin",
  audience: "collectibles-admin",
  now: () => ISSUED_AT,
};

const subject = { subjectId: "user-1", username: "alice", role: "CUSTOMER" } as const;

function at(date: Date): TokenOptions {
  return { ...opts, now: () => date };
}

describe("issueToken", () => {
  it("returns the claims it signed", async () => {
    const { token, claims } = await issueToken(subject, SECRET, 3600, opts);

    expect(claims).toEqual({
      subjectId: "user-1",
      username: "alice",
      role: "CUSTOMER",
      issuedAt: ISSUED_AT_SECONDS,
      expiresAt: ISSUED_AT_SECONDS + 3600,
    });
    expect(decodeProtectedHeader(token)).toEqual({ alg: "HS256", typ: "JWT" });
  });

  it("treats a negative ttl as zero", async () => {
    const { claims } = await issueToken(subject, SECRET, -10, opts);
    expect(claims.expiresAt).toBe(claims.issuedAt);
  });
});

describe("verifyToken", () => {
  it("round-trips a fresh token", async () => {
    const { token, claims } = await issueToken(subject, SECRET, 3600, opts);

    const result = await verifyToken(token, SECRET, opts);

    expect(result).toEqual({ ok: true, value: claims });
  });

  it("reports a missing token", async () => {
    expect(await verifyToken("", SECRET, opts)).toEqual({ ok: false, error: "TokenMissing" });
    expect(await verifyToken("   ", SECRET, opts)).toEqual({ ok: false, error: "TokenMissing" });
    expect(await verifyToken(null, SECRET, opts)).toEqual({ ok: false, error: "TokenMissing" });
    expect(await verifyToken(undefined, SECRET, opts)).toEqual({ ok: false, error: "TokenMissing" });
  });

  it("reports tokens that are not compact JWS as malformed", async () => {
    for (const token of ["abc", "a.b", "a..c", "x.y.z", "eyJhbGciOiJub25lIn0.e30."]) {
      expect(await verifyToken(token, SECRET, opts)).toEqual({ ok: false, error: "TokenMalformed" });
    }
  });

  it("rejects a token signed with another secret", async () => {
    const { token } = await issueToken(subject, "other-secret", 3600, opts);

    expect(await verifyToken(token, SECRET, opts)).toEqual({
      ok: false,
      error: "TokenSignatureInvalid",
    });
  });

  it("rejects a token whose signature was altered", async () => {
    const { token } = await issueToken(subject, SECRET, 3600, opts);
    const [header, payload, signature] = token.split(".");
    const flipped = (signature.startsWith("A") ? "B" : "A") + signature.slice(1);

    expect(await verifyToken(`${header}.${payload}.${flipped}`, SECRET, opts)).toEqual({
      ok: false,
      error: "TokenSignatureInvalid",
    });
  });

  it("rejects a token whose payload was altered", async () => {
    const { token } = await issueToken(subject, SECRET, 3600, opts);
    const [header, payload, signature] = token.split(".");
    const original = Buffer.from(payload, "base64url").toString("utf8");
    const forged = Buffer.from(original.replace('"role":"CUSTOMER"', '"role":"ADMIN"')).toString("base64url");
    expect(forged).not.toBe(payload);

    expect(await verifyToken(`${header}.${forged}.${signature}`, SECRET, opts)).toEqual({
      ok: false,
      error: "TokenSignatureInvalid",
    });
  });

  it("reports a zero-ttl token as expired", async () => {
    const { token } = await issueToken(subject, SECRET, 0, opts);

    expect(await verifyToken(token, SECRET, opts)).toEqual({ ok: false, error: "TokenExpired" });
  });

  it("reports a token as expired once the clock passes exp", async () => {
    const { token } = await issueToken(subject, SECRET, 60, opts);

    const before = await verifyToken(token, SECRET, at(new Date(ISSUED_AT.getTime() + 59_000)));
    const after = await verifyToken(token, SECRET, at(new Date(ISSUED_AT.getTime() + 61_000)));

    expect(before.ok).toBe(true);
    expect(after).toEqual({ ok: false, error: "TokenExpired" });
  });

  it("rejects a token from another issuer", async () => {
    const { token } = await issueToken(subject, SECRET, 3600, { ...opts, issuer: "someone-else" });

    expect(await verifyToken(token, SECRET, opts)).toEqual({ ok: false, error: "TokenMalformed" });
  });

  it("rejects a correctly signed token with an unknown role", async () => {
    const token = await new SignJWT({ username: "mallory", role: "ROOT" })
      .setProtectedHeader({ alg: "HS256", typ: "JWT" })
      .setIssuer(opts.issuer)
      .setAudience(opts.audience)
      .setSubject("user-2")
      .setIssuedAt(ISSUED_AT_SECONDS)
      .setExpirationTime(ISSUED_AT_SECONDS + 3600)
      .sign(new TextEncoder().encode(SECRET));

    expect(await verifyToken(token, SECRET, opts)).toEqual({ ok: false, error: "TokenMalformed" });
  });

  it("rejects a correctly signed token without a subject", async () => {
    const token = await new SignJWT({ username: "mallory", role: "ADMIN" })
      .setProtectedHeader({ alg: "HS256", typ: "JWT" })
      .setIssuer(opts.issuer)
      .setAudience(opts.audience)
      .setIssuedAt(ISSUED_AT_SECONDS)
      .setExpirationTime(ISSUED_AT_SECONDS + 3600)
      .sign(new TextEncoder().encode(SECRET));

    expect(await verifyToken(token, SECRET, opts)).toEqual({ ok: false, error: "TokenMalformed" });
  });
});
