import { describe, expect, it } from "vitest";

import { REDACTED, sanitizeForLogging, shouldRedactKey } from "../src/shared/log-sanitizer.js";

describe("sanitizeForLogging", () => {
  it("redacts credential keys at any depth", () => {
    expect(
      sanitizeForLogging({
        user: "alice",
        password: "Password123",
        nested: { accessToken: "abc", hash: "scrypt$1$16$8$1$c2FsdA$aGFzaA", role: "ADMIN" },
      })
    ).toEqual({
      user: "alice",
      password: REDACTED,
      nested: { accessToken: REDACTED, hash: REDACTED, role: "ADMIN" },
    });
  });

  it("redacts bearer headers, JWTs and digests inside text", () => {
    expect(sanitizeForLogging("Authorization: Bearer abc.def")).toBe("Authorization: Bearer [REDACTED]");
    expect(sanitizeForLogging("token eyJhbGciOiJIUzI1NiJ9.eyJzdWIiOiIxIn0.c2ln seen")).toBe(
      "token [REDACTED] seen"
    );
    expect(sanitizeForLogging("stored scrypt$1$16$8$1$c2FsdA$aGFzaA")).toBe("stored [REDACTED]");
  });

  it("bounds long strings and arrays", () => {
    const long = sanitizeForLogging("x".repeat(2005));
    const list = sanitizeForLogging(Array.from({ length: 52 }, (_, i) => i));

    expect(long).toBe(`${"x".repeat(2000)}…(truncated 5 chars)`);
    expect(Array.isArray(list) && list.length).toBe(51);
    expect(Array.isArray(list) && list[50]).toBe("…(2 more)");
  });

  it("renders dates and errors as plain values", () => {
    expect(sanitizeForLogging(new Date("2030-01-01T00:00:00Z"))).toBe("2030-01-01T00:00:00.000Z");
    expect(sanitizeForLogging(new RangeError("bad cost"))).toEqual({ name: "RangeError", message: "bad cost" });
  });
});

describe("shouldRedactKey", () => {
  it("matches credential-like keys only", () => {
    expect(shouldRedactKey("Authorization")).toBe(true);
    expect(shouldRedactKey("JWT_SECRET")).toBe(true);
    expect(shouldRedactKey("username")).toBe(false);
    expect(shouldRedactKey("hashCost")).toBe(false);
  });
});
