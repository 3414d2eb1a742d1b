/**
 * Password Hasher
 * ===============
 * Salted scrypt digests with a configurable cost factor.
 *
 * Up to cost 15 the cost factor is log2 of scrypt's N (cost 10 -> N = 1024).
 * Above that N stays at 2^15, so one hash never needs more than 32 MiB, and
 * the extra cost doubles p instead, up to p = 16 at cost 19. Costs 19-31 all
 * produce the same work factor. Digests carry their own parameters, so raising
 * the cost later does not break existing hashes:
 *
 *   scrypt$1$N$r$p$salt$hash   (salt and hash are base64url)
 */

import { randomBytes, scrypt, timingSafeEqual } from "node:crypto";

import { InfrastructureError } from "./errors.js";

export const MIN_HASH_COST = 4;
export const MAX_HASH_COST = 31;
export const DEFAULT_HASH_COST = 10;

export type ScryptParams = {
  N: number;
  r: number;
  p: number;
  keylen: number;
};

const MAX_MEMORY_EXPONENT = 15;
const MAX_PARALLELISM_EXPONENT = 4;
const BLOCK_SIZE = 8;
const KEY_LENGTH = 64;
const SALT_BYTES = 16;

export function isValidHashCost(cost: number): boolean {
  return Number.isInteger(cost) && cost >= MIN_HASH_COST && cost <= MAX_HASH_COST;
}

export function scryptParamsForCost(cost: number): ScryptParams {
  const memoryExponent = Math.min(cost, MAX_MEMORY_EXPONENT);
  const parallelismExponent = Math.min(Math.max(cost - MAX_MEMORY_EXPONENT, 0), MAX_PARALLELISM_EXPONENT);
  return {
    N: 2 ** memoryExponent,
    r: BLOCK_SIZE,
    p: 2 ** parallelismExponent,
    keylen: KEY_LENGTH,
  };
}

function scryptAsync(password: string, salt: Buffer, params: ScryptParams): Promise<Buffer> {
  // Node refuses to run scrypt when 128 * N * r exceeds maxmem (32 MiB by default).
  const maxmem = Math.max(32 * 1024 * 1024, 256 * params.N * params.r);
  return new Promise((resolve, reject) => {
    scrypt(
      password,
      salt,
      params.keylen,
      { N: params.N, r: params.r, p: params.p, maxmem },
      (error, derivedKey) => {
        if (error) {return reject(error);}
        resolve(derivedKey);
      }
    );
  });
}

function isPowerOfTwo(n: number): boolean {
  return Number.isInteger(n) && n > 1 && (n & (n - 1)) === 0;
}

function parseDigest(encoded: string): {
  params: ScryptParams;
  salt: Buffer;
  hash: Buffer;
} | null {
  const parts = encoded.split("$");
  if (parts.length !== 7) {return null;}
  const [kind, version, Nraw, rraw, praw, saltB64, hashB64] = parts;
  if (kind !== "scrypt" || version !== "1") {return null;}

  const N = Number(Nraw);
  const r = Number(rraw);
  const p = Number(praw);
  if (!isPowerOfTwo(N) || N < 2 ** MIN_HASH_COST || N > 2 ** MAX_MEMORY_EXPONENT) {return null;}
  if (!Number.isInteger(r) || r < 1 || r > 32) {return null;}
  if (!Number.isInteger(p) || p < 1 || p > 2 ** MAX_PARALLELISM_EXPONENT) {return null;}

  const salt = Buffer.from(saltB64, "base64url");
  const hash = Buffer.from(hashB64, "base64url");
  if (salt.length < 8 || hash.length < 32) {return null;}

  return { params: { N, r, p, keylen: hash.length }, salt, hash };
}

export class PasswordHasher {
  readonly cost: number;
  readonly params: ScryptParams;

  /**
   * @param cost must already be within [4, 31] (configuration loading
   *   falls back to the default otherwise).
   */
  constructor(cost: number = DEFAULT_HASH_COST) {
    if (!isValidHashCost(cost)) {
      throw new RangeError(`Hash cost must be an integer in [${MIN_HASH_COST}, ${MAX_HASH_COST}]`);
    }
    this.cost = cost;
    this.params = scryptParamsForCost(cost);
  }

  /** Rejects with InfrastructureError when scrypt cannot run. */
  async hash(plaintext: string): Promise<string> {
    const params = this.params;
    const salt = randomBytes(SALT_BYTES);
    let derived: Buffer;
    try {
      derived = await scryptAsync(plaintext, salt, params);
    } catch (error) {
      throw new InfrastructureError("password.hash", error);
    }
    return `scrypt$1$${params.N}$${params.r}$${params.p}$${salt.toString("base64url")}$${derived.toString("base64url")}`;
  }

  /**
   * False for a wrong password and for any digest it cannot parse. A digest
   * that parses but cannot be recomputed rejects with InfrastructureError.
   */
  async verify(plaintext: string, digest: string): Promise<boolean> {
    if (typeof plaintext !== "string" || typeof digest !== "string") {return false;}
    const parsed = parseDigest(digest);
    if (!parsed) {return false;}

    let derived: Buffer;
    try {
      derived = await scryptAsync(plaintext, parsed.salt, parsed.params);
    } catch (error) {
      throw new InfrastructureError("password.verify", error);
    }

    if (derived.length !== parsed.hash.length) {return false;}
    return timingSafeEqual(derived, parsed.hash);
  }
}
