/**
 * Auth Service
 * ============
 * Registration, login and token validation against a user store.
 *
 * Expected outcomes (bad input, duplicates, wrong password, stale or forged
 * tokens) come back as `Result` failures. Store failures surface as
 * `InfrastructureError` and are never reported as "unauthenticated".
 */

import { randomBytes } from "node:crypto";

import type { AuthConfig } from "../../config/app-config.js";
import { DuplicateIdentityError, infrastructureCall } from "../../shared/errors.js";
import { containsInjection, findInjection, validateField, validateStrict } from "../../shared/input-guard.js";
import { type AppLogger, logger as rootLogger } from "../../shared/logger.js";
import type { PasswordHasher } from "../../shared/password.js";
import { err, ok, type Result } from "../../shared/result.js";
import { DEFAULT_ROLE, ROLE_DISPLAY_NAMES } from "../../shared/roles.js";
import { issueToken, verifyToken } from "../../shared/token-codec.js";
import type { UserStore } from "./auth.repository.js";
import type {
  AuthenticationFailure,
  AuthSession,
  FieldError,
  Identity,
  LoginFailure,
  PublicIdentity,
  RegisterInput,
  RegistrationFailure,
  UserWithCredential,
} from "./auth.types.js";

export const MIN_PASSWORD_LENGTH = 6;
export const MAX_PASSWORD_LENGTH = 200;

export type AuthServiceDeps = {
  users: UserStore;
  hasher: PasswordHasher;
  config: Pick<AuthConfig, "secret" | "tokenTtlSeconds" | "issuer" | "audience">;
  logger?: AppLogger;
  /** Clock override (tests). */
  now?: () => Date;
};

export function toPublicIdentity(identity: Identity): PublicIdentity {
  return {
    id: identity.id,
    username: identity.username,
    email: identity.email,
    first_name: identity.firstName,
    last_name: identity.lastName,
    role: identity.role,
    role_display_name: ROLE_DISPLAY_NAMES[identity.role],
    is_active: identity.isActive,
    created_at: identity.createdAt.toISOString(),
    updated_at: identity.updatedAt.toISOString(),
  };
}

export class AuthService {
  private readonly users: UserStore;
  private readonly hasher: PasswordHasher;
  private readonly config: AuthServiceDeps["config"];
  private readonly log: AppLogger;
  private readonly now: () => Date;
  private dummyDigest: Promise<string> | null = null;

  constructor(deps: AuthServiceDeps) {
    this.users = deps.users;
    this.hasher = deps.hasher;
    this.config = deps.config;
    this.log = deps.logger ?? rootLogger.child("auth");
    this.now = deps.now ?? (() => new Date());
    this.dummyDigest = this.prepareDummyDigest();
  }

  async register(input: RegisterInput): Promise<Result<AuthSession, RegistrationFailure>> {
    const errors: FieldError[] = [];

    const username = validateStrict("identifier", input.username);
    if (!username.valid) {
      errors.push({
        field: "username",
        message: "Username must be 1-50 characters: letters, digits, '_' or '-'",
      });
    }

    const email = validateField("email", input.email);
    if (!email.valid) {errors.push({ field: "email", message: "Email address is invalid" });}

    const password = typeof input.password === "string" ? input.password : "";
    if (password.length < MIN_PASSWORD_LENGTH || password.length > MAX_PASSWORD_LENGTH) {
      errors.push({
        field: "password",
        message: `Password must be ${MIN_PASSWORD_LENGTH}-${MAX_PASSWORD_LENGTH} characters long`,
      });
    }

    const firstName = this.optionalPersonName("firstName", input.firstName, errors);
    const lastName = this.optionalPersonName("lastName", input.lastName, errors);

    if (errors.length > 0 || !username.sanitizedValue || !email.sanitizedValue) {
      this.log.debug("Registration rejected", { fields: errors.map((e) => e.field) });
      return err({ kind: "ValidationFailure", errors });
    }

    const usernameValue = username.sanitizedValue;
    const emailValue = email.sanitizedValue;
    const role = input.role ?? DEFAULT_ROLE;

    const taken = await infrastructureCall("users.exists", async () => {
      return (await this.users.existsByUsername(usernameValue)) || (await this.users.existsByEmail(emailValue));
    });
    if (taken) {
      this.log.info("Registration rejected: duplicate identity", { username: usernameValue });
      return err({ kind: "DuplicateIdentity" });
    }

    const passwordHash = await this.hasher.hash(password);

    let identity: Identity;
    try {
      identity = await infrastructureCall("users.create", () =>
        this.users.create({
          username: usernameValue,
          email: emailValue,
          firstName,
          lastName,
          role,
          isActive: true,
          passwordHash,
        })
      );
    } catch (error) {
      // Lost a race with a concurrent registration.
      if (error instanceof DuplicateIdentityError) {return err({ kind: "DuplicateIdentity" });}
      throw error;
    }

    this.log.info("User registered", { userId: identity.id, username: identity.username, role });
    return ok(await this.issueSession(identity));
  }

  async login(usernameOrEmail: string, password: string): Promise<Result<AuthSession, LoginFailure>> {
    const key = typeof usernameOrEmail === "string" ? usernameOrEmail.trim() : "";
    const plaintext = typeof password === "string" ? password : "";

    let found: UserWithCredential | null = null;
    if (key && !containsInjection(key)) {
      found = await infrastructureCall("users.findByUsername", () =>
        this.users.findWithCredentialByUsername(key)
      );
      if (!found && key.includes("@")) {
        const email = key.toLowerCase();
        found = await infrastructureCall("users.findByEmail", () => this.users.findWithCredentialByEmail(email));
      }
    } else if (key) {
      this.log.warn("Login identifier matched an injection pattern", { rule: findInjection(key) });
    }

    if (!found) {
      // Same hashing work as a real user so response time does not reveal existence.
      await this.hasher.verify(plaintext, await this.getDummyDigest());
      this.log.info("Login failed", { reason: "unknown_identity" });
      return err({ kind: "InvalidCredentials" });
    }

    const matches = await this.hasher.verify(plaintext, found.credential.hash);
    if (!matches) {
      this.log.info("Login failed", { reason: "bad_password", userId: found.identity.id });
      return err({ kind: "InvalidCredentials" });
    }

    if (!found.identity.isActive) {
      this.log.info("Login refused for inactive account", { userId: found.identity.id });
      return err({ kind: "AccountInactive" });
    }

    this.log.info("User logged in", { userId: found.identity.id, username: found.identity.username });
    return ok(await this.issueSession(found.identity));
  }

  /**
   * Verifies the token, then reloads the identity so role and active flag
   * come from the store, not from the (possibly stale) claims.
   */
  async authenticate(token: string | null | undefined): Promise<Result<Identity, AuthenticationFailure>> {
    const verified = await verifyToken(token, this.config.secret, {
      issuer: this.config.issuer,
      audience: this.config.audience,
      now: this.now,
    });
    if (!verified.ok) {
      this.log.debug("Token rejected", { reason: verified.error });
      return verified;
    }

    const subjectId = verified.value.subjectId;
    const identity = await infrastructureCall("users.findById", () => this.users.findById(subjectId));
    if (!identity) {
      this.log.debug("Token rejected", { reason: "IdentityNotFound", userId: subjectId });
      return err("IdentityNotFound");
    }
    if (!identity.isActive) {
      this.log.debug("Token rejected", { reason: "AccountInactive", userId: subjectId });
      return err("AccountInactive");
    }
    return ok(identity);
  }

  async validateToken(token: string | null | undefined): Promise<Identity | null> {
    const result = await this.authenticate(token);
    return result.ok ? result.value : null;
  }

  private optionalPersonName(
    field: string,
    raw: string | null | undefined,
    errors: FieldError[]
  ): string | null {
    if (raw === undefined || raw === null || raw.trim() === "") {return null;}
    const outcome = validateField("personName", raw);
    if (!outcome.valid || outcome.sanitizedValue === undefined) {
      errors.push({ field, message: "Name may only contain letters, spaces, '-', '.' or ','" });
      return null;
    }
    return outcome.sanitizedValue;
  }

  /** Digest verified against when the user is unknown; a failed attempt is retried on next use. */
  private prepareDummyDigest(): Promise<string> {
    const pending = this.hasher.hash(randomBytes(16).toString("hex"));
    void pending.catch((error: unknown) => {
      if (this.dummyDigest === pending) {this.dummyDigest = null;}
      this.log.warn("Dummy password digest unavailable", { error });
    });
    return pending;
  }

  private getDummyDigest(): Promise<string> {
    if (!this.dummyDigest) {
      this.dummyDigest = this.prepareDummyDigest();
    }
    return this.dummyDigest;
  }

  private async issueSession(identity: Identity): Promise<AuthSession> {
    const { token, claims } = await issueToken(
      { subjectId: identity.id, username: identity.username, role: identity.role },
      this.config.secret,
      this.config.tokenTtlSeconds,
      { issuer: this.config.issuer, audience: this.config.audience, now: this.now }
    );
    return {
      identity,
      token,
      expiresAt: claims.expiresAt,
      expiresIn: claims.expiresAt - claims.issuedAt,
    };
  }
}
