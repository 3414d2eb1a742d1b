/**
 * Auth Types
 * ==========
 * Identity snapshots, credentials and the typed outcomes of AuthService.
 */

import type { Role } from "../../shared/roles.js";
import type { TokenFailure } from "../../shared/token-codec.js";

/**
 * Immutable snapshot of a user. Carries no credential material.
 */
export type Identity = Readonly<{
  id: string;
  username: string;
  email: string;
  firstName: string | null;
  lastName: string | null;
  role: Role;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}>;

export type Credential = Readonly<{
  identityId: string;
  hash: string;
}>;

export type UserWithCredential = {
  identity: Identity;
  credential: Credential;
};

export type NewUser = {
  username: string;
  email: string;
  firstName: string | null;
  lastName: string | null;
  role: Role;
  isActive: boolean;
  passwordHash: string;
};

export type UserListFilter = {
  role?: Role;
  active?: boolean;
};

/** Number of users sharing one role and active flag. */
export type UserCount = {
  role: Role;
  isActive: boolean;
  count: number;
};

export type AuthSession = {
  identity: Identity;
  token: string;
  /** Seconds since epoch. */
  expiresAt: number;
  /** Seconds until expiry at issue time. */
  expiresIn: number;
};

export type RegisterInput = {
  username: string;
  email: string;
  password: string;
  firstName?: string | null;
  lastName?: string | null;
  role?: Role;
};

export type FieldError = {
  field: string;
  message: string;
};

export type RegistrationFailure =
  | { kind: "ValidationFailure"; errors: FieldError[] }
  | { kind: "DuplicateIdentity" };

export type LoginFailure = { kind: "InvalidCredentials" } | { kind: "AccountInactive" };

export type AuthenticationFailure = TokenFailure | "IdentityNotFound" | "AccountInactive";

/**
 * Public JSON shape of an identity (snake_case, ISO dates).
 */
export type PublicIdentity = {
  id: string;
  username: string;
  email: string;
  first_name: string | null;
  last_name: string | null;
  role: Role;
  role_display_name: string;
  is_active: boolean;
  created_at: string;
  updated_at: string;
};
