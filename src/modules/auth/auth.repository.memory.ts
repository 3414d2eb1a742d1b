import { randomUUID } from "node:crypto";

import { DuplicateIdentityError } from "../../shared/errors.js";
import type { Role } from "../../shared/roles.js";
import type { UserStore } from "./auth.repository.js";
import type { Identity, NewUser, UserCount, UserListFilter, UserWithCredential } from "./auth.types.js";

type StoredUser = {
  identity: Identity;
  passwordHash: string;
};

/**
 * Process-local user store for development and tests.
 */
export class InMemoryUserStore implements UserStore {
  private readonly users = new Map<string, StoredUser>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  private byUsername(username: string): StoredUser | undefined {
    for (const u of this.users.values()) {
      if (u.identity.username === username) {return u;}
    }
    return undefined;
  }

  private byEmail(email: string): StoredUser | undefined {
    const needle = email.toLowerCase();
    for (const u of this.users.values()) {
      if (u.identity.email === needle) {return u;}
    }
    return undefined;
  }

  private withCredential(u: StoredUser | undefined): UserWithCredential | null {
    if (!u) {return null;}
    return {
      identity: u.identity,
      credential: Object.freeze({ identityId: u.identity.id, hash: u.passwordHash }),
    };
  }

  private update(id: string, patch: Partial<Pick<Identity, "isActive" | "role">>): Identity | null {
    const current = this.users.get(id);
    if (!current) {return null;}
    const identity: Identity = Object.freeze({ ...current.identity, ...patch, updatedAt: this.now() });
    this.users.set(id, { ...current, identity });
    return identity;
  }

  async findById(id: string): Promise<Identity | null> {
    return this.users.get(id)?.identity ?? null;
  }

  async findWithCredentialByUsername(username: string): Promise<UserWithCredential | null> {
    return this.withCredential(this.byUsername(username));
  }

  async findWithCredentialByEmail(email: string): Promise<UserWithCredential | null> {
    return this.withCredential(this.byEmail(email));
  }

  async existsByUsername(username: string): Promise<boolean> {
    return this.byUsername(username) !== undefined;
  }

  async existsByEmail(email: string): Promise<boolean> {
    return this.byEmail(email) !== undefined;
  }

  async create(user: NewUser): Promise<Identity> {
    if (this.byUsername(user.username) || this.byEmail(user.email)) {
      throw new DuplicateIdentityError();
    }
    const at = this.now();
    const identity: Identity = Object.freeze({
      id: randomUUID(),
      username: user.username,
      email: user.email.toLowerCase(),
      firstName: user.firstName,
      lastName: user.lastName,
      role: user.role,
      isActive: user.isActive,
      createdAt: at,
      updatedAt: at,
    });
    this.users.set(identity.id, { identity, passwordHash: user.passwordHash });
    return identity;
  }

  async list(filter: UserListFilter = {}): Promise<Identity[]> {
    return Array.from(this.users.values())
      .map((u) => u.identity)
      .filter((i) => (filter.role ? i.role === filter.role : true))
      .filter((i) => (filter.active !== undefined ? i.isActive === filter.active : true));
  }

  async countUsers(): Promise<UserCount[]> {
    const counts = new Map<string, UserCount>();
    for (const { identity } of this.users.values()) {
      const key = `${identity.role}:${identity.isActive}`;
      const entry = counts.get(key);
      if (entry) {entry.count += 1;}
      else {counts.set(key, { role: identity.role, isActive: identity.isActive, count: 1 });}
    }
    return Array.from(counts.values());
  }

  async setActive(id: string, isActive: boolean): Promise<Identity | null> {
    return this.update(id, { isActive });
  }

  async setRole(id: string, role: Role): Promise<Identity | null> {
    return this.update(id, { role });
  }
}
