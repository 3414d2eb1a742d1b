/**
 * Auth Repository
 * ===============
 * User store interface and its PostgreSQL implementation.
 *
 * All SQL is parameterized; values never reach the query text.
 */

import { randomUUID } from "node:crypto";

import type { Pool } from "pg";

import { DuplicateIdentityError } from "../../shared/errors.js";
import { parseRole, type Role } from "../../shared/roles.js";
import type { Identity, NewUser, UserCount, UserListFilter, UserWithCredential } from "./auth.types.js";

export interface UserStore {
  findById(id: string): Promise<Identity | null>;
  findWithCredentialByUsername(username: string): Promise<UserWithCredential | null>;
  /** `email` is compared lower-cased. */
  findWithCredentialByEmail(email: string): Promise<UserWithCredential | null>;
  existsByUsername(username: string): Promise<boolean>;
  existsByEmail(email: string): Promise<boolean>;
  /** Rejects with DuplicateIdentityError when username or email is taken. */
  create(user: NewUser): Promise<Identity>;
  list(filter?: UserListFilter): Promise<Identity[]>;
  /** One entry per role and active flag that has at least one user. */
  countUsers(): Promise<UserCount[]>;
  setActive(id: string, isActive: boolean): Promise<Identity | null>;
  setRole(id: string, role: Role): Promise<Identity | null>;
}

type UserRow = {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  first_name: string | null;
  last_name: string | null;
  role: string;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
};

const USER_COLUMNS =
  "id, username, email, password_hash, first_name, last_name, role, is_active, created_at, updated_at";

function toIdentity(row: UserRow): Identity {
  const role = parseRole(row.role);
  if (!role) {throw new Error(`User ${row.id} has unknown role "${row.role}"`);}
  return Object.freeze({
    id: row.id,
    username: row.username,
    email: row.email,
    firstName: row.first_name,
    lastName: row.last_name,
    role,
    isActive: row.is_active,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  });
}

function toUserWithCredential(row: UserRow): UserWithCredential {
  const identity = toIdentity(row);
  return {
    identity,
    credential: Object.freeze({ identityId: identity.id, hash: row.password_hash }),
  };
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "23505";
}

export class PostgresUserStore implements UserStore {
  constructor(private readonly pool: Pool) {}

  private async one(sql: string, params: unknown[]): Promise<UserRow | null> {
    const result = await this.pool.query<UserRow>(sql, params);
    return result.rows.length > 0 ? result.rows[0] : null;
  }

  async findById(id: string): Promise<Identity | null> {
    const row = await this.one(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1 LIMIT 1`, [id]);
    return row ? toIdentity(row) : null;
  }

  async findWithCredentialByUsername(username: string): Promise<UserWithCredential | null> {
    const row = await this.one(`SELECT ${USER_COLUMNS} FROM users WHERE username = $1 LIMIT 1`, [username]);
    return row ? toUserWithCredential(row) : null;
  }

  async findWithCredentialByEmail(email: string): Promise<UserWithCredential | null> {
    const row = await this.one(`SELECT ${USER_COLUMNS} FROM users WHERE email = $1 LIMIT 1`, [
      email.toLowerCase(),
    ]);
    return row ? toUserWithCredential(row) : null;
  }

  async existsByUsername(username: string): Promise<boolean> {
    const result = await this.pool.query("SELECT 1 FROM users WHERE username = $1 LIMIT 1", [username]);
    return result.rows.length > 0;
  }

  async existsByEmail(email: string): Promise<boolean> {
    const result = await this.pool.query("SELECT 1 FROM users WHERE email = $1 LIMIT 1", [
      email.toLowerCase(),
    ]);
    return result.rows.length > 0;
  }

  async create(user: NewUser): Promise<Identity> {
    const sql = `
      INSERT INTO users (id, username, email, password_hash, first_name, last_name, role, is_active)
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
      RETURNING ${USER_COLUMNS}
    `;
    try {
      const row = await this.one(sql, [
        randomUUID(),
        user.username,
        user.email.toLowerCase(),
        user.passwordHash,
        user.firstName,
        user.lastName,
        user.role,
        user.isActive,
      ]);
      if (!row) {throw new Error("INSERT INTO users returned no row");}
      return toIdentity(row);
    } catch (error) {
      if (isUniqueViolation(error)) {throw new DuplicateIdentityError();}
      throw error;
    }
  }

  async list(filter: UserListFilter = {}): Promise<Identity[]> {
    const where: string[] = [];
    const params: unknown[] = [];
    if (filter.role) {
      params.push(filter.role);
      where.push(`role = $${params.length}`);
    }
    if (filter.active !== undefined) {
      params.push(filter.active);
      where.push(`is_active = $${params.length}`);
    }
    const sql = `SELECT ${USER_COLUMNS} FROM users${
      where.length > 0 ? ` WHERE ${where.join(" AND ")}` : ""
    } ORDER BY created_at ASC, username ASC`;
    const result = await this.pool.query<UserRow>(sql, params);
    return result.rows.map(toIdentity);
  }

  async countUsers(): Promise<UserCount[]> {
    const result = await this.pool.query<{ role: string; is_active: boolean; count: string }>(
      "SELECT role, is_active, COUNT(*) AS count FROM users GROUP BY role, is_active"
    );
    return result.rows.map((row) => {
      const role = parseRole(row.role);
      if (!role) {throw new Error(`Users table holds unknown role "${row.role}"`);}
      return { role, isActive: row.is_active, count: Number(row.count) };
    });
  }

  async setActive(id: string, isActive: boolean): Promise<Identity | null> {
    const row = await this.one(
      `UPDATE users SET is_active = $2, updated_at = NOW() WHERE id = $1 RETURNING ${USER_COLUMNS}`,
      [id, isActive]
    );
    return row ? toIdentity(row) : null;
  }

  async setRole(id: string, role: Role): Promise<Identity | null> {
    const row = await this.one(
      `UPDATE users SET role = $2, updated_at = NOW() WHERE id = $1 RETURNING ${USER_COLUMNS}`,
      [id, role]
    );
    return row ? toIdentity(row) : null;
  }
}
