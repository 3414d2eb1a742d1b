/**
 * Roles
 * =====
 * Closed set of user roles. The order below is for display only; no role
 * outranks another, gating is exact match or set membership.
 */

export const ROLES = ["ADMIN", "CUSTOMER", "MODERATOR"] as const;

const ROLE_SET: ReadonlySet<string> = new Set(ROLES);

export type Role = (typeof ROLES)[number];

export const ROLE_DISPLAY_NAMES: Readonly<Record<Role, string>> = {
  ADMIN: "Administrator",
  CUSTOMER: "Customer",
  MODERATOR: "Moderator",
};

export const DEFAULT_ROLE: Role = "CUSTOMER";

export function isRole(value: unknown): value is Role {
  return typeof value === "string" && ROLE_SET.has(value);
}

/**
 * Case-insensitive parse ("admin" -> "ADMIN"); null for anything else.
 */
export function parseRole(value: unknown): Role | null {
  if (typeof value !== "string") {return null;}
  const upper = value.trim().toUpperCase();
  return isRole(upper) ? upper : null;
}
