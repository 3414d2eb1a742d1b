/**
 * Admin Schemas
 * =============
 * Validation for user management endpoints.
 */

import { z } from "zod";

import { parseRole, ROLES } from "../../shared/roles.js";
import { parseInput } from "../../shared/validation.js";

const roleSchema = z.string().transform((value, ctx) => {
  const role = parseRole(value);
  if (!role) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Role must be one of ${ROLES.join(", ")}`,
    });
    return z.NEVER;
  }
  return role;
});

const booleanQuery = z.enum(["true", "false"]).transform((v) => v === "true");

export const listUsersQuerySchema = z.object({
  role: roleSchema.optional(),
  active: booleanQuery.optional(),
});

export type ListUsersQuery = z.infer<typeof listUsersQuerySchema>;

export const userIdParamSchema = z
  .string()
  .trim()
  .min(1)
  .max(50)
  .regex(/^[A-Za-z0-9_-]+$/, "Invalid user id");

export const updateUserStatusInputSchema = z.object({
  is_active: z.boolean(),
});

export type UpdateUserStatusInput = z.infer<typeof updateUserStatusInputSchema>;

export const updateUserRoleInputSchema = z.object({
  role: roleSchema,
});

export type UpdateUserRoleInput = z.infer<typeof updateUserRoleInputSchema>;

export function validateListUsersQuery(data: unknown): ListUsersQuery {
  return parseInput(listUsersQuerySchema, data, "user list query");
}

export function validateUserId(data: unknown): string {
  return parseInput(userIdParamSchema, data, "user id");
}

export function validateUpdateUserStatusInput(data: unknown): UpdateUserStatusInput {
  return parseInput(updateUserStatusInputSchema, data, "status update");
}

export function validateUpdateUserRoleInput(data: unknown): UpdateUserRoleInput {
  return parseInput(updateUserRoleInputSchema, data, "role update");
}
