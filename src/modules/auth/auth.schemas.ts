/**
 * Auth Schemas
 * ============
 * Request body shapes for the authentication endpoints. Field rules
 * (character classes, injection checks, password length) live in AuthService.
 */

import { z } from "zod";

import { parseRole } from "../../shared/roles.js";
import { parseInput } from "../../shared/validation.js";

const optionalName = z
  .string()
  .max(100)
  .nullish()
  .transform((v) => {
    const trimmed = v?.trim() ?? "";
    return trimmed.length > 0 ? trimmed : null;
  });

const roleSchema = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined || value.trim() === "") {return undefined;}
    const role = parseRole(value);
    if (!role) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid role: ${value}` });
      return z.NEVER;
    }
    return role;
  });

export const registerInputSchema = z.object({
  username: z.string().min(1).max(200),
  email: z.string().min(1).max(300),
  password: z.string().min(1).max(500),
  firstName: optionalName,
  lastName: optionalName,
  role: roleSchema,
});

export type RegisterBody = z.infer<typeof registerInputSchema>;

export function validateRegisterInput(data: unknown): RegisterBody {
  return parseInput(registerInputSchema, data, "registration input", "Invalid registration input");
}

export const loginInputSchema = z.object({
  usernameOrEmail: z.string().trim().min(1, "Username/email is required").max(300),
  password: z.string().min(1, "Password is required").max(500),
});

export type LoginBody = z.infer<typeof loginInputSchema>;

export function validateLoginInput(data: unknown): LoginBody {
  return parseInput(loginInputSchema, data, "login input", "Username/email and password are required");
}
