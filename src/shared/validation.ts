import type { z } from "zod";

import { ValidationError } from "./errors.js";
import { logger } from "./logger.js";

/**
 * Parses `data` with `schema`; on failure logs the issue messages (never the
 * input) and throws a ValidationError carrying the zod issues as details.
 */
export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  label: string,
  message?: string
): z.infer<S> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues;
    logger.warn(`Invalid ${label}`, { issues: issues.map((i) => i.message) });
    const first = issues[0]?.message;
    throw new ValidationError(message ?? (first ? `Invalid ${label}: ${first}` : `Invalid ${label}`), issues);
  }
  return parsed.data;
}
