/**
 * Error Handler Middleware
 * ========================
 * Central place for unhandled route errors and unmatched routes.
 *
 * Notes:
 * - Use with `asyncHandler` to capture async/await errors.
 * - Responses always use the error payload from `fail`; no stack traces.
 */

import type { ErrorRequestHandler, RequestHandler } from "express";
import { ZodError } from "zod";

import { AppError, NotFoundError, ValidationError } from "../shared/errors.js";
import { fail } from "../shared/http.js";
import { type AppLogger, logger } from "../shared/logger.js";

function isBodyParserSyntaxError(error: unknown): boolean {
  return (
    error instanceof SyntaxError &&
    "type" in error &&
    error.type === "entity.parse.failed"
  );
}

export function createErrorHandler(log: AppLogger = logger): ErrorRequestHandler {
  return (error: unknown, req, res, next) => {
    if (res.headersSent) {return next(error);}

    const meta = { method: req.method, path: req.originalUrl };

    // Zod validation errors (request body/query/params parsing)
    if (error instanceof ZodError) {
      const firstIssue = error.issues[0];
      const message = firstIssue?.message
        ? `Validation error: ${firstIssue.message}`
        : "Validation error";
      return fail(res, new ValidationError(message, error.issues), 400, meta, log);
    }

    // Bad JSON body (express.json)
    if (isBodyParserSyntaxError(error)) {
      return fail(res, new AppError("Invalid JSON body", 400, "INVALID_JSON"), 400, meta, log);
    }

    return fail(res, error, 500, meta, log);
  };
}

/** Every path no router answered, API or not, gets the JSON 404 payload. */
export const notFoundHandler: RequestHandler = (req, _res, next) => {
  next(new NotFoundError("Route", req.path));
};
