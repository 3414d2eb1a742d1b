/**
 * HTTP Response Helpers
 * =====================
 * Small helpers to keep routes consistent and reduce boilerplate.
 */

import type { Response } from "express";

import { AppError, InfrastructureError } from "./errors.js";
import { type AppLogger, logger } from "./logger.js";

export type ErrorPayload = {
  code: string;
  message: string;
  statusCode: number;
  details: unknown;
  timestamp: string;
};

const GENERIC_SERVER_MESSAGE = "An internal server error occurred";

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {return error.message;}
  try {
    return String(error);
  } catch {
    return "Unknown error";
  }
}

/**
 * Send a success response: `{ success: true, data }`.
 */
export function ok<T>(res: Response, data: T, statusCode = 200) {
  return res.status(statusCode).json({ success: true, data });
}

/**
 * Send the standard error payload.
 *
 * - AppError supplies statusCode/code/details.
 * - 5xx responses get a fixed message and no details; the real error only
 *   goes to the logs.
 */
export function fail(
  res: Response,
  error: unknown,
  statusCode = 500,
  meta: Record<string, unknown> = {},
  log: AppLogger = logger
) {
  const app = error instanceof AppError ? error : null;
  const finalStatus = app?.statusCode ?? statusCode;
  const code = app?.code ?? "INTERNAL_ERROR";

  const logPayload = {
    status: finalStatus,
    code,
    error: getErrorMessage(error),
    ...meta,
  };

  // ERROR level is for 5xx only; expected client failures stay quieter.
  if (finalStatus >= 500) {
    const cause = app instanceof InfrastructureError ? app.originalError : undefined;
    log.error("API error", {
      ...logPayload,
      ...(error instanceof Error ? { stack: error.stack } : {}),
      ...(cause !== undefined ? { cause: cause instanceof Error ? cause.message : String(cause) } : {}),
    });
  } else if (finalStatus === 401 || finalStatus === 403 || finalStatus === 404) {
    log.info("API error", logPayload);
  } else {
    log.warn("API error", logPayload);
  }

  const expose = finalStatus < 500;
  // InfrastructureError carries a fixed, non-revealing message of its own.
  const showMessage = app !== null && (expose || app instanceof InfrastructureError);
  const payload: ErrorPayload = {
    code,
    message: showMessage ? app.message : GENERIC_SERVER_MESSAGE,
    statusCode: finalStatus,
    details: expose && app ? app.details : null,
    timestamp: new Date().toISOString(),
  };

  return res.status(finalStatus).json(payload);
}
