/**
 * Async Handler
 * =============
 * Express 4 does not catch rejected promises from async handlers.
 * Wrap async route handlers with this helper so errors reach the central error middleware.
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";

export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => unknown
): RequestHandler {
  return (req, res, next) => {
    void Promise.resolve()
      .then(() => handler(req, res, next))
      .catch(next);
  };
}
