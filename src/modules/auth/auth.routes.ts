/**
 * Auth Routes
 * ===========
 * Register, login, "me" and logout. Tokens are stateless; logout is an
 * acknowledgement and the client discards its token.
 */

import { type Request, type Response, Router } from "express";

import { type AccessGate, requireRequestIdentity } from "../../middleware/access-gate.js";
import { asyncHandler } from "../../middleware/async-handler.js";
import { getRequestAuth } from "../../shared/auth-context.js";
import {
  AccountInactiveError,
  AppError,
  AuthorizationError,
  DuplicateIdentityError,
  InvalidCredentialsError,
  ValidationError,
} from "../../shared/errors.js";
import { ok } from "../../shared/http.js";
import { DEFAULT_ROLE } from "../../shared/roles.js";
import { validateLoginInput, validateRegisterInput } from "./auth.schemas.js";
import { type AuthService, toPublicIdentity } from "./auth.service.js";
import type { AuthSession, LoginFailure, RegistrationFailure } from "./auth.types.js";

export type AuthRouterDeps = {
  authService: AuthService;
  gate: AccessGate;
};

export function registrationError(failure: RegistrationFailure): AppError {
  if (failure.kind === "DuplicateIdentity") {return new DuplicateIdentityError();}
  return new ValidationError("Invalid registration input", failure.errors);
}

export function loginError(failure: LoginFailure): AppError {
  return failure.kind === "AccountInactive" ? new AccountInactiveError() : new InvalidCredentialsError();
}

function sessionBody(session: AuthSession) {
  return {
    token: session.token,
    token_type: "Bearer",
    expires_in: session.expiresIn,
    user: toPublicIdentity(session.identity),
  };
}

export function createAuthRouter({ authService, gate }: AuthRouterDeps): Router {
  const router = Router();

  /**
   * @swagger
   * /api/auth/register:
   *   post:
   *     summary: Register a new user
   *     description: Roles other than CUSTOMER can only be assigned by an authenticated ADMIN.
   *     tags: [Auth]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/RegisterRequest'
   *     responses:
   *       201:
   *         description: User created, token issued
   *       400:
   *         description: Invalid input
   *       403:
   *         description: Privileged role requested without ADMIN credentials
   *       409:
   *         description: Username or email already exists
   */
  router.post(
    "/register",
    gate.optionalAuth(),
    asyncHandler(async (req: Request, res: Response) => {
      const input = validateRegisterInput(req.body);
      const role = input.role ?? DEFAULT_ROLE;

      if (role !== DEFAULT_ROLE && getRequestAuth(req)?.role !== "ADMIN") {
        throw new AuthorizationError("Only administrators can assign this role");
      }

      const result = await authService.register({
        username: input.username,
        email: input.email,
        password: input.password,
        firstName: input.firstName,
        lastName: input.lastName,
        role,
      });
      if (!result.ok) {throw registrationError(result.error);}

      return ok(res, sessionBody(result.value), 201);
    })
  );

  /**
   * @swagger
   * /api/auth/login:
   *   post:
   *     summary: Log in with username or email
   *     tags: [Auth]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/LoginRequest'
   *     responses:
   *       200:
   *         description: Token issued
   *       401:
   *         description: Invalid credentials or inactive account
   */
  router.post(
    "/login",
    asyncHandler(async (req: Request, res: Response) => {
      const input = validateLoginInput(req.body);

      const result = await authService.login(input.usernameOrEmail, input.password);
      if (!result.ok) {throw loginError(result.error);}

      return ok(res, sessionBody(result.value));
    })
  );

  /**
   * @swagger
   * /api/auth/me:
   *   get:
   *     summary: Current user
   *     tags: [Auth]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: The authenticated user
   *       401:
   *         description: Missing, invalid or expired token
   */
  router.get(
    "/me",
    gate.requireAuth(),
    asyncHandler(async (req: Request, res: Response) => {
      const identity = requireRequestIdentity(req);
      return ok(res, { user: toPublicIdentity(identity) });
    })
  );

  /**
   * @swagger
   * /api/auth/logout:
   *   post:
   *     summary: Log out (client discards its token)
   *     tags: [Auth]
   *     responses:
   *       200:
   *         description: Acknowledged
   */
  router.post("/logout", (_req: Request, res: Response) => {
    return ok(res, { logged_out: true });
  });

  return router;
}
