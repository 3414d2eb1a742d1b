/**
 * Custom Error Classes
 * ====================
 * Structured error handling for the application.
 *
 * Every class maps to a fixed HTTP status and code. Messages of 4xx errors are
 * safe to show to callers; 5xx errors are rendered with a generic message and
 * their detail only reaches the logs.
 */

/**
 * Base application error
 */
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code: string = "INTERNAL_ERROR",
    public details: unknown = null
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  /** Whether `message` may be sent to the client as-is. */
  get expose(): boolean {
    return this.statusCode < 500;
  }
}

/**
 * Validation error
 */
export class ValidationError extends AppError {
  constructor(message: string, details: unknown = null) {
    super(message, 400, "VALIDATION_ERROR", details);
  }
}

/**
 * Missing, malformed, forged or expired token. The message never says which.
 */
export class AuthenticationError extends AppError {
  constructor(message: string = "Authentication required") {
    super(message, 401, "AUTHENTICATION_REQUIRED");
  }
}

/**
 * Unknown user or wrong password (deliberately indistinguishable).
 */
export class InvalidCredentialsError extends AppError {
  constructor() {
    super("Invalid username/email or password", 401, "INVALID_CREDENTIALS");
  }
}

export class AccountInactiveError extends AppError {
  constructor() {
    super("Account is inactive", 401, "ACCOUNT_INACTIVE");
  }
}

/**
 * Authenticated, but the role does not satisfy the route's requirement.
 */
export class AuthorizationError extends AppError {
  constructor(message: string = "Insufficient permissions") {
    super(message, 403, "INSUFFICIENT_PERMISSIONS");
  }
}

/**
 * Resource not found error
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    super(
      identifier
        ? `${resource} with ID '${identifier}' not found`
        : `${resource} not found`,
      404,
      "NOT_FOUND"
    );
  }
}

export class ConflictError extends AppError {
  constructor(message: string, code: string = "CONFLICT") {
    super(message, 409, code);
  }
}

export class DuplicateIdentityError extends ConflictError {
  constructor() {
    super("Username or email already exists", "DUPLICATE_IDENTITY");
  }
}

/**
 * A backing service (database, store) failed or timed out.
 * `originalError` is kept for the logs only.
 */
export class InfrastructureError extends AppError {
  constructor(
    public operation: string,
    public originalError?: unknown
  ) {
    super("Service temporarily unavailable", 503, "SERVICE_UNAVAILABLE");
  }
}

/**
 * Configuration error
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(`Configuration error: ${message}`, 500, "CONFIGURATION_ERROR");
  }
}

/**
 * Runs a store call, letting AppErrors through and wrapping anything else
 * (driver errors, timeouts) in an InfrastructureError.
 */
export async function infrastructureCall<T>(
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof AppError) {throw error;}
    throw new InfrastructureError(operation, error);
  }
}
