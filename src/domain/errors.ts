/**
 * Error taxonomy
 *
 * Every failure a caller can act on has its own class so the API layer can
 * map it to a status and the user sees a specific message
 * ("already enrolled", "not your class", ...).
 */

export type ErrorCode =
  | "validation"
  | "authentication"
  | "authorization"
  | "not_found"
  | "conflict";

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed or missing input
 */
export class ValidationError extends AppError {
  readonly code = "validation";
}

/**
 * Bad credentials, or no valid session
 */
export class AuthenticationError extends AppError {
  readonly code = "authentication";
}

/**
 * The acting user's role or relationship to the target does not permit the operation
 */
export class AuthorizationError extends AppError {
  readonly code = "authorization";
}

export class NotFoundError extends AppError {
  readonly code = "not_found";

  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`);
  }
}

/**
 * A uniqueness rule was violated (duplicate username, duplicate enrollment, ...)
 */
export class ConflictError extends AppError {
  readonly code = "conflict";
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
