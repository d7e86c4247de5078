/**
 * Application error types
 * Each error type maps to a specific HTTP status code for the route layer
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Worker process could not be started (500 Internal Server Error)
 * No job exists when this is thrown.
 */
export class LaunchError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'LAUNCH_ERROR', 500, details);
  }
}

/**
 * Validation errors from user input (400 Bad Request)
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

/**
 * Resource not found errors (404 Not Found)
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} with id ${id} not found`, 'NOT_FOUND', 404, { resource, id });
  }
}

/**
 * Configuration errors - fail fast on startup (500 Internal Server Error)
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', 500, details);
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
