/**
 * Error taxonomy shared by the field client and the backend.
 *
 * Each class carries the HTTP status it maps to, so the backend can render it
 * and the client can rebuild it from a response.
 */

export class AppError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

export class ValidationError extends AppError {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, 400);
    this.field = field;
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Unauthorized') {
    super(message, 401);
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = 'Forbidden') {
    super(message, 403);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

/** Local persistence failure. Never retried by the caller. */
export class StorageError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 500);
    this.cause = cause;
  }
}

/** Timeout, refused connection, 5xx or cancellation. Safe to retry later. */
export class TransientNetworkError extends AppError {
  constructor(message: string, status: number = 503) {
    super(message, status);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function errorFromStatus(status: number, message: string): AppError {
  switch (status) {
    case 400:
    case 422:
      return new ValidationError(message);
    case 401:
      return new UnauthorizedError(message);
    case 403:
      return new ForbiddenError(message);
    case 404:
      return new NotFoundError(message);
    case 409:
      return new ConflictError(message);
    default:
      if (status >= 500 || status === 408 || status === 429) {
        return new TransientNetworkError(message, status);
      }
      return new ValidationError(message);
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
