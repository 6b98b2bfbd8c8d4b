/**
 * Error types the HTTP layer turns into responses.
 *
 *   NotFoundError    404  unknown SWIFT code, country with no entries, route
 *   ValidationError  400  format rules, flag/suffix mismatch, country conflict
 *   ConflictError    409  code already stored
 *
 * An AppError created with `isOperational = false` is reported like any other
 * unexpected failure: 500 and a generic message.
 */
import type { ErrorResponseBody } from '@shared/types';

export class AppError extends Error {
  constructor(
    message: string,
    readonly statusCode = 500,
    readonly isOperational = true,
  ) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toResponseBody(): ErrorResponseBody {
    return { status: 'error', message: this.message };
  }
}

export class NotFoundError extends AppError {
  constructor(
    readonly resource: string,
    readonly identifier: string,
  ) {
    super(`${resource} not found: ${identifier}`, 404);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class ConflictError extends AppError {
  constructor(
    readonly resource: string,
    readonly identifier: string,
  ) {
    super(`${resource} already exists: ${identifier}`, 409);
  }
}
