/**
 * Application error hierarchy.
 * Each error carries a machine-readable code and an HTTP status so the
 * error-handler middleware can map it to a structured JSON response.
 */

export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REQUEST', message, 400, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

/**
 * Raised inside the engine when a boundary call (similarity index, model
 * backend) exceeds its per-call budget. Never surfaces to the API layer.
 */
export class TimeoutError extends Error {
  constructor(readonly operation: string, readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/** Abort reason used when a classification request runs past its deadline. */
export class RequestDeadlineError extends Error {
  constructor(readonly deadlineMs: number) {
    super(`Request deadline of ${deadlineMs}ms exceeded`);
    this.name = 'RequestDeadlineError';
  }
}
