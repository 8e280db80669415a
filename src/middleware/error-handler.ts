/**
 * Error handler middleware.
 * Catches errors thrown by handlers and maps them to structured JSON responses.
 * AppError subclasses get their status code and details; unknown errors become 500.
 */

import { AppError } from '../errors.js';
import type { Handler } from './pipeline.js';
import type { ApiErrorResponse } from '../types/api.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function errorHandler(next: Handler): Handler {
  return async (req, ctx) => {
    try {
      return await next(req, ctx);
    } catch (err) {
      const body: ApiErrorResponse =
        err instanceof AppError
          ? {
              error: {
                code: err.code,
                message: err.message,
                ...(err.details && { details: err.details }),
              },
            }
          : {
              // Unknown error: don't leak internals
              error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' },
            };

      return new Response(JSON.stringify(body), {
        status: err instanceof AppError ? err.statusCode : 500,
        headers: { ...JSON_HEADERS, 'X-Request-Id': ctx.requestId },
      });
    }
  };
}
