/**
 * Request logging middleware.
 * Captures method, path, status, duration and request id for every request.
 *
 * Level mapping:
 *   2xx → info
 *   4xx → warn
 *   5xx → error
 *   handler exception → error (re-thrown)
 */

import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import type { Handler, Middleware } from './pipeline.js';

function levelForStatus(status: number): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const method = req.method;
      const path = new URL(req.url).pathname;
      const start = performance.now();

      const emit = (status: number, fields?: Record<string, unknown>) => {
        const durationMs = Math.round(performance.now() - start);
        const event: RequestLogEvent = {
          level: fields ? 'error' : levelForStatus(status),
          message: `${method} ${path} → ${status} (${durationMs}ms)`,
          method,
          path,
          status,
          durationMs,
          requestId: ctx.requestId,
          ...(fields && { fields }),
        };
        logProvider.log(event);
      };

      try {
        const response = await next(req, ctx);
        emit(response.status);
        return response;
      } catch (err) {
        emit(500, { error: err instanceof Error ? err.message : String(err) });
        throw err;
      }
    };
  };
}
