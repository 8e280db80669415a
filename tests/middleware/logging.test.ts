import { describe, it, expect, beforeEach } from 'vitest';
import { createLoggingMiddleware } from '../../src/middleware/logging.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';

function makeRequest(method: string, path: string): Request {
  return new Request(`https://example.com${path}`, { method });
}

const ctx: HandlerContext = { requestId: 'req-42' };

describe('logging middleware', () => {
  let logProvider: ConsoleLogProvider;
  let middleware: ReturnType<typeof createLoggingMiddleware>;

  beforeEach(() => {
    logProvider = new ConsoleLogProvider();
    middleware = createLoggingMiddleware(logProvider);
  });

  // ── basic request logging ──

  it('should log a successful request with its request id', async () => {
    const handler: Handler = async () => new Response(JSON.stringify({ ok: true }), { status: 200 });

    const response = await middleware(handler)(makeRequest('GET', '/api/v1/health'), ctx);

    expect(response.status).toBe(200);
    expect(logProvider.events).toHaveLength(1);
    expect(logProvider.events[0]).toMatchObject({
      level: 'info',
      method: 'GET',
      path: '/api/v1/health',
      status: 200,
      requestId: 'req-42',
    });
    expect(logProvider.events[0].message).toMatch(/^GET \/api\/v1\/health → 200 \(\d+ms\)$/);
  });

  it('should pass through the response unmodified', async () => {
    const body = JSON.stringify({ data: 'test' });
    const handler: Handler = async () =>
      new Response(body, {
        status: 201,
        headers: { 'Content-Type': 'application/json', 'X-Custom': 'yes' },
      });

    const response = await middleware(handler)(makeRequest('POST', '/api/v1/menu/classify'), ctx);

    expect(response.status).toBe(201);
    expect(response.headers.get('X-Custom')).toBe('yes');
    expect(await response.text()).toBe(body);
  });

  // ── levels ──

  it('should log 4xx responses at warn level', async () => {
    const handler: Handler = async () => new Response(null, { status: 404 });
    await middleware(handler)(makeRequest('GET', '/api/v1/review/missing'), ctx);

    expect(logProvider.events[0]).toMatchObject({ level: 'warn', status: 404 });
  });

  it('should log 5xx responses at error level', async () => {
    const handler: Handler = async () => new Response('Internal Error', { status: 500 });
    await middleware(handler)(makeRequest('POST', '/api/v1/menu/classify'), ctx);

    expect(logProvider.events[0]).toMatchObject({ level: 'error', status: 500 });
  });

  // ── duration tracking ──

  it('should measure request duration', async () => {
    const handler: Handler = async () => {
      await new Promise((r) => setTimeout(r, 20));
      return new Response(null, { status: 200 });
    };

    await middleware(handler)(makeRequest('GET', '/api/v1/health'), ctx);

    const event = logProvider.events[0];
    const durationMs = 'durationMs' in event ? event.durationMs : undefined;
    expect(durationMs).toBeGreaterThanOrEqual(15); // allow small timing variance
  });

  // ── handler exceptions ──

  it('should log and re-throw if the handler throws', async () => {
    const handler: Handler = async () => {
      throw new Error('boom');
    };

    await expect(
      middleware(handler)(makeRequest('POST', '/api/v1/menu/classify'), ctx)
    ).rejects.toThrow('boom');

    expect(logProvider.events).toHaveLength(1);
    expect(logProvider.events[0]).toMatchObject({
      level: 'error',
      status: 500,
      requestId: 'req-42',
      fields: { error: 'boom' },
    });
  });

  it('should log path without query parameters', async () => {
    const handler: Handler = async () => new Response(null, { status: 200 });
    await middleware(handler)(makeRequest('GET', '/api/v1/health?verbose=1'), ctx);

    expect(logProvider.events[0]).toMatchObject({ path: '/api/v1/health' });
  });
});
