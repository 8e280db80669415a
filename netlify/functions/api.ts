/**
 * Netlify Function entry point.
 * Single function handles all /api/v1/* routes via the router.
 * The container is built once per cold start and shared across warm
 * invocations.
 */

import { randomUUID } from 'node:crypto';
import type { Context } from '@netlify/functions';
import { createRouter } from '../../src/api/router.js';
import { getProductionContainer } from '../../src/container.production.js';

const container = getProductionContainer();
const router = createRouter(container);

export default async (req: Request, _context: Context) => {
  // Review sessions are keyed by this id, so it is never taken from the client.
  const requestId = randomUUID();
  try {
    return await router.handle(req, { requestId, signal: req.signal });
  } finally {
    await container.logProvider.flush();
  }
};

export const config = {
  path: '/api/v1/*',
};
