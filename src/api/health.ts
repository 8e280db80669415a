/**
 * Health endpoint.
 * GET /api/v1/health: liveness plus the size of the knowledge index
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { jsonResponse } from './responses.js';

export function createHealthHandlers(container: Container) {
  const check: Handler = pipeline(errorHandler)(async () => {
    const knowledgeEntries = await container.knowledgeRepo.count();
    return jsonResponse({
      status: 'healthy',
      service: 'menu-veg-classifier',
      knowledgeEntries,
    });
  });

  return { check };
}
