/**
 * Menu endpoints.
 * POST /api/v1/menu/classify: classify parsed menu lines and total the vegetarian ones
 */

import { z } from 'zod';
import { pipeline, errorHandler, validateBody } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { ValidationError } from '../errors.js';
import type { BodySchema } from '../types/common.js';
import type { DishCandidate } from '../types/models.js';
import { jsonResponse, toClassifyResponse } from './responses.js';

const MAX_CANDIDATES = 200;

const classifySchema: BodySchema = {
  candidates: { type: 'array', required: true, minItems: 1, maxItems: MAX_CANDIDATES },
};

const candidateSchema = z.object({
  name: z.string().trim().min(1).max(200),
  price: z.number().finite().nonnegative(),
  sourceImage: z.number().int().positive().default(1),
  rawText: z.string().max(1000).optional(),
});

const bodySchema = z.object({ candidates: z.array(candidateSchema) });

export function createMenuHandlers(container: Container) {
  const classify: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(classifySchema)
  )(async (req, ctx) => {
    const parsed = bodySchema.safeParse(await req.json());
    if (!parsed.success) {
      throw new ValidationError('Invalid dish candidates', {
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }

    const candidates: DishCandidate[] = parsed.data.candidates.map((c) =>
      Object.freeze({
        name: c.name,
        price: c.price,
        sourceImage: c.sourceImage,
        rawText: c.rawText ?? c.name,
      })
    );

    const result = await container.menuService.classifyMenu(candidates, ctx.requestId, ctx.signal);
    return jsonResponse(toClassifyResponse(result), 200, { 'X-Request-Id': ctx.requestId });
  });

  return { classify };
}
