/**
 * Review endpoints.
 * POST /api/v1/review: submit corrections and resolve the session
 * GET  /api/v1/review/:requestId: current session state
 * GET  /api/v1/review/feedback/stats: tally of reviewer corrections
 */

import { z } from 'zod';
import { pipeline, errorHandler, validateBody } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { NotFoundError, ValidationError } from '../errors.js';
import type { BodySchema } from '../types/common.js';
import {
  jsonResponse,
  toFeedbackStatsResponse,
  toReviewResultResponse,
  toSessionResponse,
} from './responses.js';

const reviewSchema: BodySchema = {
  requestId: { type: 'string', required: true, minLength: 1, maxLength: 100 },
  corrections: { type: 'array', required: true, maxItems: 500 },
};

const bodySchema = z.object({
  requestId: z.string().trim().min(1),
  corrections: z.array(
    z.object({
      name: z.string().min(1).max(200),
      isVegetarian: z.boolean(),
    })
  ),
});

export function createReviewHandlers(container: Container) {
  const submit: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(reviewSchema)
  )(async (req) => {
    const parsed = bodySchema.safeParse(await req.json());
    if (!parsed.success) {
      throw new ValidationError('Invalid review submission', {
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }

    const resolution = await container.reviewService.applyCorrections(
      parsed.data.requestId,
      parsed.data.corrections
    );
    return jsonResponse(toReviewResultResponse(resolution));
  });

  const getSession: Handler = pipeline(
    container.logging,
    errorHandler
  )(async (req) => {
    const segment = new URL(req.url).pathname.split('/').filter(Boolean).pop() ?? '';
    const view = await container.reviewService.get(decodeRequestId(segment));
    return jsonResponse(toSessionResponse(view));
  });

  const feedbackStats: Handler = pipeline(
    container.logging,
    errorHandler
  )(async () => {
    const stats = await container.reviewService.feedbackStats();
    return jsonResponse(toFeedbackStatsResponse(stats));
  });

  return { submit, getSession, feedbackStats };
}

function decodeRequestId(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new NotFoundError(`Review session "${segment}" not found or expired`);
  }
}
