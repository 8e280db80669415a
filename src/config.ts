/**
 * Engine configuration.
 * Built once at startup (from the environment or explicit overrides), frozen,
 * and handed to the services at construction. Nothing reads process.env
 * while a request is in flight.
 */

import { z } from 'zod';
import type { SignalLayer } from './types/models.js';

export type LayerWeights = Readonly<Record<SignalLayer, number>>;

export interface EngineConfig {
  /** Auto-accept floor for a single layer's verdict. */
  readonly confidenceThreshold: number;
  /** Review floor: results below it go to human review. */
  readonly hitlThreshold: number;
  readonly llmBatchSize: number;
  readonly llmConcurrency: number;
  readonly ragTopK: number;
  readonly candidateConcurrency: number;
  readonly retrievalTimeoutMs: number;
  readonly llmTimeoutMs: number;
  readonly requestDeadlineMs: number;
  readonly reviewSessionTtlSeconds: number;
  readonly layerWeights: LayerWeights;
}

const unitInterval = z.coerce.number().min(0).max(1);
const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  CONFIDENCE_THRESHOLD: unitInterval.default(0.7),
  HITL_THRESHOLD: unitInterval.default(0.5),
  LLM_BATCH_SIZE: positiveInt.default(8),
  LLM_CONCURRENCY: positiveInt.default(2),
  RAG_TOP_K: positiveInt.default(5),
  CANDIDATE_CONCURRENCY: positiveInt.default(8),
  RETRIEVAL_TIMEOUT_MS: positiveInt.default(5_000),
  LLM_TIMEOUT_MS: positiveInt.default(60_000),
  REQUEST_DEADLINE_MS: positiveInt.default(120_000),
  REVIEW_SESSION_TTL_SECONDS: positiveInt.default(3_600),
});

const DEFAULT_LAYER_WEIGHTS: LayerWeights = Object.freeze({
  keyword: 0.4,
  rag: 0.3,
  llm: 0.3,
});

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
  confidenceThreshold: 0.7,
  hitlThreshold: 0.5,
  llmBatchSize: 8,
  llmConcurrency: 2,
  ragTopK: 5,
  candidateConcurrency: 8,
  retrievalTimeoutMs: 5_000,
  llmTimeoutMs: 60_000,
  requestDeadlineMs: 120_000,
  reviewSessionTtlSeconds: 3_600,
  layerWeights: DEFAULT_LAYER_WEIGHTS,
});

/**
 * Build a frozen config from defaults plus overrides.
 * Layer weights must be positive; they are renormalized at combine time,
 * so they need not sum to 1.
 */
export function createEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const weights = overrides.layerWeights ?? DEFAULT_LAYER_WEIGHTS;
  for (const [layer, weight] of Object.entries(weights)) {
    if (!(weight > 0)) {
      throw new Error(`Layer weight for "${layer}" must be positive, got ${weight}`);
    }
  }

  return Object.freeze({
    ...DEFAULT_ENGINE_CONFIG,
    ...overrides,
    layerWeights: Object.freeze({ ...weights }),
  });
}

/** Read engine settings from environment variables. Throws on invalid values. */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid engine configuration: ${problems}`);
  }

  const e = parsed.data;
  return createEngineConfig({
    confidenceThreshold: e.CONFIDENCE_THRESHOLD,
    hitlThreshold: e.HITL_THRESHOLD,
    llmBatchSize: e.LLM_BATCH_SIZE,
    llmConcurrency: e.LLM_CONCURRENCY,
    ragTopK: e.RAG_TOP_K,
    candidateConcurrency: e.CANDIDATE_CONCURRENCY,
    retrievalTimeoutMs: e.RETRIEVAL_TIMEOUT_MS,
    llmTimeoutMs: e.LLM_TIMEOUT_MS,
    requestDeadlineMs: e.REQUEST_DEADLINE_MS,
    reviewSessionTtlSeconds: e.REVIEW_SESSION_TTL_SECONDS,
  });
}
