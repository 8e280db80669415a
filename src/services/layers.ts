/**
 * Contracts between the Reconciler and its three signal layers.
 * Tests substitute scripted implementations for any of them.
 */

import type { EvidenceMatch, LayerOutcome } from '../types/models.js';

export interface KeywordLayer {
  match(name: string): LayerOutcome;
}

export interface RetrievalResult {
  outcome: LayerOutcome;
  /** Ranked matches, empty when the index failed or found nothing. */
  matches: EvidenceMatch[];
}

export interface RetrievalLayer {
  retrieve(name: string, signal?: AbortSignal): Promise<RetrievalResult>;
}

export interface ModelRequest {
  name: string;
  evidence: EvidenceMatch[];
}

/** `skipped` means the candidate's batch was never sent (request deadline). */
export type ModelOutcome = LayerOutcome | { status: 'skipped'; reason: string };

export interface ModelLayer {
  /** One outcome per request, in request order. */
  classify(requests: ModelRequest[], signal?: AbortSignal): Promise<ModelOutcome[]>;
}
