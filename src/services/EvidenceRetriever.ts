/**
 * Semantic signal from the knowledge index.
 * Embeds the dish name, fetches the top-K nearest knowledge entries, and
 * turns their labelled relevance scores into a verdict.
 */

import type { EngineConfig } from '../config.js';
import { TimeoutError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IEmbeddingProvider } from '../providers/IEmbeddingProvider.js';
import type { IKnowledgeRepository } from '../repositories/IKnowledgeRepository.js';
import type { ScoredKnowledgeEntryRow } from '../types/database.js';
import type { EvidenceMatch, LayerOutcome, SignalVerdict } from '../types/models.js';
import { isAbortLike, runWithTimeout } from '../utils/concurrency.js';
import type { RetrievalLayer, RetrievalResult } from './layers.js';

/** Retrieval never claims more certainty than this. */
export const RAG_CONFIDENCE_CAP = 0.85;

export class EvidenceRetriever implements RetrievalLayer {
  constructor(
    private readonly knowledgeRepo: IKnowledgeRepository,
    private readonly embeddingProvider: IEmbeddingProvider,
    private readonly config: Pick<EngineConfig, 'ragTopK' | 'retrievalTimeoutMs'>,
    private readonly logProvider: ILogProvider
  ) {}

  async retrieve(name: string, signal?: AbortSignal): Promise<RetrievalResult> {
    const query = name.trim();
    if (!query) {
      return { outcome: { status: 'no_verdict', reason: 'empty name' }, matches: [] };
    }

    let rows: ScoredKnowledgeEntryRow[];
    try {
      rows = await runWithTimeout(
        'knowledge search',
        this.config.retrievalTimeoutMs,
        async () => {
          const embedding = await this.embeddingProvider.generate(query);
          return this.knowledgeRepo.vectorSearch(embedding, {
            maxResults: this.config.ragTopK,
          });
        },
        signal
      );
    } catch (err) {
      const reason = failureReason(err);
      this.logProvider.warn('Knowledge search failed', { dish: query, reason });
      return { outcome: { status: 'no_verdict', reason }, matches: [] };
    }

    const matches = rows.slice(0, this.config.ragTopK).map(toMatch);
    return { outcome: scoreEvidence(matches), matches };
  }
}

/**
 * Relevance-weighted vote over labelled matches.
 * Ties go to non-vegetarian.
 */
export function scoreEvidence(matches: readonly EvidenceMatch[]): LayerOutcome {
  if (matches.length === 0) {
    return { status: 'no_verdict', reason: 'no matches' };
  }

  let vegScore = 0;
  let nonVegScore = 0;
  for (const match of matches) {
    if (match.isVegetarian) {
      vegScore += match.relevance;
    } else {
      nonVegScore += match.relevance;
    }
  }

  const total = vegScore + nonVegScore;
  if (total === 0) {
    return { status: 'no_verdict', reason: 'no relevant matches' };
  }

  return {
    status: 'verdict',
    verdict: Object.freeze<SignalVerdict>({
      layer: 'rag',
      isVegetarian: vegScore > nonVegScore,
      confidence: Math.min(RAG_CONFIDENCE_CAP, Math.max(vegScore, nonVegScore) / total),
      evidence: { kind: 'rag', vegScore, nonVegScore, matches: [...matches] },
    }),
  };
}

function toMatch(row: ScoredKnowledgeEntryRow): EvidenceMatch {
  return {
    id: row.id,
    name: row.name,
    document: row.document,
    isVegetarian: row.is_vegetarian,
    category: row.category,
    relevance: Math.max(0, Math.min(1, row.similarity)),
  };
}

function failureReason(err: unknown): string {
  if (err instanceof TimeoutError) return 'index timeout';
  if (isAbortLike(err)) return 'cancelled';
  const message = err instanceof Error ? err.message : String(err);
  return `index unreachable: ${message}`;
}
