/**
 * In-process knowledge index.
 * Exact cosine-similarity scan over every entry; the knowledge base is small
 * enough that no approximate index is needed.
 */

import type { IKnowledgeRepository, VectorSearchOptions } from './IKnowledgeRepository.js';
import type { IndexedKnowledgeEntryRow, ScoredKnowledgeEntryRow } from '../types/database.js';

export class InMemoryKnowledgeRepository implements IKnowledgeRepository {
  private readonly rows = new Map<string, IndexedKnowledgeEntryRow>();

  async vectorSearch(
    embedding: number[],
    options: VectorSearchOptions
  ): Promise<ScoredKnowledgeEntryRow[]> {
    const scored: ScoredKnowledgeEntryRow[] = [];
    for (const { embedding: stored, ...row } of this.rows.values()) {
      scored.push({ ...row, similarity: cosineSimilarity(embedding, stored) });
    }

    return scored
      .sort((a, b) => b.similarity - a.similarity || a.id.localeCompare(b.id))
      .slice(0, options.maxResults);
  }

  async upsert(rows: IndexedKnowledgeEntryRow[]): Promise<void> {
    for (const row of rows) {
      this.rows.set(row.id, { ...row, embedding: [...row.embedding] });
    }
  }

  async count(): Promise<number> {
    return this.rows.size;
  }
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 0 : dotProduct / denominator;
}
