/**
 * Knowledge index data access interface.
 * Written by the indexer, read-only during a request.
 */

import type { IndexedKnowledgeEntryRow, ScoredKnowledgeEntryRow } from '../types/database.js';

export interface VectorSearchOptions {
  maxResults: number;
}

export interface IKnowledgeRepository {
  /** Entries ranked by similarity to the embedding, best first. */
  vectorSearch(
    embedding: number[],
    options: VectorSearchOptions
  ): Promise<ScoredKnowledgeEntryRow[]>;

  /** Insert or replace entries by id. */
  upsert(rows: IndexedKnowledgeEntryRow[]): Promise<void>;

  /** Total number of indexed entries. */
  count(): Promise<number>;
}
