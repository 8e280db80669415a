/**
 * Supabase implementation of IKnowledgeRepository.
 * Uses pgvector for semantic similarity search.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IKnowledgeRepository, VectorSearchOptions } from './IKnowledgeRepository.js';
import type { IndexedKnowledgeEntryRow, ScoredKnowledgeEntryRow } from '../types/database.js';

export class SupabaseKnowledgeRepository implements IKnowledgeRepository {
  constructor(private readonly db: SupabaseClient) {}

  /**
   * Vector similarity search using pgvector.
   * Calls a Supabase RPC function that handles the cosine similarity query.
   */
  async vectorSearch(
    embedding: number[],
    options: VectorSearchOptions
  ): Promise<ScoredKnowledgeEntryRow[]> {
    const { data, error } = await this.db.rpc('match_knowledge_entries', {
      query_embedding: JSON.stringify(embedding),
      match_count: options.maxResults,
    });

    if (error) throw new Error(`Failed to search knowledge entries: ${error.message}`);
    return (data ?? []) as ScoredKnowledgeEntryRow[];
  }

  async upsert(rows: IndexedKnowledgeEntryRow[]): Promise<void> {
    if (rows.length === 0) return;

    const { error } = await this.db.from('knowledge_entries').upsert(
      rows.map((row) => ({ ...row, embedding: JSON.stringify(row.embedding) })),
      { onConflict: 'id' }
    );

    if (error) throw new Error(`Failed to upsert knowledge entries: ${error.message}`);
  }

  async count(): Promise<number> {
    const { count, error } = await this.db
      .from('knowledge_entries')
      .select('*', { count: 'exact', head: true });

    if (error) throw new Error(`Failed to count knowledge entries: ${error.message}`);
    return count ?? 0;
  }
}
