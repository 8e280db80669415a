/**
 * Database row types. Mirrors the Supabase table schema.
 * Column names use snake_case to match PostgreSQL conventions.
 */

export interface KnowledgeEntryRow {
  id: string;
  name: string;
  kind: 'ingredient' | 'dish';
  is_vegetarian: boolean;
  category: string;
  description: string;
  notes: string;
  /** Text the embedding was computed from. */
  document: string;
}

export interface IndexedKnowledgeEntryRow extends KnowledgeEntryRow {
  embedding: number[];
}

export interface ScoredKnowledgeEntryRow extends KnowledgeEntryRow {
  /** Cosine similarity to the query embedding. */
  similarity: number;
}
