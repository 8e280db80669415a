/**
 * Seeds the knowledge index from the curated knowledge base.
 *
 * Indexing runs at most once per process: the first caller triggers it and
 * later callers await the same run. An index that already holds entries is
 * left untouched. A failed run is logged and forgotten, so the next request
 * retries; classification carries on with whatever the index returns.
 */

import { entryDocument, type KnowledgeBase } from '../knowledge/KnowledgeBase.js';
import type { IEmbeddingProvider } from '../providers/IEmbeddingProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IKnowledgeRepository } from '../repositories/IKnowledgeRepository.js';
import type { KnowledgeEntryRow } from '../types/database.js';

const EMBEDDING_BATCH_SIZE = 64;

export class KnowledgeIndexer {
  private pending: Promise<boolean> | null = null;
  private indexed = false;

  constructor(
    private readonly knowledgeBase: KnowledgeBase,
    private readonly knowledgeRepo: IKnowledgeRepository,
    private readonly embeddingProvider: IEmbeddingProvider,
    private readonly logProvider: ILogProvider
  ) {}

  /** Resolves true once the index holds the knowledge base. Never rejects. */
  ensureIndexed(): Promise<boolean> {
    if (this.indexed) return Promise.resolve(true);
    if (!this.pending) {
      this.pending = this.run().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  // ── Private ──

  private async run(): Promise<boolean> {
    try {
      const existing = await this.knowledgeRepo.count();
      if (existing > 0) {
        this.indexed = true;
        return true;
      }

      const rows = this.knowledgeBase.entries.map(toRow);
      for (let i = 0; i < rows.length; i += EMBEDDING_BATCH_SIZE) {
        const batch = rows.slice(i, i + EMBEDDING_BATCH_SIZE);
        const embeddings = await this.embeddingProvider.generateBatch(batch.map((r) => r.document));
        if (embeddings.length !== batch.length) {
          throw new Error(
            `Embedding provider returned ${embeddings.length} vectors for ${batch.length} documents`
          );
        }
        await this.knowledgeRepo.upsert(
          batch.map((row, j) => ({ ...row, embedding: embeddings[j] }))
        );
      }

      this.indexed = true;
      this.logProvider.info('Knowledge index seeded', {
        entries: rows.length,
        version: this.knowledgeBase.version,
      });
      return true;
    } catch (err) {
      this.logProvider.warn('Knowledge indexing failed', {
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }
}

function toRow(entry: KnowledgeBase['entries'][number]): KnowledgeEntryRow {
  return {
    id: entry.id,
    name: entry.name,
    kind: entry.kind,
    is_vegetarian: entry.isVegetarian,
    category: entry.category,
    description: entry.description,
    notes: entry.notes,
    document: entryDocument(entry),
  };
}
