/**
 * Mock knowledge repository for testing.
 * Returns a fixed, pre-scored result list for every search, so retrieval
 * math can be asserted exactly.
 */

import type {
  IKnowledgeRepository,
  VectorSearchOptions,
} from '../../src/repositories/IKnowledgeRepository.js';
import type {
  IndexedKnowledgeEntryRow,
  ScoredKnowledgeEntryRow,
} from '../../src/types/database.js';

export class MockKnowledgeRepository implements IKnowledgeRepository {
  public searchCount = 0;
  public lastOptions: VectorSearchOptions | null = null;
  public upserted: IndexedKnowledgeEntryRow[] = [];
  public failWith: Error | null = null;
  /** Delay before vectorSearch resolves, in ms. */
  public delayMs = 0;

  constructor(private results: ScoredKnowledgeEntryRow[] = []) {}

  setResults(results: ScoredKnowledgeEntryRow[]): void {
    this.results = results;
  }

  async vectorSearch(
    _embedding: number[],
    options: VectorSearchOptions
  ): Promise<ScoredKnowledgeEntryRow[]> {
    this.searchCount++;
    this.lastOptions = options;
    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }
    if (this.failWith) throw this.failWith;
    return this.results.slice(0, options.maxResults);
  }

  async upsert(rows: IndexedKnowledgeEntryRow[]): Promise<void> {
    this.upserted.push(...rows);
  }

  async count(): Promise<number> {
    return this.upserted.length;
  }
}

/** Build a scored row with sensible defaults. */
export function scoredRow(
  name: string,
  isVegetarian: boolean,
  similarity: number,
  overrides: Partial<ScoredKnowledgeEntryRow> = {}
): ScoredKnowledgeEntryRow {
  return {
    id: `dish_${name.toLowerCase().replace(/\s+/g, '_')}`,
    name,
    kind: 'dish',
    is_vegetarian: isVegetarian,
    category: isVegetarian ? 'vegetable' : 'meat',
    description: `${name} description`,
    notes: '',
    document: `${name}: ${name} description`,
    similarity,
    ...overrides,
  };
}
