/**
 * In-memory feedback store.
 * Keeps the most recent `maxRecords` entries; older ones are dropped.
 */

import type { FeedbackRecord, IFeedbackStore } from './IFeedbackStore.js';

const DEFAULT_MAX_RECORDS = 10_000;

export class InMemoryFeedbackStore implements IFeedbackStore {
  private records: FeedbackRecord[] = [];

  constructor(private readonly maxRecords: number = DEFAULT_MAX_RECORDS) {}

  async append(records: readonly FeedbackRecord[]): Promise<void> {
    this.records.push(...records.map((r) => ({ ...r })));
    if (this.records.length > this.maxRecords) {
      this.records = this.records.slice(-this.maxRecords);
    }
  }

  async list(): Promise<FeedbackRecord[]> {
    return this.records.map((r) => ({ ...r }));
  }
}
