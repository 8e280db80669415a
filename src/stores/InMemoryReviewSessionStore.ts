/**
 * In-memory review session store.
 * Single-process only; expired entries are dropped lazily on read and on
 * each write.
 */

import type { ReviewSessionSnapshot } from '../services/ReviewSession.js';
import type { IReviewSessionStore } from './IReviewSessionStore.js';

interface Entry {
  snapshot: ReviewSessionSnapshot;
  expiresAt: number;
}

export class InMemoryReviewSessionStore implements IReviewSessionStore {
  private readonly sessions = new Map<string, Entry>();

  constructor(
    private readonly ttlSeconds: number,
    private readonly now: () => number = Date.now
  ) {}

  async get(requestId: string): Promise<ReviewSessionSnapshot | null> {
    const entry = this.sessions.get(requestId);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.sessions.delete(requestId);
      return null;
    }
    return structuredClone(entry.snapshot);
  }

  async save(snapshot: ReviewSessionSnapshot): Promise<void> {
    this.evictExpired();
    this.sessions.set(snapshot.requestId, {
      snapshot: structuredClone(snapshot),
      expiresAt: Date.parse(snapshot.createdAt) + this.ttlSeconds * 1000,
    });
  }

  async delete(requestId: string): Promise<void> {
    this.sessions.delete(requestId);
  }

  get size(): number {
    return this.sessions.size;
  }

  // ── Private ──

  private evictExpired(): void {
    const now = this.now();
    for (const [id, entry] of this.sessions) {
      if (entry.expiresAt <= now) this.sessions.delete(id);
    }
  }
}
