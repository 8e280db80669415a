/**
 * Review service.
 * Owns the lifecycle of review sessions: creation after classification,
 * lookup, and correction submissions. Submissions for the same request are
 * applied one at a time. Every applied correction is kept as reviewer
 * feedback and summarized by `feedbackStats`.
 */

import { randomUUID } from 'node:crypto';
import type { EngineConfig } from '../config.js';
import { NotFoundError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { FeedbackRecord, IFeedbackStore } from '../stores/IFeedbackStore.js';
import { InMemoryFeedbackStore } from '../stores/InMemoryFeedbackStore.js';
import type { IReviewSessionStore } from '../stores/IReviewSessionStore.js';
import type { AggregateResult, Correction } from '../types/models.js';
import { ReviewSession, type ReviewResolution, type ReviewSessionView } from './ReviewSession.js';

const RECENT_FEEDBACK = 20;

export interface DishFeedback {
  vegCount: number;
  nonVegCount: number;
}

export interface FeedbackStats {
  totalCorrections: number;
  uniqueDishes: number;
  dishStats: Record<string, DishFeedback>;
  /** Latest records, oldest first. */
  recentFeedback: FeedbackRecord[];
}

export class ReviewService {
  private readonly locks = new Map<string, Promise<void>>();

  constructor(
    private readonly store: IReviewSessionStore,
    private readonly config: Pick<EngineConfig, 'hitlThreshold'>,
    private readonly logProvider: ILogProvider,
    private readonly now: () => number = Date.now,
    private readonly feedbackStore: IFeedbackStore = new InMemoryFeedbackStore()
  ) {}

  async create(
    results: readonly AggregateResult[],
    requestId: string = randomUUID()
  ): Promise<ReviewSessionView> {
    const session = ReviewSession.create(
      requestId,
      results,
      this.config.hitlThreshold,
      new Date(this.now())
    );
    await this.store.save(session.toSnapshot());

    const view = session.view();
    if (view.status === 'needs_review') {
      this.logProvider.info('Review session opened', {
        requestId,
        confident: view.confidentItems.length,
        uncertain: view.uncertainItems.length,
      });
    }
    return view;
  }

  async get(requestId: string): Promise<ReviewSessionView> {
    const session = await this.load(requestId);
    return session.view();
  }

  async applyCorrections(
    requestId: string,
    corrections: readonly Correction[]
  ): Promise<ReviewResolution> {
    return this.withLock(requestId, async () => {
      const session = await this.load(requestId);
      const alreadyResolved = session.status === 'resolved';
      const { resolution, corrected } = session.applyCorrections(corrections);

      if (!alreadyResolved) {
        await this.store.save(session.toSnapshot());
      }

      if (corrected.length > 0) {
        const timestamp = new Date(this.now()).toISOString();
        await this.feedbackStore.append(
          corrected.map((item) => ({
            timestamp,
            requestId,
            dishName: item.candidate.name,
            humanLabel: item.isVegetarian,
            feedbackType: 'hitl_correction',
          }))
        );
      }

      for (const item of corrected) {
        this.logProvider.info('Review correction applied', {
          requestId,
          feedbackType: 'hitl_correction',
          dish: item.candidate.name,
          isVegetarian: item.isVegetarian,
          method: item.method,
        });
      }

      this.logProvider.info('Review session resolved', {
        requestId,
        submitted: corrections.length,
        applied: corrected.length,
        repeat: alreadyResolved,
        totalSum: resolution.totalSum,
      });
      return resolution;
    });
  }

  async feedbackStats(): Promise<FeedbackStats> {
    const records = await this.feedbackStore.list();
    const byDish = new Map<string, DishFeedback>();
    for (const record of records) {
      const stats = byDish.get(record.dishName) ?? { vegCount: 0, nonVegCount: 0 };
      if (record.humanLabel) stats.vegCount++;
      else stats.nonVegCount++;
      byDish.set(record.dishName, stats);
    }

    return {
      totalCorrections: records.length,
      uniqueDishes: byDish.size,
      dishStats: Object.fromEntries(byDish),
      recentFeedback: records.slice(-RECENT_FEEDBACK),
    };
  }

  // ── Private ──

  private async load(requestId: string): Promise<ReviewSession> {
    const snapshot = await this.store.get(requestId);
    if (!snapshot) {
      throw new NotFoundError(`Review session "${requestId}" not found or expired`);
    }
    return ReviewSession.fromSnapshot(snapshot);
  }

  private async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve();
    const run = previous.then(fn);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.locks.get(key) === tail) {
        this.locks.delete(key);
      }
    }
  }
}
