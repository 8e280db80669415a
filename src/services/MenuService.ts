/**
 * Menu service.
 * Makes sure the knowledge index is seeded, runs a request's candidates
 * through the reconciler, opens a review session for the results, and
 * reports the total when nothing needs review.
 *
 * One request deadline covers both the wait for the index and
 * classification. When seeding outlasts it, classification goes ahead
 * against whatever the index holds and seeding carries on in the background.
 */

import type { EngineConfig } from '../config.js';
import { ValidationError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { AggregateResult, DishCandidate } from '../types/models.js';
import { runWithTimeout, startDeadline } from '../utils/concurrency.js';
import type { KnowledgeIndexer } from './KnowledgeIndexer.js';
import type { Reconciler } from './Reconciler.js';
import type { ReviewService } from './ReviewService.js';
import type { ReviewSessionView } from './ReviewSession.js';
import { sumVegetarianPrices } from './PriceAggregator.js';

export interface MenuClassification extends ReviewSessionView {
  allItems: AggregateResult[];
  /** Present when the session resolved without review. */
  vegetarianItems?: AggregateResult[];
  totalSum?: number;
  itemCount?: number;
}

export class MenuService {
  constructor(
    private readonly reconciler: Reconciler,
    private readonly reviewService: ReviewService,
    private readonly knowledgeIndexer: Pick<KnowledgeIndexer, 'ensureIndexed'>,
    private readonly config: Pick<EngineConfig, 'requestDeadlineMs'>,
    private readonly logProvider: ILogProvider
  ) {}

  async classifyMenu(
    candidates: readonly DishCandidate[],
    requestId: string,
    signal?: AbortSignal
  ): Promise<MenuClassification> {
    if (candidates.length === 0) {
      throw new ValidationError('At least one dish candidate is required');
    }

    const deadline = startDeadline(this.config.requestDeadlineMs, signal);
    let results: AggregateResult[];
    try {
      await this.waitForIndex(requestId, deadline.signal);
      results = await this.reconciler.reconcile(candidates, {
        signal: deadline.signal,
        requestId,
      });
    } finally {
      deadline.dispose();
    }

    const session = await this.reviewService.create(results, requestId);

    if (session.status === 'needs_review') {
      return { ...session, allItems: results };
    }

    const vegetarianItems = results.filter((r) => r.isVegetarian);
    const { total, itemCount } = sumVegetarianPrices(vegetarianItems);
    return {
      ...session,
      allItems: results,
      vegetarianItems,
      totalSum: total,
      itemCount,
    };
  }

  // ── Private ──

  private async waitForIndex(requestId: string, signal: AbortSignal): Promise<void> {
    try {
      await runWithTimeout(
        'knowledge indexing',
        this.config.requestDeadlineMs,
        () => this.knowledgeIndexer.ensureIndexed(),
        signal
      );
    } catch (err) {
      this.logProvider.warn('Knowledge index not ready, classifying without it', {
        requestId,
        reason: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
