/**
 * Human-in-the-loop review state for one classification request.
 *
 * A session partitions results by the review threshold. It starts in
 * `needs_review` when anything is uncertain and moves to `resolved` exactly
 * once, on the first correction submission. Resolved sessions are read-only:
 * later submissions return the stored resolution unchanged.
 */

import type { AggregateResult, Correction, ReviewItem, ReviewStatus } from '../types/models.js';
import { sumVegetarianPrices, toCents } from './PriceAggregator.js';

/** Plain, JSON-safe form used by session stores. */
export interface ReviewSessionSnapshot {
  requestId: string;
  status: ReviewStatus;
  confidentItems: ReviewItem[];
  uncertainItems: ReviewItem[];
  partialSum: number;
  /** ISO-8601 timestamp. */
  createdAt: string;
  appliedCorrections: number;
}

export interface ReviewSessionView {
  requestId: string;
  status: ReviewStatus;
  confidentItems: ReviewItem[];
  uncertainItems: ReviewItem[];
  partialSum: number;
}

export interface ReviewResolution {
  requestId: string;
  status: 'resolved';
  vegetarianItems: ReviewItem[];
  totalSum: number;
  /** Number of vegetarian items in the total. */
  itemCount: number;
  appliedCorrections: number;
}

export interface CorrectionOutcome {
  resolution: ReviewResolution;
  /** Items changed by this submission; empty for a repeat submission. */
  corrected: ReviewItem[];
}

export class ReviewSession {
  private constructor(private snapshot: ReviewSessionSnapshot) {}

  static create(
    requestId: string,
    results: readonly AggregateResult[],
    hitlThreshold: number,
    now: Date = new Date()
  ): ReviewSession {
    const confidentItems: ReviewItem[] = [];
    const uncertainItems: ReviewItem[] = [];
    for (const result of results) {
      const item: ReviewItem = { ...result, humanReviewed: false };
      (result.confidence >= hitlThreshold ? confidentItems : uncertainItems).push(item);
    }

    return new ReviewSession({
      requestId,
      status: uncertainItems.length === 0 ? 'resolved' : 'needs_review',
      confidentItems,
      uncertainItems,
      partialSum: sumVegetarianPrices(confidentItems).total,
      createdAt: now.toISOString(),
      appliedCorrections: 0,
    });
  }

  static fromSnapshot(snapshot: ReviewSessionSnapshot): ReviewSession {
    return new ReviewSession(structuredClone(snapshot));
  }

  get requestId(): string {
    return this.snapshot.requestId;
  }

  get status(): ReviewStatus {
    return this.snapshot.status;
  }

  get createdAt(): Date {
    return new Date(this.snapshot.createdAt);
  }

  view(): ReviewSessionView {
    const { requestId, status, confidentItems, uncertainItems, partialSum } = this.snapshot;
    return {
      requestId,
      status,
      confidentItems: [...confidentItems],
      uncertainItems: [...uncertainItems],
      partialSum,
    };
  }

  /**
   * Apply reviewer corrections and resolve the session.
   *
   * Names are matched case-insensitively after trimming; when a name appears
   * more than once the last correction wins. Names that are not pending
   * review are ignored. Uncorrected uncertain items stay uncertain and are
   * left out of the total.
   */
  applyCorrections(corrections: readonly Correction[]): CorrectionOutcome {
    if (this.snapshot.status === 'resolved') {
      return { resolution: this.resolution(), corrected: [] };
    }

    const byName = new Map<string, boolean>();
    for (const correction of corrections) {
      byName.set(normalizeName(correction.name), correction.isVegetarian);
    }

    const corrected: ReviewItem[] = [];
    const stillUncertain: ReviewItem[] = [];
    for (const item of this.snapshot.uncertainItems) {
      const verdict = byName.get(normalizeName(item.candidate.name));
      if (verdict === undefined) {
        stillUncertain.push(item);
        continue;
      }
      corrected.push({ ...item, isVegetarian: verdict, confidence: 1.0, humanReviewed: true });
    }

    const confidentItems = [...this.snapshot.confidentItems, ...corrected];
    const correctedCents = corrected
      .filter((item) => item.isVegetarian)
      .reduce((sum, item) => sum + toCents(item.candidate.price), 0);

    this.snapshot = {
      ...this.snapshot,
      status: 'resolved',
      confidentItems,
      uncertainItems: stillUncertain,
      partialSum: (toCents(this.snapshot.partialSum) + correctedCents) / 100,
      appliedCorrections: corrected.length,
    };

    return { resolution: this.resolution(), corrected };
  }

  /** Final result. Only meaningful once resolved. */
  resolution(): ReviewResolution {
    const vegetarianItems = this.snapshot.confidentItems.filter((item) => item.isVegetarian);
    return {
      requestId: this.snapshot.requestId,
      status: 'resolved',
      vegetarianItems,
      totalSum: this.snapshot.partialSum,
      itemCount: vegetarianItems.length,
      appliedCorrections: this.snapshot.appliedCorrections,
    };
  }

  toSnapshot(): ReviewSessionSnapshot {
    return structuredClone(this.snapshot);
  }
}

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}
