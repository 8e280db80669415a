/**
 * Domain → API payload mapping.
 */

import type { MenuClassification } from '../services/MenuService.js';
import type { FeedbackStats } from '../services/ReviewService.js';
import type { ReviewResolution, ReviewSessionView } from '../services/ReviewSession.js';
import type { AggregateResult, ReviewItem } from '../types/models.js';
import type {
  ClassifyMenuResponse,
  DishResultResponse,
  FeedbackStatsResponse,
  ReviewResultResponse,
  ReviewSessionResponse,
} from '../types/api.js';

export function toDishResponse(item: AggregateResult | ReviewItem): DishResultResponse {
  return {
    name: item.candidate.name,
    price: item.candidate.price,
    sourceImage: item.candidate.sourceImage,
    isVegetarian: item.isVegetarian,
    confidence: roundConfidence(item.confidence),
    method: item.method,
    fallbackChain: item.fallbackChain.map((step) => ({
      ...step,
      confidence: roundConfidence(step.confidence),
    })),
    evidence: [...item.evidence],
    ...('humanReviewed' in item && { humanReviewed: item.humanReviewed }),
  };
}

export function toSessionResponse(view: ReviewSessionView): ReviewSessionResponse {
  return {
    requestId: view.requestId,
    status: view.status,
    confidentItems: view.confidentItems.map(toDishResponse),
    uncertainItems: view.uncertainItems.map(toDishResponse),
    partialSum: view.partialSum,
  };
}

export function toClassifyResponse(result: MenuClassification): ClassifyMenuResponse {
  return {
    ...toSessionResponse(result),
    allItems: result.allItems.map(toDishResponse),
    ...(result.vegetarianItems && { vegetarianItems: result.vegetarianItems.map(toDishResponse) }),
    ...(result.totalSum !== undefined && { totalSum: result.totalSum }),
    ...(result.itemCount !== undefined && { itemCount: result.itemCount }),
  };
}

export function toReviewResultResponse(resolution: ReviewResolution): ReviewResultResponse {
  return {
    requestId: resolution.requestId,
    status: resolution.status,
    vegetarianItems: resolution.vegetarianItems.map(toDishResponse),
    totalSum: resolution.totalSum,
    itemCount: resolution.itemCount,
    appliedCorrections: resolution.appliedCorrections,
  };
}

export function toFeedbackStatsResponse(stats: FeedbackStats): FeedbackStatsResponse {
  return {
    totalCorrections: stats.totalCorrections,
    uniqueDishes: stats.uniqueDishes,
    dishStats: stats.dishStats,
    recentFeedback: stats.recentFeedback.map((record) => ({
      timestamp: record.timestamp,
      requestId: record.requestId,
      dishName: record.dishName,
      isVegetarian: record.humanLabel,
      feedbackType: record.feedbackType,
    })),
  };
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

function roundConfidence(value: number): number {
  return Math.round(value * 1000) / 1000;
}
