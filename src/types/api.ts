/**
 * API types: shapes for request/response payloads.
 * Decoupled from domain models so the API can evolve independently.
 */

import type { ReviewStatus } from './models.js';

// ── Requests ──

export interface ClassifyMenuRequest {
  candidates: Array<{
    name: string;
    price: number;
    sourceImage?: number;
    rawText?: string;
  }>;
}

export interface SubmitReviewRequest {
  requestId: string;
  corrections: Array<{ name: string; isVegetarian: boolean }>;
}

// ── Responses ──

export interface FallbackStepResponse {
  layer: string;
  confidence: number;
  reason?: string;
}

export interface DishResultResponse {
  name: string;
  price: number;
  sourceImage: number;
  isVegetarian: boolean;
  confidence: number;
  method: string;
  fallbackChain: FallbackStepResponse[];
  evidence: string[];
  humanReviewed?: boolean;
}

export interface ClassifyMenuResponse {
  requestId: string;
  status: ReviewStatus;
  allItems: DishResultResponse[];
  confidentItems: DishResultResponse[];
  uncertainItems: DishResultResponse[];
  partialSum: number;
  vegetarianItems?: DishResultResponse[];
  totalSum?: number;
  itemCount?: number;
}

export interface ReviewSessionResponse {
  requestId: string;
  status: ReviewStatus;
  confidentItems: DishResultResponse[];
  uncertainItems: DishResultResponse[];
  partialSum: number;
}

export interface ReviewResultResponse {
  requestId: string;
  status: 'resolved';
  vegetarianItems: DishResultResponse[];
  totalSum: number;
  itemCount: number;
  appliedCorrections: number;
}

export interface FeedbackStatsResponse {
  totalCorrections: number;
  uniqueDishes: number;
  dishStats: Record<string, { vegCount: number; nonVegCount: number }>;
  recentFeedback: Array<{
    timestamp: string;
    requestId: string;
    dishName: string;
    isVegetarian: boolean;
    feedbackType: string;
  }>;
}

export interface ApiErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}
