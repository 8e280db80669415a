/**
 * Builders for domain values used across service tests.
 */

import type {
  AggregateResult,
  ClassificationMethod,
  DishCandidate,
} from '../../src/types/models.js';

export function candidate(name: string, price: number, sourceImage = 1): DishCandidate {
  return { name, price, sourceImage, rawText: `${name} ${price.toFixed(2)}` };
}

export function result(
  name: string,
  price: number,
  isVegetarian: boolean,
  confidence: number,
  method: ClassificationMethod = 'combined'
): AggregateResult {
  return {
    candidate: candidate(name, price),
    isVegetarian,
    confidence,
    fallbackChain: method === 'unresolved' ? [] : [{ layer: 'keyword', confidence }],
    method,
    evidence: [],
  };
}
