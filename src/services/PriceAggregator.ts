import type { AggregateResult } from '../types/models.js';

export interface PriceTotal {
  /** Rounded to two decimal places. */
  total: number;
  itemCount: number;
}

/**
 * Sum the prices of vegetarian items.
 * Prices are accumulated in integer cents so 0.1 + 0.2 stays 0.30.
 */
export function sumVegetarianPrices(items: readonly AggregateResult[]): PriceTotal {
  let cents = 0;
  let itemCount = 0;
  for (const item of items) {
    if (!item.isVegetarian) continue;
    cents += toCents(item.candidate.price);
    itemCount++;
  }
  return { total: cents / 100, itemCount };
}

export function toCents(price: number): number {
  if (!Number.isFinite(price) || price < 0) return 0;
  return Math.round(price * 100);
}
