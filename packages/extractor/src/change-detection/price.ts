// Price change detection

import { formatPrice } from '../normalization/price';
import { NO_CHANGE } from './types';
import type { ChangeDetectionResult } from './types';

/**
 * Compare two canonical price amounts.
 * A change from zero counts as +100%.
 */
export function detectPriceChange(
  prev: number | null | undefined,
  curr: number | null | undefined
): ChangeDetectionResult {
  if (prev === null || prev === undefined || curr === null || curr === undefined) {
    return NO_CHANGE;
  }

  if (prev === curr) {
    return NO_CHANGE;
  }

  const percentChange = prev !== 0
    ? ((curr - prev) / prev) * 100
    : 100;

  const changeKind = curr > prev ? 'increased' : 'decreased';
  const sign = percentChange > 0 ? '+' : '';

  return {
    changed: true,
    changeKind,
    diffSummary: `${formatPrice(prev)} → ${formatPrice(curr)} (${sign}${percentChange.toFixed(1)}%)`,
    percentChange,
  };
}
