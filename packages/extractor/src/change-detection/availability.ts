// Availability change detection

import { classifyAvailability } from '../normalization/availability';
import { NO_CHANGE } from './types';
import type { ChangeDetectionResult } from './types';

/**
 * Compare two raw availability values ("InStock", "Utsolgt", ...).
 * Only a flip of the in-stock state counts; moving between "out of stock"
 * and an unrecognised value does not.
 */
export function detectAvailabilityChange(
  prev: string | null | undefined,
  curr: string | null | undefined
): ChangeDetectionResult {
  if (!prev || !curr) {
    return NO_CHANGE;
  }

  const prevStatus = classifyAvailability(prev);
  const currStatus = classifyAvailability(curr);
  const wasInStock = prevStatus === 'in_stock';
  const isInStock = currStatus === 'in_stock';

  if (wasInStock === isInStock) {
    return NO_CHANGE;
  }

  return {
    changed: true,
    changeKind: 'status_change',
    diffSummary: isInStock ? 'back in stock' : 'out of stock',
  };
}
