import type { PriceHistoryRecord } from '@pricewatch/shared';

export const PRICE_HISTORY_REPOSITORY = Symbol('PRICE_HISTORY_REPOSITORY');

/**
 * Known-good extractions per product, newest first.
 * Only valid extractions are appended, so the latest record is the baseline
 * the next extraction is compared against.
 */
export interface PriceHistoryRepository {
  append(record: PriceHistoryRecord): Promise<void>;
  findLatest(productId: string): Promise<PriceHistoryRecord | null>;
}
