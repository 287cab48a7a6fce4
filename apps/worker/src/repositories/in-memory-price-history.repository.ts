import type { PriceHistoryRecord } from '@pricewatch/shared';
import type { PriceHistoryRepository } from './price-history.repository';

export class InMemoryPriceHistoryRepository implements PriceHistoryRepository {
  private readonly history = new Map<string, PriceHistoryRecord[]>();

  constructor(private readonly limit: number) {}

  async append(record: PriceHistoryRecord): Promise<void> {
    const records = [record, ...(this.history.get(record.productId) ?? [])];
    this.history.set(record.productId, records.slice(0, this.limit));
  }

  async findLatest(productId: string): Promise<PriceHistoryRecord | null> {
    return this.history.get(productId)?.[0] ?? null;
  }

  /**
   * Newest first
   */
  async list(productId: string): Promise<PriceHistoryRecord[]> {
    return [...(this.history.get(productId) ?? [])];
  }
}
