import { Logger } from '@nestjs/common';
import type Redis from 'ioredis';
import type { PriceHistoryRecord } from '@pricewatch/shared';
import { PersistenceError } from '../types/errors';
import type { PriceHistoryRepository } from './price-history.repository';
import { parsePriceHistoryRecord } from './price-history-record.schema';

export function priceHistoryKey(productId: string): string {
  return `price-history:${productId}`;
}

/**
 * Capped list per product on Redis, newest entry at the head
 */
export class RedisPriceHistoryRepository implements PriceHistoryRepository {
  private readonly logger = new Logger(RedisPriceHistoryRepository.name);

  constructor(
    private readonly redis: Redis,
    private readonly limit: number,
  ) {}

  async append(record: PriceHistoryRecord): Promise<void> {
    const key = priceHistoryKey(record.productId);

    try {
      const replies = await this.redis
        .multi()
        .lpush(key, JSON.stringify(record))
        .ltrim(key, 0, this.limit - 1)
        .exec();

      if (replies === null) {
        throw new Error('Transaction aborted');
      }
      for (const [error] of replies) {
        if (error) {
          throw error;
        }
      }
    } catch (error) {
      this.logger.error(
        `Failed to append price history for ${record.productId}: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new PersistenceError('priceHistory.append', error);
    }
  }

  async findLatest(productId: string): Promise<PriceHistoryRecord | null> {
    let raw: string | null;
    try {
      raw = await this.redis.lindex(priceHistoryKey(productId), 0);
    } catch (error) {
      throw new PersistenceError('priceHistory.findLatest', error);
    }

    if (raw === null) {
      return null;
    }

    const record = parsePriceHistoryRecord(raw);
    if (record === null) {
      this.logger.warn(`Ignoring unreadable price history entry for ${productId}`);
    }
    return record;
  }
}
