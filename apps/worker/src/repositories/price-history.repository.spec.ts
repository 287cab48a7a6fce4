import { Test, TestingModule } from '@nestjs/testing';
import type Redis from 'ioredis';
import type { PriceHistoryRecord } from '@pricewatch/shared';
import { REDIS_CLIENT } from '../redis/redis.constants';
import { PersistenceError } from '../types/errors';
import { InMemoryPriceHistoryRepository } from './in-memory-price-history.repository';
import { RedisPriceHistoryRepository } from './redis-price-history.repository';

function record(productId: string, price: number, recordedAt: string): PriceHistoryRecord {
  return {
    productId,
    url: `https://www.komplett.no/product/${productId}`,
    domain: 'komplett.no',
    price,
    currency: 'NOK',
    extraction: {
      domain: 'komplett.no',
      fields: {
        price: {
          value: price.toFixed(2),
          method: 'structured-query',
          confidence: 0.95,
          source: 'primary',
          selectorIndex: 0,
        },
      },
      errors: [],
      warnings: [],
    },
    validation: { valid: true, errors: [], warnings: [], confidence: 0.95, issues: [] },
    recordedAt,
  };
}

describe('InMemoryPriceHistoryRepository', () => {
  it('should return the newest record', async () => {
    const history = new InMemoryPriceHistoryRepository(10);

    await history.append(record('p-1', 1990, '2026-10-01T10:00:00.000Z'));
    await history.append(record('p-1', 1790, '2026-10-02T10:00:00.000Z'));

    expect((await history.findLatest('p-1'))?.price).toBe(1790);
    expect(await history.findLatest('p-2')).toBeNull();
  });

  it('should keep at most the configured number of records', async () => {
    const history = new InMemoryPriceHistoryRepository(2);

    await history.append(record('p-1', 100, '2026-10-01T10:00:00.000Z'));
    await history.append(record('p-1', 200, '2026-10-02T10:00:00.000Z'));
    await history.append(record('p-1', 300, '2026-10-03T10:00:00.000Z'));

    expect((await history.list('p-1')).map((entry) => entry.price)).toEqual([300, 200]);
  });
});

describe('RedisPriceHistoryRepository', () => {
  let repository: RedisPriceHistoryRepository;
  let mockRedis: { lindex: jest.Mock; multi: jest.Mock };
  let transaction: { lpush: jest.Mock; ltrim: jest.Mock; exec: jest.Mock };

  beforeEach(async () => {
    transaction = {
      lpush: jest.fn().mockReturnThis(),
      ltrim: jest.fn().mockReturnThis(),
      exec: jest.fn().mockResolvedValue([
        [null, 1],
        [null, 'OK'],
      ]),
    };
    mockRedis = {
      lindex: jest.fn(),
      multi: jest.fn(() => transaction),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        { provide: REDIS_CLIENT, useValue: mockRedis },
        {
          provide: RedisPriceHistoryRepository,
          inject: [REDIS_CLIENT],
          useFactory: (redis: Redis) => new RedisPriceHistoryRepository(redis, 500),
        },
      ],
    }).compile();

    repository = module.get(RedisPriceHistoryRepository);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should push the record and cap the list', async () => {
    const entry = record('p-1', 1990, '2026-10-01T10:00:00.000Z');

    await repository.append(entry);

    expect(transaction.lpush).toHaveBeenCalledWith('price-history:p-1', JSON.stringify(entry));
    expect(transaction.ltrim).toHaveBeenCalledWith('price-history:p-1', 0, 499);
  });

  it('should raise PersistenceError when the write fails', async () => {
    transaction.exec.mockRejectedValue(new Error('READONLY'));

    await expect(repository.append(record('p-1', 1990, '2026-10-01T10:00:00.000Z'))).rejects.toMatchObject({
      operation: 'priceHistory.append',
      retryable: true,
    });
  });

  it('should read the head of the list', async () => {
    const entry = record('p-1', 1990, '2026-10-01T10:00:00.000Z');
    mockRedis.lindex.mockResolvedValue(JSON.stringify(entry));

    expect(await repository.findLatest('p-1')).toEqual(entry);
    expect(mockRedis.lindex).toHaveBeenCalledWith('price-history:p-1', 0);
  });

  it('should return null for a product without history', async () => {
    mockRedis.lindex.mockResolvedValue(null);

    expect(await repository.findLatest('p-9')).toBeNull();
  });

  it('should ignore an unreadable entry', async () => {
    mockRedis.lindex.mockResolvedValue('{"productId":"p-1"}');

    expect(await repository.findLatest('p-1')).toBeNull();
  });

  it('should raise PersistenceError when the read fails', async () => {
    mockRedis.lindex.mockRejectedValue(new Error('ECONNRESET'));

    await expect(repository.findLatest('p-1')).rejects.toBeInstanceOf(PersistenceError);
  });
});
