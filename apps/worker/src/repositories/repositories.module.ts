import { Logger, Module } from '@nestjs/common';
import type Redis from 'ioredis';
import { WorkerConfigService } from '../config/config.service';
import { REDIS_CLIENT } from '../redis/redis.constants';
import { RedisModule } from '../redis/redis.module';
import { PATTERN_REPOSITORY } from './pattern.repository';
import type { PatternRepository } from './pattern.repository';
import { PRICE_HISTORY_REPOSITORY } from './price-history.repository';
import type { PriceHistoryRepository } from './price-history.repository';
import { RedisPatternRepository } from './redis-pattern.repository';
import { InMemoryPatternRepository } from './in-memory-pattern.repository';
import { RedisPriceHistoryRepository } from './redis-price-history.repository';
import { InMemoryPriceHistoryRepository } from './in-memory-price-history.repository';

const logger = new Logger('RepositoriesModule');

/**
 * Binds the pattern store and price history to Redis or to process memory,
 * following PATTERN_STORE
 */
@Module({
  imports: [RedisModule],
  providers: [
    {
      provide: PATTERN_REPOSITORY,
      inject: [WorkerConfigService, REDIS_CLIENT],
      useFactory: async (config: WorkerConfigService, redis: Redis): Promise<PatternRepository> => {
        const { kind, patternsFile } = config.patternStore;
        logger.log(`Pattern store: ${kind}`);

        if (kind === 'redis') {
          return new RedisPatternRepository(redis);
        }
        return patternsFile ? InMemoryPatternRepository.fromFile(patternsFile) : new InMemoryPatternRepository();
      },
    },
    {
      provide: PRICE_HISTORY_REPOSITORY,
      inject: [WorkerConfigService, REDIS_CLIENT],
      useFactory: (config: WorkerConfigService, redis: Redis): PriceHistoryRepository =>
        config.patternStore.kind === 'redis'
          ? new RedisPriceHistoryRepository(redis, config.priceHistoryLimit)
          : new InMemoryPriceHistoryRepository(config.priceHistoryLimit),
    },
  ],
  exports: [PATTERN_REPOSITORY, PRICE_HISTORY_REPOSITORY],
})
export class RepositoriesModule {}
