import 'reflect-metadata';

/**
 * Public API for @pricewatch/worker
 */

export { WorkerModule } from './worker.module';
export { WorkerConfigService } from './config/config.service';
export { PriceCheckService } from './services/price-check.service';
export type { PriceCheckInput, PriceCheckOutcome, PriceCheckStatus } from './services/price-check.service';
export { PatternStatsService } from './services/pattern-stats.service';
export type { PatternHealthReport } from './services/pattern-stats.service';

// Storage
export { PATTERN_REPOSITORY, normalizeDomain } from './repositories/pattern.repository';
export type { PatternRepository } from './repositories/pattern.repository';
export { PRICE_HISTORY_REPOSITORY } from './repositories/price-history.repository';
export type { PriceHistoryRepository } from './repositories/price-history.repository';
export { RedisPatternRepository } from './repositories/redis-pattern.repository';
export { InMemoryPatternRepository } from './repositories/in-memory-pattern.repository';
export { RedisPriceHistoryRepository } from './repositories/redis-price-history.repository';
export { InMemoryPriceHistoryRepository } from './repositories/in-memory-price-history.repository';
export { parsePatternRecord, toPatternRecord, patternRecordSchema } from './repositories/pattern-record.schema';
export type { PatternRecord } from './repositories/pattern-record.schema';

// Errors
export { PersistenceError, InvalidPatternRecordError } from './types/errors';
