import { Injectable } from '@nestjs/common';
import { ConfigService as NestConfigService } from '@nestjs/config';
import type { ValidationOptions } from '@pricewatch/shared';
import type { EnvConfig } from './env.validation';

export type PatternStoreKind = EnvConfig['PATTERN_STORE'];

/**
 * Configuration service for worker app
 * Centralizes environment variable access and validation
 */
@Injectable()
export class WorkerConfigService {
  constructor(private configService: NestConfigService<EnvConfig, true>) {}

  /**
   * Redis connection configuration
   */
  get redis() {
    return {
      host: this.configService.get('REDIS_HOST', { infer: true }),
      port: this.configService.get('REDIS_PORT', { infer: true }),
      password: this.configService.get('REDIS_PASSWORD', { infer: true }),
      db: this.configService.get('REDIS_DB', { infer: true }),
    };
  }

  /**
   * Where patterns live; the memory store can be seeded from a JSON file
   */
  get patternStore(): { kind: PatternStoreKind; patternsFile?: string } {
    return {
      kind: this.configService.get('PATTERN_STORE', { infer: true }),
      patternsFile: this.configService.get('PATTERNS_FILE', { infer: true }),
    };
  }

  /**
   * Records kept per product
   */
  get priceHistoryLimit(): number {
    return this.configService.get('PRICE_HISTORY_LIMIT', { infer: true });
  }

  get validation(): ValidationOptions {
    return {
      minConfidence: this.configService.get('VALIDATION_MIN_CONFIDENCE', { infer: true }),
      maxPriceChangePercent: this.configService.get('VALIDATION_MAX_PRICE_CHANGE_PCT', { infer: true }),
      warningPenalty: this.configService.get('VALIDATION_WARNING_PENALTY', { infer: true }),
    };
  }

  /**
   * Environment info
   */
  get environment() {
    const nodeEnv = this.configService.get('NODE_ENV', { infer: true });
    return {
      nodeEnv,
      isDevelopment: nodeEnv !== 'production',
      isProduction: nodeEnv === 'production',
    };
  }
}
