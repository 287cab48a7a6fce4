import { Inject, Injectable, Logger } from '@nestjs/common';
import { ERROR_TAXONOMY, PRODUCT_FIELDS, getErrorMessage } from '@pricewatch/shared';
import type {
  ExtractionResult,
  PatternHealth,
  PatternStats,
  PriceHistoryRecord,
  ValidationResult,
} from '@pricewatch/shared';
import { cleanPrice, extract, patternHealth, validate } from '@pricewatch/extractor';
import { WorkerConfigService } from '../config/config.service';
import { PATTERN_REPOSITORY } from '../repositories/pattern.repository';
import type { PatternRepository } from '../repositories/pattern.repository';
import { PRICE_HISTORY_REPOSITORY } from '../repositories/price-history.repository';
import type { PriceHistoryRepository } from '../repositories/price-history.repository';
import { PatternStatsService } from './pattern-stats.service';

export interface PriceCheckInput {
  productId: string;
  url: string;
  domain: string;
  html: string;
}

export type PriceCheckStatus = 'recorded' | 'rejected' | 'no_pattern';

export interface PriceCheckOutcome {
  status: PriceCheckStatus;
  extraction: ExtractionResult | null;
  validation: ValidationResult | null;
  stats: PatternStats | null;
  health: PatternHealth | null;
  durationMs: number;
}

/**
 * Runs one fetched page through extract → validate → persist → stats.
 *
 * A rejected extraction is an outcome, not an error: it is counted as a
 * failed attempt and nothing is written to the price history. Storage
 * failures propagate as PersistenceError.
 */
@Injectable()
export class PriceCheckService {
  private readonly logger = new Logger(PriceCheckService.name);

  constructor(
    @Inject(PATTERN_REPOSITORY) private readonly patterns: PatternRepository,
    @Inject(PRICE_HISTORY_REPOSITORY) private readonly history: PriceHistoryRepository,
    private readonly stats: PatternStatsService,
    private readonly config: WorkerConfigService,
  ) {}

  async check(input: PriceCheckInput): Promise<PriceCheckOutcome> {
    const startTime = Date.now();

    const pattern = await this.patterns.findByDomain(input.domain);
    if (!pattern) {
      this.logger.warn(`[${input.productId}] ${getErrorMessage('PATTERN_NOT_FOUND')} (${input.domain})`);
      return {
        status: 'no_pattern',
        extraction: null,
        validation: null,
        stats: null,
        health: null,
        durationMs: Date.now() - startTime,
      };
    }

    const extraction = extract(input.html, pattern);
    const previous = await this.history.findLatest(input.productId);
    const validation = validate(extraction, previous?.extraction ?? null, this.config.validation);

    const price = validation.valid ? cleanPrice(extraction.fields[PRODUCT_FIELDS.PRICE]?.value) : null;
    if (price !== null) {
      await this.history.append(this.buildRecord(input, pattern.domain, price, extraction, validation));
    }

    const stats = await this.stats.update(pattern.domain, price !== null);
    const health = stats ? patternHealth(stats) : null;
    const durationMs = Date.now() - startTime;

    const method = extraction.fields[PRODUCT_FIELDS.PRICE]?.method ?? 'none';
    const summary =
      `[${input.productId}] ${pattern.domain} price=${price ?? '-'} method=${method} ` +
      `confidence=${validation.confidence} errors=${validation.errors.length} ` +
      `warnings=${validation.warnings.length} (${durationMs}ms)`;

    if (price !== null) {
      this.logger.log(summary);
    } else {
      this.logger.warn(`${summary}: ${describeRejection(validation)}`);
    }

    return {
      status: price !== null ? 'recorded' : 'rejected',
      extraction,
      validation,
      stats,
      health,
      durationMs,
    };
  }

  private buildRecord(
    input: PriceCheckInput,
    domain: string,
    price: number,
    extraction: ExtractionResult,
    validation: ValidationResult,
  ): PriceHistoryRecord {
    return {
      productId: input.productId,
      url: input.url,
      domain,
      price,
      currency: extraction.fields[PRODUCT_FIELDS.CURRENCY]?.value ?? null,
      extraction,
      validation,
      recordedAt: new Date().toISOString(),
    };
  }
}

/**
 * "Field Not Found: Price not found; Low Confidence: Confidence below ..."
 */
export function describeRejection(validation: ValidationResult): string {
  return validation.issues
    .filter((issue) => issue.severity === 'error')
    .map((issue) => `${ERROR_TAXONOMY[issue.code].title}: ${issue.message}`)
    .join('; ');
}
