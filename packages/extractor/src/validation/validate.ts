import { PRODUCT_FIELDS } from '@pricewatch/shared';
import type {
  ErrorCode,
  ExtractionResult,
  ValidationIssue,
  ValidationOptions,
  ValidationResult,
} from '@pricewatch/shared';
import { MAX_PRICE, formatPrice, parsePriceText } from '../normalization/price';
import { detectPriceChange, detectTextChange, detectAvailabilityChange } from '../change-detection';
import { validationLogger } from '../utils/logger';

export const DEFAULT_VALIDATION_OPTIONS: Readonly<ValidationOptions> = Object.freeze({
  minConfidence: 0.6,
  maxPriceChangePercent: 50,
  warningPenalty: 0.05,
});

// Plausibility bounds (warnings only)
export const PRICE_HIGH_WARNING = 100_000;
export const PRICE_LOW_WARNING = 0.01;

export const TITLE_MIN_LENGTH = 3;
export const TITLE_MAX_LENGTH = 500;

class IssueCollector {
  readonly issues: ValidationIssue[] = [];

  error(code: ErrorCode, message: string): void {
    this.issues.push({ code, severity: 'error', message });
  }

  warn(code: ErrorCode, message: string): void {
    this.issues.push({ code, severity: 'warning', message });
  }

  get errors(): string[] {
    return this.issues.filter((issue) => issue.severity === 'error').map((issue) => issue.message);
  }

  get warnings(): string[] {
    return this.issues.filter((issue) => issue.severity === 'warning').map((issue) => issue.message);
  }
}

/**
 * Judge whether an extraction is trustworthy.
 *
 * Hard errors (missing or malformed price, confidence under the threshold)
 * make the result invalid; plausibility checks and changes against the
 * previous known-good extraction only add warnings, each of which lowers
 * the confidence by `warningPenalty`. Never throws.
 */
export function validate(
  extraction: ExtractionResult,
  previous?: ExtractionResult | null,
  options: Partial<ValidationOptions> = {},
): ValidationResult {
  const config: ValidationOptions = { ...DEFAULT_VALIDATION_OPTIONS, ...options };
  const collector = new IssueCollector();

  checkPrice(extraction, collector);
  checkTitle(extraction, collector);

  if (previous) {
    checkChanges(extraction, previous, config, collector);
  }

  const confidence = computeConfidence(extraction, collector, config);

  if (confidence < config.minConfidence) {
    collector.error(
      'CONFIDENCE_BELOW_THRESHOLD',
      `Confidence below threshold (${confidence.toFixed(2)} < ${config.minConfidence})`,
    );
  }

  const errors = collector.errors;
  const result: ValidationResult = {
    valid: errors.length === 0,
    errors,
    warnings: collector.warnings,
    confidence,
    issues: collector.issues,
  };

  validationLogger.debug(
    `${extraction.domain}: valid=${result.valid} confidence=${confidence} ` +
      `errors=${result.errors.length} warnings=${result.warnings.length}`,
  );

  return result;
}

function checkPrice(extraction: ExtractionResult, collector: IssueCollector): void {
  const value = extraction.fields[PRODUCT_FIELDS.PRICE]?.value;
  if (!value) {
    collector.error('FIELD_ABSENT', 'Price not found');
    return;
  }

  const amount = parsePriceText(value);
  if (amount === null) {
    collector.error('FORMAT_INVALID', 'Invalid price format');
    return;
  }

  if (amount <= 0) {
    collector.error('FORMAT_INVALID', 'Price is zero or negative');
  } else if (amount >= MAX_PRICE) {
    collector.error('FORMAT_INVALID', 'Price exceeds sanity limit');
  } else if (amount > PRICE_HIGH_WARNING) {
    collector.warn('FORMAT_INVALID', `Price unusually high (>${PRICE_HIGH_WARNING})`);
  } else if (amount < PRICE_LOW_WARNING) {
    collector.warn('FORMAT_INVALID', `Price unusually low (<${PRICE_LOW_WARNING})`);
  }
}

function checkTitle(extraction: ExtractionResult, collector: IssueCollector): void {
  const title = extraction.fields[PRODUCT_FIELDS.TITLE]?.value;
  if (!title) {
    return;
  }

  const length = [...title].length;
  if (length < TITLE_MIN_LENGTH) {
    collector.warn('FORMAT_INVALID', 'Title too short');
  } else if (length > TITLE_MAX_LENGTH) {
    collector.warn('FORMAT_INVALID', 'Title too long');
  }
}

function checkChanges(
  current: ExtractionResult,
  previous: ExtractionResult,
  config: ValidationOptions,
  collector: IssueCollector,
): void {
  const currentPrice = parsePriceText(current.fields[PRODUCT_FIELDS.PRICE]?.value);
  const previousPrice = parsePriceText(previous.fields[PRODUCT_FIELDS.PRICE]?.value);

  if (currentPrice !== null && previousPrice !== null && currentPrice > 0 && previousPrice > 0) {
    const change = detectPriceChange(previousPrice, currentPrice);
    const magnitude = Math.abs(change.percentChange ?? 0);

    if (magnitude > config.maxPriceChangePercent) {
      collector.warn(
        'ANOMALOUS_CHANGE',
        `Price changed by ${magnitude.toFixed(1)}% (${formatPrice(previousPrice)} → ${formatPrice(currentPrice)})`,
      );
    }
  }

  const titleChange = detectTextChange(
    previous.fields[PRODUCT_FIELDS.TITLE]?.value,
    current.fields[PRODUCT_FIELDS.TITLE]?.value,
  );
  if (titleChange.changed) {
    collector.warn('ANOMALOUS_CHANGE', `Product title changed: ${titleChange.diffSummary}`);
  }

  const availabilityChange = detectAvailabilityChange(
    previous.fields[PRODUCT_FIELDS.AVAILABILITY]?.value,
    current.fields[PRODUCT_FIELDS.AVAILABILITY]?.value,
  );
  if (availabilityChange.changed) {
    collector.warn('ANOMALOUS_CHANGE', `Availability changed: ${availabilityChange.diffSummary}`);
  }
}

/**
 * Flat mean of the confidences of every field a selector resolved, less the
 * warning penalty. Zero as soon as there is a hard error.
 */
function computeConfidence(
  extraction: ExtractionResult,
  collector: IssueCollector,
  config: ValidationOptions,
): number {
  if (collector.errors.length > 0) {
    return 0;
  }

  const confidences = Object.values(extraction.fields)
    .filter((field) => field.method !== null)
    .map((field) => field.confidence);

  if (confidences.length === 0) {
    return 0;
  }

  const mean = confidences.reduce((sum, value) => sum + value, 0) / confidences.length;
  const penalized = Math.max(0, mean - collector.warnings.length * config.warningPenalty);

  return Math.round(penalized * 100) / 100;
}
