// Domain types for Pricewatch - pattern-based price extraction

export const SELECTOR_TYPES = [
  "structured-query",
  "path-query",
  "structured-data-path",
  "meta-lookup",
] as const;

export type SelectorType = (typeof SELECTOR_TYPES)[number];

export const ERROR_CODES = [
  // Extraction
  "SELECTOR_MISS", "FIELD_ABSENT", "FORMAT_INVALID",
  // Validation
  "ANOMALOUS_CHANGE", "CONFIDENCE_BELOW_THRESHOLD",
  // Patterns and storage
  "PATTERN_NOT_FOUND", "PATTERN_RECORD_INVALID", "PERSISTENCE_FAILED",
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

/**
 * One candidate rule for locating a field value.
 * Confidence is declared by the pattern author and never recomputed.
 */
export interface Selector {
  readonly type: SelectorType;
  readonly expression: string;
  readonly attribute?: string | null;
  /** CSS query locating the JSON block for structured-data-path selectors */
  readonly source?: string | null;
  readonly confidence: number;
}

export interface FieldPattern {
  readonly primary: Selector;
  readonly fallbacks: readonly Selector[];
}

export interface PatternStats {
  totalAttempts: number;
  successfulAttempts: number;
  successRate: number;
}

export interface Pattern extends PatternStats {
  domain: string;
  fields: Record<string, FieldPattern>;
  updatedAt?: string | null;
}

export type PatternHealth = "UNPROVEN" | "HEALTHY" | "WARNING" | "FAILING";

// Well-known product fields
export const PRODUCT_FIELDS = {
  PRICE: "price",
  TITLE: "title",
  AVAILABILITY: "availability",
  IMAGE: "image",
  SKU: "sku",
  MODEL_NUMBER: "model_number",
  CURRENCY: "currency",
} as const;

export type SelectorSource = "primary" | "fallback";

export interface ExtractedField {
  value: string | null;
  method: SelectorType | null;
  confidence: number;
  source: SelectorSource | null;
  /** 0 is the primary selector, n is fallback n */
  selectorIndex: number | null;
}

export interface ExtractionResult {
  domain: string;
  fields: Record<string, ExtractedField>;
  errors: string[];
  warnings: string[];
}

export interface ValidationIssue {
  code: ErrorCode;
  severity: "error" | "warning";
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  confidence: number;
  issues: ValidationIssue[];
}

export interface ValidationOptions {
  minConfidence: number;
  maxPriceChangePercent: number;
  warningPenalty: number;
}

export type AvailabilityStatus = "in_stock" | "out_of_stock" | "unknown";

export interface AvailabilityMappingRule {
  match: string;
  status: AvailabilityStatus;
}

export interface PriceHistoryRecord {
  productId: string;
  url: string;
  domain: string;
  price: number;
  currency: string | null;
  extraction: ExtractionResult;
  validation: ValidationResult;
  recordedAt: string;
}
