import { z } from 'zod';
import { SELECTOR_TYPES } from '@pricewatch/shared';
import type { FieldPattern, Pattern, Selector } from '@pricewatch/shared';
import { computeSuccessRate } from '@pricewatch/extractor';
import { InvalidPatternRecordError } from '../types/errors';
import { normalizeDomain } from './pattern.repository';

const selectorSchema = z.object({
  type: z.enum(SELECTOR_TYPES),
  expression: z.string().min(1),
  attribute: z.string().min(1).nullish(),
  source: z.string().min(1).nullish(),
  confidence: z.number().min(0).max(1),
});

const fieldPatternSchema = z.object({
  primary: selectorSchema,
  fallbacks: z.array(selectorSchema).default([]),
});

/**
 * Persisted pattern record (snake_case wire format)
 */
export const patternRecordSchema = z
  .object({
    domain: z.string().min(1),
    fields: z.record(fieldPatternSchema),
    total_attempts: z.number().int().min(0).default(0),
    successful_attempts: z.number().int().min(0).default(0),
    success_rate: z.number().min(0).max(1).optional(),
    updated_at: z.string().nullish(),
  })
  .superRefine((record, ctx) => {
    if (record.successful_attempts > record.total_attempts) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['successful_attempts'],
        message: 'successful_attempts exceeds total_attempts',
      });
    }
  });

export type PatternRecord = z.infer<typeof patternRecordSchema>;

type SelectorRecord = z.infer<typeof selectorSchema>;

/**
 * Validate a raw record and convert it to a Pattern.
 * The success rate is recomputed from the counters.
 */
export function parsePatternRecord(input: unknown): Pattern {
  const result = patternRecordSchema.safeParse(input);

  if (!result.success) {
    const issues = result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
    throw new InvalidPatternRecordError(recordDomain(input), issues);
  }

  const record = result.data;
  const fields: Record<string, FieldPattern> = {};
  for (const [name, field] of Object.entries(record.fields)) {
    fields[name] = {
      primary: toSelector(field.primary),
      fallbacks: field.fallbacks.map(toSelector),
    };
  }

  return {
    domain: normalizeDomain(record.domain),
    fields,
    totalAttempts: record.total_attempts,
    successfulAttempts: record.successful_attempts,
    successRate: computeSuccessRate(record.total_attempts, record.successful_attempts),
    updatedAt: record.updated_at ?? null,
  };
}

export function toPatternRecord(pattern: Pattern): PatternRecord {
  return {
    domain: normalizeDomain(pattern.domain),
    fields: Object.fromEntries(
      Object.entries(pattern.fields).map(([name, field]) => [
        name,
        { primary: fromSelector(field.primary), fallbacks: field.fallbacks.map(fromSelector) },
      ]),
    ),
    total_attempts: pattern.totalAttempts,
    successful_attempts: pattern.successfulAttempts,
    success_rate: pattern.successRate,
    updated_at: pattern.updatedAt ?? null,
  };
}

function toSelector(record: SelectorRecord): Selector {
  return {
    type: record.type,
    expression: record.expression,
    attribute: record.attribute ?? null,
    source: record.source ?? null,
    confidence: record.confidence,
  };
}

function fromSelector(selector: Selector): SelectorRecord {
  const record: SelectorRecord = {
    type: selector.type,
    expression: selector.expression,
    confidence: selector.confidence,
  };
  if (selector.attribute) {
    record.attribute = selector.attribute;
  }
  if (selector.source) {
    record.source = selector.source;
  }
  return record;
}

function recordDomain(input: unknown): string | null {
  if (typeof input === 'object' && input !== null && 'domain' in input && typeof input.domain === 'string') {
    return input.domain;
  }
  return null;
}
