import { z } from 'zod';
import { ERROR_CODES, SELECTOR_TYPES } from '@pricewatch/shared';
import type { PriceHistoryRecord } from '@pricewatch/shared';

const extractedFieldSchema = z.object({
  value: z.string().nullable(),
  method: z.enum(SELECTOR_TYPES).nullable(),
  confidence: z.number(),
  source: z.enum(['primary', 'fallback']).nullable(),
  selectorIndex: z.number().int().nullable(),
});

const extractionResultSchema = z.object({
  domain: z.string(),
  fields: z.record(extractedFieldSchema),
  errors: z.array(z.string()),
  warnings: z.array(z.string()),
});

const validationResultSchema = z.object({
  valid: z.boolean(),
  errors: z.array(z.string()),
  warnings: z.array(z.string()),
  confidence: z.number(),
  issues: z.array(
    z.object({
      code: z.enum(ERROR_CODES),
      severity: z.enum(['error', 'warning']),
      message: z.string(),
    }),
  ),
});

export const priceHistoryRecordSchema = z.object({
  productId: z.string().min(1),
  url: z.string(),
  domain: z.string(),
  price: z.number().positive(),
  currency: z.string().nullable(),
  extraction: extractionResultSchema,
  validation: validationResultSchema,
  recordedAt: z.string(),
}) satisfies z.ZodType<PriceHistoryRecord>;

/**
 * Parse one stored history entry; null when it is not a valid record
 */
export function parsePriceHistoryRecord(raw: string): PriceHistoryRecord | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }

  const result = priceHistoryRecordSchema.safeParse(data);
  return result.success ? result.data : null;
}
