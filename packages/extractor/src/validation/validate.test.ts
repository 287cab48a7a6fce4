import type { ExtractedField, ExtractionResult, SelectorType } from '@pricewatch/shared';
import { validate } from './validate';

function field(value: string | null, confidence = 0.95, method: SelectorType = 'structured-query'): ExtractedField {
  if (value === null) {
    return { value: null, method: null, confidence: 0, source: null, selectorIndex: null };
  }
  return { value, method, confidence, source: 'primary', selectorIndex: 0 };
}

function extraction(fields: Record<string, ExtractedField>, warnings: string[] = []): ExtractionResult {
  return { domain: 'lamps.example', fields, errors: [], warnings };
}

describe('validate', () => {
  describe('price', () => {
    it('should reject a missing price with zero confidence', () => {
      const result = validate(extraction({ price: field(null), title: field('Nordic Desk Lamp') }));

      expect(result.valid).toBe(false);
      expect(result.confidence).toBe(0);
      expect(result.errors).toEqual(['Price not found', 'Confidence below threshold (0.00 < 0.6)']);
      expect(result.issues[0]).toEqual({ code: 'FIELD_ABSENT', severity: 'error', message: 'Price not found' });
    });

    it('should reject a pattern result without a price field', () => {
      const result = validate(extraction({ title: field('Nordic Desk Lamp') }));

      expect(result.valid).toBe(false);
      expect(result.errors[0]).toBe('Price not found');
    });

    it('should reject text without a number', () => {
      const result = validate(extraction({ price: field('Ring for pris') }));

      expect(result.valid).toBe(false);
      expect(result.errors[0]).toBe('Invalid price format');
      expect(result.issues[0]?.code).toBe('FORMAT_INVALID');
    });

    it('should reject a zero price', () => {
      const result = validate(extraction({ price: field('0,00') }));

      expect(result.errors[0]).toBe('Price is zero or negative');
    });

    it('should reject an absurd price', () => {
      const result = validate(extraction({ price: field('2000000000.00') }));

      expect(result.errors[0]).toBe('Price exceeds sanity limit');
    });

    it('should warn about a very high price', () => {
      const result = validate(extraction({ price: field('150000.00', 0.9) }));

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual(['Price unusually high (>100000)']);
      expect(result.confidence).toBe(0.85);
    });

    it('should warn about a sub-cent price without rejecting it', () => {
      const result = validate(extraction({ price: field('0.004', 0.9) }));

      expect(result.valid).toBe(true);
      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual(['Price unusually low (<0.01)']);
      expect(result.confidence).toBe(0.85);
    });
  });

  describe('title', () => {
    it('should warn about a short title', () => {
      const result = validate(extraction({ price: field('199.00'), title: field('TV') }));

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual(['Title too short']);
    });

    it('should warn about a long title', () => {
      const result = validate(extraction({ price: field('199.00'), title: field('x'.repeat(501)) }));

      expect(result.warnings).toEqual(['Title too long']);
    });

    it('should count characters rather than code units', () => {
      expect(validate(extraction({ price: field('199.00'), title: field('🛒'.repeat(300)) })).warnings).toEqual([]);
      expect(validate(extraction({ price: field('199.00'), title: field('🛒🛒') })).warnings).toEqual([
        'Title too short',
      ]);
    });

    it('should not require a title', () => {
      const result = validate(extraction({ price: field('199.00'), title: field(null) }));

      expect(result.warnings).toEqual([]);
      expect(result.valid).toBe(true);
    });
  });

  describe('confidence', () => {
    it('should use the fallback confidence when only the fallback matched', () => {
      const result = validate(extraction({ price: field('1490.00', 0.7, 'structured-data-path') }));

      expect(result.valid).toBe(true);
      expect(result.confidence).toBe(0.7);
      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual([]);
    });

    it('should average only the fields a selector resolved', () => {
      const result = validate(
        extraction({
          price: field('1490.00', 0.95),
          title: field('Nordic Desk Lamp', 0.85),
          availability: field(null),
        }),
      );

      expect(result.confidence).toBe(0.9);
    });

    it('should not count extraction diagnostics as warnings', () => {
      const result = validate(extraction({ price: field('1490.00', 0.8) }, ['sku: no selector matched']));

      expect(result.confidence).toBe(0.8);
      expect(result.warnings).toEqual([]);
    });

    it('should fail when warnings push confidence under the threshold', () => {
      const result = validate(extraction({ price: field('150000.00', 0.65), title: field('ab', 0.65) }));

      expect(result.confidence).toBe(0.55);
      expect(result.valid).toBe(false);
      expect(result.errors).toEqual(['Confidence below threshold (0.55 < 0.6)']);
      expect(result.warnings).toHaveLength(2);
    });

    it('should accept custom thresholds', () => {
      const result = validate(extraction({ price: field('1490.00', 0.7) }), null, { minConfidence: 0.8 });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual(['Confidence below threshold (0.70 < 0.8)']);
    });
  });

  describe('changes against the previous extraction', () => {
    it('should warn once about a large price drop', () => {
      const previous = extraction({ price: field('1000.00') });
      const result = validate(extraction({ price: field('400.00') }), previous);

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual(['Price changed by 60.0% (1000.00 → 400.00)']);
      expect(result.issues).toEqual([
        {
          code: 'ANOMALOUS_CHANGE',
          severity: 'warning',
          message: 'Price changed by 60.0% (1000.00 → 400.00)',
        },
      ]);
      expect(result.confidence).toBe(0.9);
    });

    it('should not warn at exactly the threshold', () => {
      const previous = extraction({ price: field('1000.00') });
      const result = validate(extraction({ price: field('500.00') }), previous);

      expect(result.warnings).toEqual([]);
    });

    it('should respect a custom change threshold', () => {
      const previous = extraction({ price: field('1000.00') });
      const result = validate(extraction({ price: field('800.00') }), previous, { maxPriceChangePercent: 10 });

      expect(result.warnings).toEqual(['Price changed by 20.0% (1000.00 → 800.00)']);
    });

    it('should warn about a title change', () => {
      const previous = extraction({ price: field('199.00'), title: field('Nordic Desk Lamp') });
      const result = validate(extraction({ price: field('199.00'), title: field('Nordic Floor Lamp') }), previous);

      expect(result.warnings).toEqual(['Product title changed: "Desk" → "Floor"']);
    });

    it('should warn when a product goes out of stock', () => {
      const previous = extraction({ price: field('199.00'), availability: field('https://schema.org/InStock') });
      const result = validate(
        extraction({ price: field('199.00'), availability: field('https://schema.org/OutOfStock') }),
        previous,
      );

      expect(result.warnings).toEqual(['Availability changed: out of stock']);
    });

    it('should warn when a product is back in stock', () => {
      const previous = extraction({ price: field('199.00'), availability: field('Utsolgt') });
      const result = validate(extraction({ price: field('199.00'), availability: field('På lager') }), previous);

      expect(result.warnings).toEqual(['Availability changed: back in stock']);
    });

    it('should ignore a previous extraction without a price', () => {
      const previous = extraction({ price: field(null) });
      const result = validate(extraction({ price: field('400.00') }), previous);

      expect(result.warnings).toEqual([]);
    });
  });
});
