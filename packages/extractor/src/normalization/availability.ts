import type { AvailabilityMappingRule, AvailabilityStatus } from '@pricewatch/shared';

/**
 * Default keyword mapping. Out-of-stock phrases come first because several of
 * them contain an in-stock keyword ("unavailable", "ikke på lager").
 */
export const DEFAULT_AVAILABILITY_MAPPING: AvailabilityMappingRule[] = [
  { match: 'out of stock', status: 'out_of_stock' },
  { match: 'outofstock', status: 'out_of_stock' },
  { match: 'sold out', status: 'out_of_stock' },
  { match: 'soldout', status: 'out_of_stock' },
  { match: 'unavailable', status: 'out_of_stock' },
  { match: 'not available', status: 'out_of_stock' },
  { match: 'ikke på lager', status: 'out_of_stock' },
  { match: 'utsolgt', status: 'out_of_stock' },
  { match: 'discontinued', status: 'out_of_stock' },
  { match: 'in stock', status: 'in_stock' },
  { match: 'instock', status: 'in_stock' },
  { match: 'available', status: 'in_stock' },
  { match: 'på lager', status: 'in_stock' },
  { match: 'add to cart', status: 'in_stock' },
];

/**
 * Classifies availability text using keyword mapping rules.
 *
 * Algorithm:
 * 1. Normalize input (lowercase, collapse whitespace, strip schema.org URL prefix)
 * 2. Iterate through mapping rules in order
 * 3. Return the status of the first rule whose phrase occurs on word boundaries
 *
 * @param rawValue - Raw availability text from extraction
 * @param mapping - Ordered mapping rules
 */
export function classifyAvailability(
  rawValue: string | null | undefined,
  mapping: AvailabilityMappingRule[] = DEFAULT_AVAILABILITY_MAPPING
): AvailabilityStatus {
  if (!rawValue) {
    return 'unknown';
  }

  // Step 1: Normalize input ("https://schema.org/InStock" → "instock")
  const normalized = rawValue
    .toLowerCase()
    .replace(/https?:\/\/schema\.org\//g, '')
    .replace(/\s+/g, ' ')
    .trim();

  // Step 2-3: First matching rule wins
  for (const rule of mapping) {
    if (matchesPhrase(normalized, rule.match.toLowerCase())) {
      return rule.status;
    }
  }

  return 'unknown';
}

export function isInStock(rawValue: string | null | undefined): boolean {
  return classifyAvailability(rawValue) === 'in_stock';
}

/**
 * Substring match with word boundaries - the phrase must be at start/end or
 * surrounded by whitespace or punctuation
 */
function matchesPhrase(normalized: string, phrase: string): boolean {
  let index = normalized.indexOf(phrase);

  while (index !== -1) {
    const charBefore = normalized[index - 1];
    const charAfter = normalized[index + phrase.length];
    const before = charBefore === undefined || isBoundary(charBefore);
    const after = charAfter === undefined || isBoundary(charAfter);

    if (before && after) {
      return true;
    }
    index = normalized.indexOf(phrase, index + 1);
  }

  return false;
}

function isBoundary(char: string): boolean {
  return /[\s.,;:!?()\-/]/.test(char);
}
