import { PRODUCT_FIELDS } from '@pricewatch/shared';
import type {
  ExtractedField,
  ExtractionResult,
  FieldPattern,
  Pattern,
  Selector,
  SelectorType,
} from '@pricewatch/shared';
import { cleanPrice, formatPrice } from '../normalization/price';
import { cleanText } from '../normalization/text';
import { logger, describeError } from '../utils/logger';
import { PageDocument } from './page';
import { extractWithCSS } from './css';
import { extractWithXPath } from './xpath';
import { extractWithStructuredData } from './structured-data';
import { extractWithMeta } from './meta';
import type { SelectorHandler } from './types';

/**
 * One handler per selector type
 */
export const SELECTOR_HANDLERS: Record<SelectorType, SelectorHandler> = {
  'structured-query': extractWithCSS,
  'path-query': extractWithXPath,
  'structured-data-path': extractWithStructuredData,
  'meta-lookup': extractWithMeta,
};

/**
 * Main extraction function.
 * Applies every field pattern of `pattern` to the page. Pure: no I/O and the
 * pattern is not modified.
 */
export function extract(page: string | PageDocument, pattern: Pattern): ExtractionResult {
  const document = PageDocument.from(page);
  const fields: Record<string, ExtractedField> = {};
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!(PRODUCT_FIELDS.PRICE in pattern.fields)) {
    errors.push('Pattern has no price field');
  }

  for (const [fieldName, fieldPattern] of Object.entries(pattern.fields)) {
    const field = extractField(document, fieldName, fieldPattern);
    fields[fieldName] = field;

    if (field.value === null) {
      warnings.push(`${fieldName}: no selector matched`);
    }
  }

  logger.debug(
    `Extracted ${Object.keys(fields).length - warnings.length}/${Object.keys(fields).length} fields for ${pattern.domain}`,
  );

  return {
    domain: pattern.domain,
    fields,
    errors,
    warnings,
  };
}

/**
 * Walk a field's chain: primary first, then fallbacks in declared order.
 * The first non-empty value wins and later selectors are not evaluated.
 */
export function extractField(
  page: string | PageDocument,
  fieldName: string,
  fieldPattern: FieldPattern,
): ExtractedField {
  const document = PageDocument.from(page);
  const chain = [fieldPattern.primary, ...fieldPattern.fallbacks];

  for (const [index, selector] of chain.entries()) {
    const value = normalizeFieldValue(fieldName, applySelector(document, selector));

    if (value !== null) {
      return {
        value,
        method: selector.type,
        confidence: selector.confidence,
        source: index === 0 ? 'primary' : 'fallback',
        selectorIndex: index,
      };
    }
  }

  return emptyField();
}

/**
 * Evaluate a single selector. Never throws: a fault while evaluating it
 * (invalid query, malformed markup, ...) counts as a miss.
 */
export function applySelector(page: string | PageDocument, selector: Selector): string | null {
  const handler = SELECTOR_HANDLERS[selector.type];
  if (handler === undefined) {
    logger.debug(`Unknown selector type "${selector.type}"`);
    return null;
  }

  try {
    return handler(PageDocument.from(page), selector);
  } catch (error) {
    logger.debug(`Selector ${selector.type} "${selector.expression}" failed: ${describeError(error)}`);
    return null;
  }
}

/**
 * Clean whitespace on every value; prices are also canonicalized ("1 990,-"
 * → "1990.00"). Unparseable price text is kept so validation can report it.
 */
export function normalizeFieldValue(fieldName: string, rawValue: string | null): string | null {
  const text = cleanText(rawValue);
  if (text === null) {
    return null;
  }

  if (fieldName === PRODUCT_FIELDS.PRICE) {
    const amount = cleanPrice(text);
    return amount !== null ? formatPrice(amount) : text;
  }

  return text;
}

export function emptyField(): ExtractedField {
  return {
    value: null,
    method: null,
    confidence: 0,
    source: null,
    selectorIndex: null,
  };
}
