import type { Selector } from '@pricewatch/shared';
import { resolvePath, scalarToString } from '../normalization/json-path';
import { createLogger, describeError } from '../utils/logger';
import type { PageDocument } from './page';

const log = createLogger('[StructuredData]');

export const DEFAULT_STRUCTURED_DATA_SOURCE = 'script[type="application/ld+json"]';

// Performance guardrail
const MAX_BLOCKS = 10;

/**
 * Extract a value from embedded JSON (JSON-LD scripts, Next.js data,
 * data-* attributes holding JSON).
 *
 * - `selector.source` locates the blocks (default: JSON-LD scripts)
 * - `selector.attribute`, when given, holds the JSON instead of the element text
 * - `selector.expression` is the dotted path inside each parsed block
 *
 * Blocks are tried in document order; the first one resolving to a scalar wins.
 */
export function extractWithStructuredData(page: PageDocument, selector: Selector): string | null {
  const $ = page.$;
  const blocks = $(selector.source || DEFAULT_STRUCTURED_DATA_SOURCE).toArray().slice(0, MAX_BLOCKS);

  for (const block of blocks) {
    const raw = selector.attribute ? $(block).attr(selector.attribute) : $(block).text();
    const document = parseJsonBlock(raw);
    if (document === undefined) {
      continue;
    }

    const value = scalarToString(resolvePath(document, selector.expression));
    if (value !== null) {
      return value;
    }
  }

  return null;
}

/**
 * Parse one block; a malformed block is skipped, not fatal for the selector
 */
function parseJsonBlock(raw: string | undefined): unknown {
  if (!raw || raw.trim() === '') {
    return undefined;
  }

  try {
    return JSON.parse(raw.trim());
  } catch (error) {
    log.debug(`Skipping malformed JSON block: ${describeError(error)}`);
    return undefined;
  }
}
