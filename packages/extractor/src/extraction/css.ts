import type { Selector } from '@pricewatch/shared';
import type { PageDocument } from './page';

/**
 * Extract value using a CSS selector with cheerio.
 * Reads `selector.attribute` when given, else the element text.
 */
export function extractWithCSS(page: PageDocument, selector: Selector): string | null {
  const $ = page.$;
  const element = $(selector.expression).first();

  if (element.length === 0) {
    return null; // Element not found
  }

  if (selector.attribute) {
    return element.attr(selector.attribute) ?? null;
  }

  return element.text();
}
