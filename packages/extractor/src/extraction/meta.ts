import type { Selector } from '@pricewatch/shared';
import type { PageDocument } from './page';

const META_KEY_ATTRIBUTES = ['property', 'name', 'itemprop'];

/**
 * Read a <meta> tag's content.
 *
 * The expression is the tag key ("og:title", "product:price:amount") matched
 * against property, name or itemprop. An expression that is already a CSS
 * query ('meta[property="og:image"]') is applied as is.
 */
export function extractWithMeta(page: PageDocument, selector: Selector): string | null {
  const $ = page.$;
  const attribute = selector.attribute || 'content';
  const key = selector.expression.trim();

  const candidates = key.includes('[')
    ? $(key)
    : $('meta').filter((_, el) => META_KEY_ATTRIBUTES.some((name) => $(el).attr(name) === key));

  const element = candidates.first();
  if (element.length === 0) {
    return null;
  }

  return element.attr(attribute) ?? null;
}
