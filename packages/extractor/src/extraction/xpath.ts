import * as xpath from 'xpath';
import type { Selector } from '@pricewatch/shared';
import type { PageDocument } from './page';

const ELEMENT_NODE = 1;

/**
 * Extract value using an XPath selector.
 *
 * Node results yield the first node's text (or `selector.attribute` for
 * elements); string, number and boolean results - e.g. from
 * `string(//span[@class="price"])` - are returned as text.
 */
export function extractWithXPath(page: PageDocument, selector: Selector): string | null {
  const results = xpath.select(selector.expression, page.xmlDocument);

  if (results === null || results === undefined) {
    return null;
  }

  if (Array.isArray(results)) {
    const node = results[0];
    return node ? extractNodeValue(node, selector.attribute) : null; // No results found
  }

  if (typeof results === 'string' || typeof results === 'number' || typeof results === 'boolean') {
    return String(results);
  }

  return extractNodeValue(results, selector.attribute);
}

/**
 * Text nodes and attribute nodes carry their own value; elements give their
 * text content or the requested attribute
 */
function extractNodeValue(node: Node, attribute: string | null | undefined): string | null {
  if (isElement(node) && attribute) {
    return node.getAttribute(attribute);
  }

  return node.textContent ?? node.nodeValue ?? null;
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}
