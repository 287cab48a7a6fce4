import type { Selector } from '@pricewatch/shared';
import type { PageDocument } from './page';

/**
 * Evaluates one selector type against a page. Returns the raw value or null;
 * may throw on malformed input, which the caller turns into a miss.
 */
export type SelectorHandler = (page: PageDocument, selector: Selector) => string | null;
