import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { DOMParser } from '@xmldom/xmldom';
import { createLogger } from '../utils/logger';

const log = createLogger('[Page]');

/**
 * A fetched product page. The HTML is parsed at most once per representation
 * and shared by every selector applied to it.
 */
export class PageDocument {
  private dom: CheerioAPI | null = null;
  private xml: Document | null = null;

  constructor(readonly html: string) {}

  static from(page: string | PageDocument): PageDocument {
    return page instanceof PageDocument ? page : new PageDocument(page);
  }

  /**
   * Cheerio view used by CSS, meta and structured-data selectors
   */
  get $(): CheerioAPI {
    if (this.dom === null) {
      this.dom = cheerio.load(this.html);
    }
    return this.dom;
  }

  /**
   * XML view used by XPath selectors. The HTML is first parsed leniently by
   * cheerio and re-serialized as well-formed XML, so void tags and unclosed
   * elements do not break the XML parser.
   *
   * Default `xmlns` declarations (XHTML, inline SVG) are dropped from the
   * serialized copy so unprefixed expressions like `//span` still match.
   */
  get xmlDocument(): Document {
    if (this.xml === null) {
      const parser = new DOMParser({
        errorHandler: {
          warning: (message: string) => log.debug(`XML warning: ${message}`),
          error: (message: string) => log.debug(`XML error: ${message}`),
        },
      });
      const root = this.$.root().clone();
      root.find('[xmlns]').removeAttr('xmlns');
      this.xml = parser.parseFromString(this.$.xml(root), 'text/xml');
    }
    return this.xml;
  }
}
