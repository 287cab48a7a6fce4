export { extract, extractField, applySelector, normalizeFieldValue, emptyField, SELECTOR_HANDLERS } from './extract';
export { PageDocument } from './page';
export { extractWithCSS } from './css';
export { extractWithXPath } from './xpath';
export { extractWithStructuredData, DEFAULT_STRUCTURED_DATA_SOURCE } from './structured-data';
export { extractWithMeta } from './meta';
export type { SelectorHandler } from './types';
