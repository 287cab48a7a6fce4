export { cleanPrice, parsePriceText, formatPrice, MAX_PRICE } from './price';
export { cleanText } from './text';
export { resolvePath, scalarToString } from './json-path';
export { classifyAvailability, isInStock, DEFAULT_AVAILABILITY_MAPPING } from './availability';
