// Change detection module exports

export { detectPriceChange } from './price';
export { detectAvailabilityChange } from './availability';
export { detectTextChange } from './text';
export { NO_CHANGE } from './types';
export type { ChangeDetectionResult, ChangeKind } from './types';
