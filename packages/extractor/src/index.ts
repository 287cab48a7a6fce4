// Extraction
export * from './extraction';

// Normalization
export * from './normalization';

// Change detection
export * from './change-detection';

// Validation
export * from './validation';

// Pattern health
export * from './health';

// Logging
export { logger, validationLogger, createLogger, describeError, isDebugEnabled } from './utils/logger';
export type { DebugLogger } from './utils/logger';
