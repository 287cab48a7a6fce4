// @pricewatch/shared - Shared domain types and error taxonomy

// Domain types
export * from './domain';

// Error taxonomy
export * from './error-taxonomy';
