export {
  validate,
  DEFAULT_VALIDATION_OPTIONS,
  PRICE_HIGH_WARNING,
  PRICE_LOW_WARNING,
  TITLE_MIN_LENGTH,
  TITLE_MAX_LENGTH,
} from './validate';
