import { validateEnv } from './env.validation';

describe('validateEnv', () => {
  it('should apply defaults', () => {
    const env = validateEnv({});

    expect(env).toEqual({
      NODE_ENV: 'development',
      REDIS_HOST: 'localhost',
      REDIS_PORT: 6379,
      REDIS_DB: 0,
      PATTERN_STORE: 'redis',
      PRICE_HISTORY_LIMIT: 500,
      VALIDATION_MIN_CONFIDENCE: 0.6,
      VALIDATION_MAX_PRICE_CHANGE_PCT: 50,
      VALIDATION_WARNING_PENALTY: 0.05,
    });
  });

  it('should coerce numeric strings', () => {
    const env = validateEnv({
      REDIS_PORT: '6380',
      PRICE_HISTORY_LIMIT: '50',
      VALIDATION_MIN_CONFIDENCE: '0.75',
    });

    expect(env.REDIS_PORT).toBe(6380);
    expect(env.PRICE_HISTORY_LIMIT).toBe(50);
    expect(env.VALIDATION_MIN_CONFIDENCE).toBe(0.75);
  });

  it('should accept the memory store with a seed file', () => {
    const env = validateEnv({ PATTERN_STORE: 'memory', PATTERNS_FILE: './patterns.json' });

    expect(env.PATTERN_STORE).toBe('memory');
    expect(env.PATTERNS_FILE).toBe('./patterns.json');
  });

  it('should reject an unknown pattern store', () => {
    expect(() => validateEnv({ PATTERN_STORE: 'sqlite' })).toThrow(/PATTERN_STORE/);
  });

  it('should reject a confidence threshold above 1', () => {
    expect(() => validateEnv({ VALIDATION_MIN_CONFIDENCE: '1.5' })).toThrow(
      /Environment validation failed:\nVALIDATION_MIN_CONFIDENCE/,
    );
  });
});
