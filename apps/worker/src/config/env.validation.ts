import { z } from 'zod';

export const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Redis
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: z.coerce.number().int().min(0).default(0),

  // Pattern store
  PATTERN_STORE: z.enum(['redis', 'memory']).default('redis'),
  PATTERNS_FILE: z.string().optional(),

  // Price history
  PRICE_HISTORY_LIMIT: z.coerce.number().int().positive().default(500),

  // Validation thresholds
  VALIDATION_MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.6),
  VALIDATION_MAX_PRICE_CHANGE_PCT: z.coerce.number().positive().default(50),
  VALIDATION_WARNING_PENALTY: z.coerce.number().min(0).max(1).default(0.05),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors.map(err =>
      `${err.path.join('.')}: ${err.message}`
    ).join('\n');

    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
