import type { PatternHealth, PatternStats } from '@pricewatch/shared';

export const HEALTHY_THRESHOLD = 0.8;
export const WARNING_THRESHOLD = 0.6;

export const EMPTY_STATS: Readonly<PatternStats> = Object.freeze({
  totalAttempts: 0,
  successfulAttempts: 0,
  successRate: 0,
});

/**
 * Share of successful attempts; 0 before the first attempt
 */
export function computeSuccessRate(totalAttempts: number, successfulAttempts: number): number {
  return totalAttempts > 0 ? successfulAttempts / totalAttempts : 0;
}

/**
 * Counters after one more attempt. Pure: the input is not modified, so stores
 * must apply it inside their own atomic section.
 */
export function applyAttempt(stats: PatternStats, success: boolean): PatternStats {
  const totalAttempts = stats.totalAttempts + 1;
  const successfulAttempts = stats.successfulAttempts + (success ? 1 : 0);

  return {
    totalAttempts,
    successfulAttempts,
    successRate: computeSuccessRate(totalAttempts, successfulAttempts),
  };
}

export function patternHealth(stats: PatternStats): PatternHealth {
  if (stats.totalAttempts === 0) {
    return 'UNPROVEN';
  }
  if (stats.successRate >= HEALTHY_THRESHOLD) {
    return 'HEALTHY';
  }
  if (stats.successRate >= WARNING_THRESHOLD) {
    return 'WARNING';
  }
  return 'FAILING';
}
