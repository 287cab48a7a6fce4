export {
  computeSuccessRate,
  applyAttempt,
  patternHealth,
  HEALTHY_THRESHOLD,
  WARNING_THRESHOLD,
  EMPTY_STATS,
} from './health';
