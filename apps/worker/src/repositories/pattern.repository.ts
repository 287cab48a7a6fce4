import type { Pattern, PatternStats } from '@pricewatch/shared';

export const PATTERN_REPOSITORY = Symbol('PATTERN_REPOSITORY');

/**
 * Storage of extraction patterns and their attempt counters.
 *
 * Patterns are written by the authoring workflow (and seeding) through
 * `save`; extraction only reads them. Counters change only through
 * `recordAttempt`, which must be a single atomic read-modify-write so that
 * concurrent checks of the same domain never lose an update.
 */
export interface PatternRepository {
  findByDomain(domain: string): Promise<Pattern | null>;
  listDomains(): Promise<string[]>;
  save(pattern: Pattern): Promise<void>;
  /** Null when the domain has no pattern */
  recordAttempt(domain: string, success: boolean): Promise<PatternStats | null>;
  resetStats(domain: string): Promise<PatternStats | null>;
}

/**
 * "WWW.Komplett.no" and "komplett.no" share one pattern
 */
export function normalizeDomain(domain: string): string {
  return domain.trim().toLowerCase().replace(/^www\./, '');
}
