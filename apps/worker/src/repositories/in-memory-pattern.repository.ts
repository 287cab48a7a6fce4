import { readFile } from 'fs/promises';
import { Logger } from '@nestjs/common';
import type { Pattern, PatternStats } from '@pricewatch/shared';
import { applyAttempt, EMPTY_STATS } from '@pricewatch/extractor';
import { InvalidPatternRecordError, PersistenceError } from '../types/errors';
import { normalizeDomain } from './pattern.repository';
import type { PatternRepository } from './pattern.repository';
import { parsePatternRecord, toPatternRecord } from './pattern-record.schema';

/**
 * Pattern store held in process memory, for local runs and tests.
 *
 * Every method finishes its read-modify-write before its first suspension
 * point, so concurrent calls on the event loop never interleave inside an
 * update.
 */
export class InMemoryPatternRepository implements PatternRepository {
  private readonly logger = new Logger(InMemoryPatternRepository.name);
  private readonly patterns = new Map<string, Pattern>();

  constructor(patterns: Pattern[] = []) {
    for (const pattern of patterns) {
      this.store(pattern);
    }
  }

  /**
   * Seed from a JSON file holding an array of pattern records
   */
  static async fromFile(path: string): Promise<InMemoryPatternRepository> {
    let content: string;
    try {
      content = await readFile(path, 'utf8');
    } catch (error) {
      throw new PersistenceError(`patterns.load(${path})`, error);
    }

    let records: unknown;
    try {
      records = JSON.parse(content);
    } catch (error) {
      throw new InvalidPatternRecordError(null, [
        `${path}: not valid JSON (${error instanceof Error ? error.message : String(error)})`,
      ]);
    }

    if (!Array.isArray(records)) {
      throw new InvalidPatternRecordError(null, [`${path}: expected an array of pattern records`]);
    }

    const repository = new InMemoryPatternRepository(records.map((record: unknown) => parsePatternRecord(record)));
    repository.logger.log(`Loaded ${records.length} patterns from ${path}`);
    return repository;
  }

  async findByDomain(domain: string): Promise<Pattern | null> {
    const pattern = this.patterns.get(normalizeDomain(domain));
    return pattern ? { ...pattern } : null;
  }

  async listDomains(): Promise<string[]> {
    return [...this.patterns.keys()].sort();
  }

  async save(pattern: Pattern): Promise<void> {
    this.store(pattern);
  }

  async recordAttempt(domain: string, success: boolean): Promise<PatternStats | null> {
    return this.updateStats(domain, (stats) => applyAttempt(stats, success));
  }

  async resetStats(domain: string): Promise<PatternStats | null> {
    return this.updateStats(domain, () => ({ ...EMPTY_STATS }));
  }

  private updateStats(domain: string, update: (stats: PatternStats) => PatternStats): PatternStats | null {
    const key = normalizeDomain(domain);
    const pattern = this.patterns.get(key);
    if (!pattern) {
      return null;
    }

    const stats = update(pattern);
    this.patterns.set(key, { ...pattern, ...stats, updatedAt: new Date().toISOString() });
    return stats;
  }

  private store(pattern: Pattern): void {
    // Round-trip through the record schema so seeded and saved patterns get the same checks
    const stored = parsePatternRecord(toPatternRecord(pattern));
    this.patterns.set(stored.domain, stored);
  }
}
