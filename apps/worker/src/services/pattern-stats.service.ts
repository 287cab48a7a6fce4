import { Inject, Injectable, Logger } from '@nestjs/common';
import type { PatternHealth, PatternStats } from '@pricewatch/shared';
import { computeSuccessRate, patternHealth } from '@pricewatch/extractor';
import { PATTERN_REPOSITORY } from '../repositories/pattern.repository';
import type { PatternRepository } from '../repositories/pattern.repository';

export interface PatternHealthReport extends PatternStats {
  domain: string;
  health: PatternHealth;
}

/**
 * Tracks how often each pattern produces a valid extraction.
 *
 * Counters are updated by the repository in one atomic step; this service
 * only derives health from the result and reports transitions.
 */
@Injectable()
export class PatternStatsService {
  private readonly logger = new Logger(PatternStatsService.name);

  constructor(@Inject(PATTERN_REPOSITORY) private readonly patterns: PatternRepository) {}

  /**
   * Record one extraction attempt.
   * Returns null (and records nothing) when the domain has no pattern.
   * Storage failures surface as PersistenceError.
   */
  async update(domain: string, success: boolean): Promise<PatternStats | null> {
    const stats = await this.patterns.recordAttempt(domain, success);

    if (stats === null) {
      this.logger.warn(`No pattern for ${domain}: attempt not recorded`);
      return null;
    }

    this.logTransition(domain, stats, success);
    return stats;
  }

  async getHealth(domain: string): Promise<PatternHealthReport | null> {
    const pattern = await this.patterns.findByDomain(domain);
    if (!pattern) {
      return null;
    }

    return {
      domain: pattern.domain,
      totalAttempts: pattern.totalAttempts,
      successfulAttempts: pattern.successfulAttempts,
      successRate: pattern.successRate,
      health: patternHealth(pattern),
    };
  }

  /**
   * Explicit reset, e.g. after the pattern was regenerated
   */
  async reset(domain: string): Promise<PatternStats | null> {
    const stats = await this.patterns.resetStats(domain);

    if (stats === null) {
      this.logger.warn(`No pattern for ${domain}: nothing to reset`);
    } else {
      this.logger.log(`Stats reset for ${domain}`);
    }

    return stats;
  }

  private logTransition(domain: string, stats: PatternStats, success: boolean): void {
    const totalBefore = stats.totalAttempts - 1;
    const successfulBefore = stats.successfulAttempts - (success ? 1 : 0);
    const before = patternHealth({
      totalAttempts: totalBefore,
      successfulAttempts: successfulBefore,
      successRate: computeSuccessRate(totalBefore, successfulBefore),
    });
    const after = patternHealth(stats);

    if (before === after) {
      return;
    }

    const message = `Pattern ${domain} ${before} → ${after} (${stats.successfulAttempts}/${stats.totalAttempts})`;
    if (after === 'WARNING' || after === 'FAILING') {
      this.logger.warn(message);
    } else {
      this.logger.log(message);
    }
  }
}
