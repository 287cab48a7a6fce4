import { Logger } from '@nestjs/common';
import type Redis from 'ioredis';
import type { Pattern, PatternStats } from '@pricewatch/shared';
import { computeSuccessRate } from '@pricewatch/extractor';
import { InvalidPatternRecordError, PersistenceError } from '../types/errors';
import { normalizeDomain } from './pattern.repository';
import type { PatternRepository } from './pattern.repository';
import { parsePatternRecord, toPatternRecord } from './pattern-record.schema';

export const DOMAIN_INDEX_KEY = 'patterns:domains';

export function patternKey(domain: string): string {
  return `pattern:${domain}`;
}

/**
 * Lua script for the atomic counter update:
 * 1. Skip domains without a pattern
 * 2. Increment both counters
 * 3. Store the derived rate and the update time
 */
export const RECORD_ATTEMPT_SCRIPT = `
  local key = KEYS[1]
  local success = tonumber(ARGV[1])
  local updatedAt = ARGV[2]

  if redis.call('EXISTS', key) == 0 then
    return nil
  end

  local total = redis.call('HINCRBY', key, 'total_attempts', 1)
  local successful = redis.call('HINCRBY', key, 'successful_attempts', success)
  local rate = successful / total

  redis.call('HSET', key, 'success_rate', tostring(rate), 'updated_at', updatedAt)
  return {total, successful}
`;

export const RESET_STATS_SCRIPT = `
  local key = KEYS[1]

  if redis.call('EXISTS', key) == 0 then
    return nil
  end

  redis.call('HSET', key, 'total_attempts', 0, 'successful_attempts', 0, 'success_rate', 0, 'updated_at', ARGV[1])
  return {0, 0}
`;

/**
 * Pattern store on Redis: one hash per domain plus a set indexing the domains.
 *
 * Hash layout: `domain`, `fields` (JSON), `total_attempts`,
 * `successful_attempts`, `success_rate`, `updated_at`.
 */
export class RedisPatternRepository implements PatternRepository {
  private readonly logger = new Logger(RedisPatternRepository.name);

  constructor(private readonly redis: Redis) {}

  async findByDomain(domain: string): Promise<Pattern | null> {
    const normalized = normalizeDomain(domain);
    const hash = await this.run('patterns.findByDomain', () => this.redis.hgetall(patternKey(normalized)));

    if (Object.keys(hash).length === 0) {
      return null;
    }

    return parsePatternRecord(hashToRecord(normalized, hash));
  }

  async listDomains(): Promise<string[]> {
    const domains = await this.run('patterns.listDomains', () => this.redis.smembers(DOMAIN_INDEX_KEY));
    return domains.sort();
  }

  async save(pattern: Pattern): Promise<void> {
    const record = toPatternRecord(pattern);
    const key = patternKey(record.domain);

    await this.run('patterns.save', async () => {
      const replies = await this.redis
        .multi()
        .hset(key, {
          domain: record.domain,
          fields: JSON.stringify(record.fields),
          total_attempts: record.total_attempts,
          successful_attempts: record.successful_attempts,
          success_rate: computeSuccessRate(record.total_attempts, record.successful_attempts),
          updated_at: record.updated_at ?? new Date().toISOString(),
        })
        .sadd(DOMAIN_INDEX_KEY, record.domain)
        .exec();
      assertTransactionSucceeded(replies);
    });

    this.logger.log(`Saved pattern for ${record.domain} (${Object.keys(record.fields).length} fields)`);
  }

  async recordAttempt(domain: string, success: boolean): Promise<PatternStats | null> {
    const key = patternKey(normalizeDomain(domain));
    const reply = await this.run('patterns.recordAttempt', () =>
      this.redis.eval(RECORD_ATTEMPT_SCRIPT, 1, key, success ? 1 : 0, new Date().toISOString()),
    );

    return parseCountersReply(reply);
  }

  async resetStats(domain: string): Promise<PatternStats | null> {
    const key = patternKey(normalizeDomain(domain));
    const reply = await this.run('patterns.resetStats', () =>
      this.redis.eval(RESET_STATS_SCRIPT, 1, key, new Date().toISOString()),
    );

    return parseCountersReply(reply);
  }

  private async run<T>(operation: string, command: () => Promise<T>): Promise<T> {
    try {
      return await command();
    } catch (error) {
      this.logger.error(
        `${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new PersistenceError(operation, error);
    }
  }
}

function hashToRecord(domain: string, hash: Record<string, string>): Record<string, unknown> {
  let fields: unknown;
  try {
    fields = JSON.parse(hash.fields ?? '');
  } catch (error) {
    throw new InvalidPatternRecordError(domain, [
      `fields: not valid JSON (${error instanceof Error ? error.message : String(error)})`,
    ]);
  }

  return {
    domain: hash.domain ?? domain,
    fields,
    total_attempts: toInteger(hash.total_attempts),
    successful_attempts: toInteger(hash.successful_attempts),
    updated_at: hash.updated_at || null,
  };
}

function toInteger(value: string | undefined): number {
  return value === undefined ? 0 : Number(value);
}

/**
 * Script replies are `nil` (no pattern) or `{total, successful}`
 */
function parseCountersReply(reply: unknown): PatternStats | null {
  if (reply === null || reply === undefined) {
    return null;
  }

  if (!Array.isArray(reply) || reply.length < 2) {
    throw new PersistenceError('patterns.parseCounters', new Error(`Unexpected script reply: ${String(reply)}`));
  }

  const totalAttempts = Number(reply[0]);
  const successfulAttempts = Number(reply[1]);

  return {
    totalAttempts,
    successfulAttempts,
    successRate: computeSuccessRate(totalAttempts, successfulAttempts),
  };
}

function assertTransactionSucceeded(replies: [error: Error | null, result: unknown][] | null): void {
  if (replies === null) {
    throw new Error('Transaction aborted');
  }

  for (const [error] of replies) {
    if (error) {
      throw error;
    }
  }
}
