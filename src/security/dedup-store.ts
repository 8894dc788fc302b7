/**
 * Webhook Deduplication Store
 *
 * Telegram redelivers an update until it sees a 2xx, so the same update_id
 * can arrive more than once. Redis SET NX with a 1hr TTL, or an in-memory
 * window over the most recent update ids.
 */

import Redis from 'ioredis';
import { env } from '../config/env';
import { logger } from '../observability/logger';

const DEFAULT_TTL_SECONDS = 3600; // 1 hour

export interface DedupStore {
  /** Returns true if this update has not been seen before */
  isNew(updateId: number): Promise<boolean>;
}

// ───── Redis Implementation ─────────────────────────────────────

export class RedisDedupStore implements DedupStore {
  private readonly prefix = `${env.redis.keyPrefix}dedup:`;

  constructor(private readonly redis: Redis) {}

  async isNew(updateId: number): Promise<boolean> {
    try {
      // 'OK' when the key was set, null when it already existed
      const result = await this.redis.set(`${this.prefix}${updateId}`, '1', 'EX', DEFAULT_TTL_SECONDS, 'NX');
      return result === 'OK';
    } catch (err) {
      logger.warn({ err, updateId }, 'Dedup check failed; allowing update');
      return true; // Fail open
    }
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

/**
 * Telegram update ids only grow, so ids more than `window` below the highest
 * one seen are treated as already handled and dropped from memory.
 */
export class InMemoryDedupStore implements DedupStore {
  private readonly seen = new Set<number>();
  private highest = Number.NEGATIVE_INFINITY;

  constructor(private readonly window = 10_000) {}

  async isNew(updateId: number): Promise<boolean> {
    if (updateId <= this.highest - this.window || this.seen.has(updateId)) {
      return false;
    }

    this.seen.add(updateId);
    if (updateId > this.highest) {
      this.highest = updateId;
      if (this.seen.size > this.window) this.prune();
    }
    return true;
  }

  get size(): number {
    return this.seen.size;
  }

  private prune(): void {
    const floor = this.highest - this.window;
    for (const id of this.seen) {
      if (id <= floor) this.seen.delete(id);
    }
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createDedupStore(redis?: Redis): DedupStore {
  if (redis) {
    logger.info('Dedup store: Redis-backed (SET NX, 1hr TTL)');
    return new RedisDedupStore(redis);
  }
  logger.info('Dedup store: In-memory');
  return new InMemoryDedupStore();
}
