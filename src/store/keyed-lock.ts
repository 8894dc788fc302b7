/**
 * Keyed locks serialize transactions that touch the same rows.
 *
 * Keys are always acquired in sorted order, so two transactions with
 * overlapping scopes cannot deadlock.
 */

import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { KeyedLock, LockLease } from './types';
import { StoreUnavailableError } from './errors';
import { logger } from '../observability/logger';

// ───── In-Memory Implementation ─────────────────────────────────

export class InMemoryKeyedLock implements KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async acquire(keys: string[]): Promise<LockLease> {
    const releases: Array<() => void> = [];
    for (const key of [...new Set(keys)].sort()) {
      releases.push(await this.acquireOne(key));
    }
    return {
      release: async () => {
        for (const release of releases.reverse()) release();
      },
    };
  }

  /** Number of keys currently held or awaited */
  get size(): number {
    return this.tails.size;
  }

  private async acquireOne(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);

    await previous;
    return () => {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    };
  }
}

// ───── Redis Implementation ─────────────────────────────────────

// Delete the lock only if this holder still owns it.
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0
`;

export interface RedisLockOptions {
  keyPrefix: string;
  ttlMs: number;
  waitMs: number;
}

/** Held Redis locks. A lock can expire under a slow holder, so writers check `token` at commit. */
export interface RedisLockLease extends LockLease {
  token: string;
  lockKeys: string[];
}

export class RedisKeyedLock implements KeyedLock<RedisLockLease> {
  private readonly log = logger.child({ component: 'redis-lock' });

  constructor(
    private readonly redis: Redis,
    private readonly options: RedisLockOptions,
  ) {}

  async acquire(keys: string[]): Promise<RedisLockLease> {
    const token = uuidv4();
    const held: string[] = [];
    try {
      for (const key of [...new Set(keys)].sort()) {
        const lockKey = `${this.options.keyPrefix}lock:${key}`;
        await this.acquireOne(lockKey, token);
        held.push(lockKey);
      }
    } catch (err) {
      await this.releaseAll(held, token);
      throw err;
    }
    return { token, lockKeys: held, release: () => this.releaseAll(held, token) };
  }

  private async acquireOne(lockKey: string, token: string): Promise<void> {
    const deadline = Date.now() + this.options.waitMs;
    let delay = 10;
    for (;;) {
      let result: string | null;
      try {
        // SET NX returns 'OK' when we took the lock, null while someone else holds it
        result = await this.redis.set(lockKey, token, 'PX', this.options.ttlMs, 'NX');
      } catch (err) {
        throw new StoreUnavailableError(`Failed to acquire ${lockKey}`, { cause: err });
      }
      if (result === 'OK') return;
      if (Date.now() >= deadline) {
        throw new StoreUnavailableError(`Timed out waiting for ${lockKey}`);
      }
      await new Promise((resolve) => setTimeout(resolve, delay));
      delay = Math.min(delay * 2, 200);
    }
  }

  private async releaseAll(lockKeys: string[], token: string): Promise<void> {
    for (const lockKey of [...lockKeys].reverse()) {
      try {
        await this.redis.eval(RELEASE_SCRIPT, 1, lockKey, token);
      } catch (err) {
        // The lock expires on its own after ttlMs.
        this.log.warn({ err, lockKey }, 'Failed to release lock');
      }
    }
  }
}
