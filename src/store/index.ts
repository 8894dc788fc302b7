import Redis from 'ioredis';
import { env } from '../config/env';
import { logger } from '../observability/logger';
import { InMemoryEntityStore } from './memory-store';
import { RedisEntityStore } from './redis-store';
import { EntityStore } from './types';

export * from './types';
export { StoreUnavailableError, TransactionScopeError } from './errors';
export { InMemoryEntityStore } from './memory-store';
export { RedisEntityStore } from './redis-store';

/**
 * Create the entity store for the configured driver.
 */
export function createEntityStore(redis?: Redis): EntityStore {
  if (redis && env.store.driver === 'redis') {
    logger.info('Entity store: Redis-backed (SET NX row locks, fenced script commit)');
    return new RedisEntityStore(redis, {
      keyPrefix: env.redis.keyPrefix,
      ttlMs: env.store.lockTtlMs,
      waitMs: env.store.lockWaitMs,
    });
  }
  logger.warn('Using in-memory entity store (state is lost on restart)');
  return new InMemoryEntityStore();
}
