import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import Redis from 'ioredis';
import { env } from './config/env';
import { LanguageCatalog } from './config/language-catalog';
import { logger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { createEntityStore, EntityStore } from './store';
import { createDesk, Desk, NotificationGateway } from './desk';
import { TelegramApi } from './channels/types';
import { TelegramClient } from './channels/telegram-adapter';
import { TelegramNotificationGateway } from './channels/telegram-gateway';
import { BotHandler } from './channels/bot-handler';
import { registerTelegramWebhook } from './channels/telegram-webhook';
import { createDedupStore, DedupStore } from './security/dedup-store';
import { registerAdminRoutes } from './admin/admin-routes';
import { registerHealthRoutes } from './health/health-routes';

export interface AppContext {
  app: FastifyInstance;
  redis?: Redis;
  store: EntityStore;
  desk: Desk;
}

/** Collaborators a caller can supply instead of the ones built from env */
export interface AppOverrides {
  store?: EntityStore;
  telegram?: TelegramApi;
  gateway?: NotificationGateway;
  catalog?: LanguageCatalog;
  dedupStore?: DedupStore;
  adminApiKey?: string;
}

async function connectRedis(): Promise<Redis | undefined> {
  try {
    const redisInstance = new Redis(env.redis.url, {
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 5) return null; // stop retrying
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach error handler BEFORE connect to prevent unhandled error events
    redisInstance.on('error', (err) => {
      logger.debug({ err: err.message }, 'Redis connection error (handled)');
    });
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    return undefined;
  }
}

export async function buildApp(overrides: AppOverrides = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST'],
  });

  // Request timing middleware
  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });

  app.setErrorHandler((err, req, reply) => {
    const statusCode = err.statusCode ?? 500;
    if (statusCode >= 500) {
      logger.error({ err, method: req.method, url: req.url }, 'Request failed');
      return reply.status(500).send({ error: 'Internal server error' });
    }
    return reply.status(statusCode).send({ error: err.message });
  });

  // Redis backs the store and the dedup set unless the caller supplies a store
  const redis = !overrides.store && env.store.driver === 'redis' ? await connectRedis() : undefined;
  const store = overrides.store ?? createEntityStore(redis);
  const dedupStore = overrides.dedupStore ?? createDedupStore(redis);
  const catalog = overrides.catalog ?? new LanguageCatalog();

  if (!overrides.telegram && !env.telegram.botToken) {
    logger.warn('TELEGRAM_BOT_TOKEN is not set; outbound messages will fail');
  }
  const telegram = overrides.telegram ?? new TelegramClient();
  const gateway = overrides.gateway ?? new TelegramNotificationGateway(telegram);

  const desk = createDesk(store, gateway, catalog);
  const handler = new BotHandler(desk, telegram, catalog);

  registerTelegramWebhook(app, handler, dedupStore);
  registerAdminRoutes(app, {
    desk,
    catalog,
    adminApiKey: overrides.adminApiKey ?? env.security.adminApiKey,
  });
  registerHealthRoutes(app, redis);

  logger.info(
    { store: redis ? 'redis' : 'memory', languages: catalog.list().map((l) => l.code) },
    'Support desk initialized',
  );

  return { app, redis, store, desk };
}
