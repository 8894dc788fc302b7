import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

export type StoreDriver = 'redis' | 'memory';

function storeDriver(): StoreDriver {
  return optional('STORE_DRIVER', 'redis') === 'memory' ? 'memory' : 'redis';
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 3000),
  projectRoot,

  // ───── Telegram transport ─────
  telegram: {
    botToken: optional('TELEGRAM_BOT_TOKEN', ''),
    apiBaseUrl: optional('TELEGRAM_API_BASE_URL', 'https://api.telegram.org'),
    webhookSecret: optional('TELEGRAM_WEBHOOK_SECRET', ''),
    timeoutMs: optionalInt('TELEGRAM_TIMEOUT_MS', 10000),
  },

  // ───── Entity store ─────
  store: {
    driver: storeDriver(),
    lockTtlMs: optionalInt('STORE_LOCK_TTL_MS', 5000),
    lockWaitMs: optionalInt('STORE_LOCK_WAIT_MS', 3000),
  },

  redis: {
    url: optional('REDIS_URL', 'redis://localhost:6379'),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'desk:'),
  },

  security: {
    // Admin routes answer 403 while this is empty.
    adminApiKey: optional('ADMIN_API_KEY', ''),
  },

  observability: {
    enableMetrics: optionalBool('ENABLE_METRICS', true),
  },

  get isDev(): boolean {
    return this.nodeEnv === 'development' || this.nodeEnv === 'test';
  },
};
