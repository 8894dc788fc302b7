import crypto from 'crypto';
import { env } from '../config/env';
import { logger } from '../observability/logger';

/**
 * Verify the X-Telegram-Bot-Api-Secret-Token header against the secret the
 * webhook was registered with. If no secret is configured, verification is
 * skipped in development and every update is rejected in production.
 */
export function verifyTelegramSecret(header: string | undefined, secret = env.telegram.webhookSecret): boolean {
  if (!secret) {
    if (env.isDev) {
      logger.debug('No webhook secret configured; skipping verification (dev mode)');
      return true;
    }
    logger.error('No webhook secret configured in production; rejecting update');
    return false;
  }

  if (!header) {
    logger.warn('Missing webhook secret header');
    return false;
  }

  const given = Buffer.from(header);
  const expected = Buffer.from(secret);
  // timingSafeEqual throws on a length mismatch
  const isValid = given.length === expected.length && crypto.timingSafeEqual(given, expected);

  if (!isValid) {
    logger.warn('Webhook secret mismatch');
  }

  return isValid;
}
