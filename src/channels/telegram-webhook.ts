import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { v4 as uuidv4 } from 'uuid';
import { parseTelegramUpdate } from './telegram-adapter';
import { BotHandler } from './bot-handler';
import { verifyTelegramSecret } from '../security/webhook-verifier';
import { DedupStore } from '../security/dedup-store';
import { childLogger } from '../observability/logger';
import { updatesReceived, webhookDuplicatesTotal } from '../observability/metrics';

export const SECRET_HEADER = 'x-telegram-bot-api-secret-token';

export function registerTelegramWebhook(app: FastifyInstance, handler: BotHandler, dedupStore?: DedupStore): void {
  app.post('/webhooks/telegram', async (req: FastifyRequest, reply: FastifyReply) => {
    const traceId = uuidv4();
    const header = req.headers[SECRET_HEADER];

    // 1. Secret token
    if (!verifyTelegramSecret(typeof header === 'string' ? header : undefined)) {
      return reply.status(401).send({ error: 'Invalid secret token' });
    }

    // 2. Parse payload
    const parsed = parseTelegramUpdate(req.body);
    if (!parsed.ok) {
      const log = childLogger('unknown', { traceId });
      if (parsed.malformed) {
        log.warn({ reason: parsed.reason }, 'Rejected malformed update');
        return reply.status(400).send({ error: parsed.reason });
      }
      // Telegram retries anything but a 2xx, so updates the desk skips still succeed.
      log.debug({ reason: parsed.reason }, 'Ignoring update');
      return reply.status(200).send({ status: 'ignored', reason: parsed.reason });
    }

    const event = parsed.event;
    const log = childLogger(String(event.updateId), { traceId, senderId: event.senderId });

    // 3. Deduplication
    if (dedupStore && !(await dedupStore.isNew(event.updateId))) {
      log.info('Duplicate update detected; skipping');
      webhookDuplicatesTotal.inc();
      return reply.status(200).send({ status: 'duplicate', traceId });
    }

    updatesReceived.inc({ kind: event.kind });

    // 4. Respond immediately and process asynchronously to avoid webhook timeouts
    handler.handle(event, log).catch((err) => {
      log.error({ err }, 'Update handler error');
    });

    return reply.status(200).send({ status: 'accepted', traceId });
  });
}
