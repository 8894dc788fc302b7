import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import crypto from 'crypto';
import { Desk, RequestStatus } from '../desk';
import { LanguageCatalog } from '../config/language-catalog';
import { logger } from '../observability/logger';

const STATUSES: RequestStatus[] = ['OPEN', 'ASSIGNED', 'CLOSED'];

function isRequestStatus(value: string): value is RequestStatus {
  return STATUSES.some((s) => s === value);
}

function keyMatches(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

export interface AdminDeps {
  desk: Desk;
  catalog: LanguageCatalog;
  /** Every admin route answers 403 while this is empty */
  adminApiKey: string;
}

export function registerAdminRoutes(app: FastifyInstance, deps: AdminDeps): void {
  const { desk, catalog, adminApiKey } = deps;

  function verifyAdminKey(req: FastifyRequest, reply: FastifyReply): boolean {
    const key = req.headers['x-admin-api-key'];
    if (!adminApiKey || typeof key !== 'string' || !keyMatches(key, adminApiKey)) {
      reply.status(403).send({ error: 'Forbidden' });
      return false;
    }
    return true;
  }

  /** Reload the language catalog */
  app.post('/admin/reload-config', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;

    catalog.loadAll();
    logger.info({ admin: true, languages: catalog.list().length }, 'Configuration reloaded');
    return reply.send({ status: 'ok', languages: catalog.list() });
  });

  /** List requests, oldest first, optionally by status */
  app.get<{ Querystring: { status?: string } }>('/admin/requests', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;

    const status = req.query.status?.toUpperCase();
    if (status !== undefined && !isRequestStatus(status)) {
      return reply.status(400).send({ error: `Unknown status: ${req.query.status}` });
    }

    const requests = await desk.store.listRequests(status);
    return reply.send({ status: 'ok', count: requests.length, requests });
  });

  /** One request with its message log and broadcast recipients */
  app.get<{ Params: { id: string } }>('/admin/requests/:id', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;

    const request = await desk.store.getRequest(req.params.id);
    if (!request) return reply.status(404).send({ error: 'Request not found' });

    const [messages, recipients] = await Promise.all([
      desk.store.listMessages(request.id),
      desk.store.listBroadcastRecipients(request.id),
    ]);
    return reply.send({ status: 'ok', request, messages, recipients });
  });

  /** Cancel an OPEN request or end an ASSIGNED one */
  app.post<{ Params: { id: string } }>('/admin/requests/:id/cancel', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;

    const result = await desk.router.closeRequest(req.params.id, 'admin');
    if (!result.ok) {
      const code = result.error === 'NotFound' ? 404 : 409;
      return reply.status(code).send({ error: result.error });
    }

    logger.info({ admin: true, requestId: result.request.id, alreadyClosed: result.alreadyClosed }, 'Request cancelled');
    return reply.send({ status: 'ok', alreadyClosed: result.alreadyClosed, request: result.request });
  });

  /** List registered agents */
  app.get('/admin/agents', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;

    const agents = await desk.store.listAgents();
    return reply.send({ status: 'ok', count: agents.length, agents });
  });
}
