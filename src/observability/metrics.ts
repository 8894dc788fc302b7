import client from 'prom-client';

export const registry = new client.Registry();
client.collectDefaultMetrics({ register: registry, prefix: 'desk_' });

export const httpRequestDuration = new client.Histogram({
  name: 'desk_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
  registers: [registry],
});

export const updatesReceived = new client.Counter({
  name: 'desk_updates_received_total',
  help: 'Inbound chat updates accepted by the webhook',
  labelNames: ['kind'] as const,
  registers: [registry],
});

export const webhookDuplicatesTotal = new client.Counter({
  name: 'desk_webhook_duplicates_total',
  help: 'Inbound updates dropped as duplicates',
  registers: [registry],
});

export const claimAttempts = new client.Counter({
  name: 'desk_claim_attempts_total',
  help: 'Claim attempts by outcome',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

export const requestTransitions = new client.Counter({
  name: 'desk_request_transitions_total',
  help: 'Support request status transitions',
  labelNames: ['from', 'to'] as const,
  registers: [registry],
});

export const messagesRelayed = new client.Counter({
  name: 'desk_messages_relayed_total',
  help: 'Chat lines relayed between customer and agent',
  labelNames: ['role'] as const,
  registers: [registry],
});

export const notificationFailures = new client.Counter({
  name: 'desk_notification_failures_total',
  help: 'Best-effort notifications that failed to deliver',
  labelNames: ['kind'] as const,
  registers: [registry],
});

export function getMetrics(): Promise<string> {
  return registry.metrics();
}

export function getContentType(): string {
  return registry.contentType;
}
