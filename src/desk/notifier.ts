import { NotificationGateway } from './types';
import { logger } from '../observability/logger';
import { notificationFailures } from '../observability/metrics';

/**
 * Fire-and-forget wrapper around the gateway. The call starts immediately;
 * failures are logged and counted, never propagated.
 */
export class Notifier {
  private readonly log = logger.child({ component: 'notifier' });

  constructor(private readonly gateway: NotificationGateway) {}

  dispatch(kind: keyof NotificationGateway, call: (gateway: NotificationGateway) => Promise<void>): void {
    let pending: Promise<void>;
    try {
      pending = call(this.gateway);
    } catch (err) {
      this.fail(kind, err);
      return;
    }
    pending.catch((err: unknown) => this.fail(kind, err));
  }

  private fail(kind: string, err: unknown): void {
    notificationFailures.inc({ kind });
    this.log.warn({ err, kind }, 'Notification delivery failed');
  }
}
