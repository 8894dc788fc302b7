import { RequestStatus } from './types';
import { logger } from '../observability/logger';
import { requestTransitions } from '../observability/metrics';

export const REQUEST_TRANSITIONS: Record<RequestStatus, RequestStatus[]> = {
  OPEN: ['ASSIGNED', 'CLOSED'],
  ASSIGNED: ['CLOSED'],
  CLOSED: [],
};

export interface RequestTransitionEvent {
  requestId: string;
  from: RequestStatus;
  to: RequestStatus;
  reason: string;
  timestamp: number;
}

export class RequestStateMachine {
  /**
   * Validate a status transition. Returns the new status if valid, or the current status if not.
   * Nothing is logged until the caller commits and calls {@link record}.
   */
  transition(
    requestId: string,
    currentStatus: RequestStatus,
    targetStatus: RequestStatus,
    reason: string,
  ): { newStatus: RequestStatus; event: RequestTransitionEvent | null } {
    if (currentStatus === targetStatus) {
      return { newStatus: currentStatus, event: null };
    }

    if (!REQUEST_TRANSITIONS[currentStatus].includes(targetStatus)) {
      logger.warn(
        { requestId, from: currentStatus, to: targetStatus, reason },
        'Invalid request transition attempted',
      );
      return { newStatus: currentStatus, event: null };
    }

    return {
      newStatus: targetStatus,
      event: { requestId, from: currentStatus, to: targetStatus, reason, timestamp: Date.now() },
    };
  }

  /** Record a committed transition */
  record(event: RequestTransitionEvent): void {
    requestTransitions.inc({ from: event.from, to: event.to });
    logger.info(event, 'Request transition');
  }
}

export const requestStateMachine = new RequestStateMachine();
