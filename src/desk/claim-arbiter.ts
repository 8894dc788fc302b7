/**
 * Claim Arbiter
 *
 * Serializes competing claims on a request so exactly one agent wins. The
 * status check and both writes run in one transaction holding the request
 * and agent rows; a second claimant waits on the lock and then sees ASSIGNED.
 */

import { Agent, ChatMessage, ClaimRejection, ClaimResult, SupportRequest } from './types';
import { EntityStore } from '../store';
import { checkEligibility } from './invariants';
import { Notifier } from './notifier';
import { RequestStateMachine, RequestTransitionEvent, requestStateMachine } from './state-machine';
import { logger } from '../observability/logger';
import { claimAttempts } from '../observability/metrics';

type ClaimOutcome =
  | { ok: true; request: SupportRequest; agent: Agent; event: RequestTransitionEvent }
  | ({ ok: false } & ClaimRejection);

export class ClaimArbiter {
  private readonly log = logger.child({ component: 'claim-arbiter' });

  constructor(
    private readonly store: EntityStore,
    private readonly notifier: Notifier,
    private readonly stateMachine: RequestStateMachine = requestStateMachine,
  ) {}

  async attemptClaim(requestId: string, agentId: string): Promise<ClaimResult> {
    const outcome = await this.store.transaction(
      { requests: [requestId], agents: [agentId] },
      async (tx): Promise<ClaimOutcome> => {
        const request = await tx.getRequest(requestId);
        if (!request) return { ok: false, error: 'NotFound', entity: 'request' };
        if (request.status !== 'OPEN') return { ok: false, error: 'AlreadyClaimed' };

        const agent = await tx.getAgent(agentId);
        if (!agent) return { ok: false, error: 'NotFound', entity: 'agent' };

        const reason = checkEligibility(agent, request.language);
        if (reason) return { ok: false, error: 'AgentIneligible', reason };

        const { event } = this.stateMachine.transition(requestId, request.status, 'ASSIGNED', `claimed by ${agentId}`);
        if (!event) return { ok: false, error: 'AlreadyClaimed' };

        const assigned: SupportRequest = {
          ...request,
          status: 'ASSIGNED',
          assignedAgentId: agentId,
          assignedAt: event.timestamp,
        };
        const bound: Agent = { ...agent, activeAssignment: requestId };
        tx.putRequest(assigned);
        tx.putAgent(bound);
        return { ok: true, request: assigned, agent: bound, event };
      },
    );

    if (!outcome.ok) {
      const { ok: _ok, ...rejection } = outcome;
      claimAttempts.inc({ outcome: rejection.error });
      this.log.info({ requestId, agentId, rejection }, 'Claim rejected');
      this.notifier.dispatch('notifyClaimRejected', (g) => g.notifyClaimRejected(agentId, rejection));
      return outcome;
    }

    claimAttempts.inc({ outcome: 'Assigned' });
    this.stateMachine.record(outcome.event);
    await this.announce(outcome.request, outcome.agent);
    return { ok: true, request: outcome.request, agent: outcome.agent };
  }

  /** Announce the win to both parties and to the agents who lost it. */
  private async announce(request: SupportRequest, winner: Agent): Promise<void> {
    let context: { history: ChatMessage[]; recipients: string[] };
    try {
      context = {
        history: await this.store.listMessages(request.id),
        recipients: await this.store.listBroadcastRecipients(request.id),
      };
    } catch (err) {
      // The claim is committed; only the announcement is lost.
      this.log.error({ err, requestId: request.id }, 'Failed to load claim context; notifications skipped');
      return;
    }

    const { history, recipients } = context;
    this.notifier.dispatch('notifyAssigned', (g) => g.notifyAssigned(request, winner, history));
    for (const agentId of recipients) {
      if (agentId === winner.id) continue;
      this.notifier.dispatch('notifyClaimLost', (g) => g.notifyClaimLost(agentId, request.id));
    }
  }
}
