import { ChatMessage, CloseInitiator, CloseResult, RouteResult, SenderRole, SupportRequest } from './types';
import { EntityStore } from '../store';
import { newMessage } from './invariants';
import { Notifier } from './notifier';
import { RequestStateMachine, RequestTransitionEvent, requestStateMachine } from './state-machine';
import { logger } from '../observability/logger';
import { messagesRelayed } from '../observability/metrics';

type CloseOutcome =
  | { kind: 'closed'; request: SupportRequest; previous: SupportRequest; event: RequestTransitionEvent }
  | { kind: 'already_closed'; request: SupportRequest }
  | { kind: 'rejected'; error: 'NoActiveAssignment' | 'NotFound' }
  | { kind: 'rescope' };

// An OPEN request can gain an agent between the snapshot and the lock, once.
const MAX_CLOSE_ATTEMPTS = 2;

/**
 * Relays chat lines between a customer and the agent bound to their request,
 * and tears the binding down on close.
 */
export class ConversationRouter {
  private readonly log = logger.child({ component: 'conversation-router' });

  constructor(
    private readonly store: EntityStore,
    private readonly notifier: Notifier,
    private readonly stateMachine: RequestStateMachine = requestStateMachine,
  ) {}

  async routeCustomerMessage(userId: string, text: string): Promise<RouteResult> {
    const user = await this.store.getUser(userId);
    if (!user) return { ok: false, error: 'NotFound' };
    if (!user.activeRequestId) return { ok: false, error: 'NoActiveAssignment' };

    const relayed = await this.relay(user.activeRequestId, 'customer', userId, text);
    if (!relayed || relayed.request.userId !== userId) return { ok: false, error: 'NoActiveAssignment' };

    const agentId = relayed.agentId;
    this.notifier.dispatch('deliverToAgent', (g) => g.deliverToAgent(agentId, text));
    return { ok: true, message: relayed.message, request: relayed.request };
  }

  async routeAgentMessage(agentId: string, text: string): Promise<RouteResult> {
    const agent = await this.store.getAgent(agentId);
    if (!agent) return { ok: false, error: 'NotFound' };
    if (!agent.activeAssignment) return { ok: false, error: 'NoActiveAssignment' };

    const relayed = await this.relay(agent.activeAssignment, 'agent', agentId, text);
    if (!relayed || relayed.agentId !== agentId) return { ok: false, error: 'NoActiveAssignment' };

    const userId = relayed.request.userId;
    this.notifier.dispatch('deliverToUser', (g) => g.deliverToUser(userId, text));
    return { ok: true, message: relayed.message, request: relayed.request };
  }

  /**
   * Close a request. Closing a CLOSED request succeeds without writing.
   * Only an admin may cancel a request that is still OPEN.
   */
  async closeRequest(requestId: string, initiator: CloseInitiator): Promise<CloseResult> {
    for (let attempt = 0; attempt < MAX_CLOSE_ATTEMPTS; attempt++) {
      const snapshot = await this.store.getRequest(requestId);
      if (!snapshot) return { ok: false, error: 'NotFound' };
      if (snapshot.status === 'CLOSED') return { ok: true, request: snapshot, alreadyClosed: true };

      const outcome = await this.closeWithin(snapshot, initiator);
      switch (outcome.kind) {
        case 'rescope':
          continue;
        case 'rejected':
          return { ok: false, error: outcome.error };
        case 'already_closed':
          return { ok: true, request: outcome.request, alreadyClosed: true };
        case 'closed':
          this.stateMachine.record(outcome.event);
          await this.announceClose(outcome.request, outcome.previous);
          return { ok: true, request: outcome.request, alreadyClosed: false };
      }
    }
    throw new Error(`Request ${requestId} kept changing while closing`);
  }

  /** Close whatever request the caller is currently in. */
  async closeActiveFor(role: SenderRole, id: string): Promise<CloseResult> {
    if (role === 'agent') {
      const agent = await this.store.getAgent(id);
      if (!agent) return { ok: false, error: 'NotFound' };
      if (!agent.activeAssignment) return { ok: false, error: 'NoActiveAssignment' };
      return this.closeRequest(agent.activeAssignment, 'agent');
    }

    const user = await this.store.getUser(id);
    if (!user) return { ok: false, error: 'NotFound' };
    if (!user.activeRequestId) return { ok: false, error: 'NoActiveAssignment' };
    const request = await this.store.getRequest(user.activeRequestId);
    if (!request || request.status !== 'ASSIGNED') return { ok: false, error: 'NoActiveAssignment' };
    return this.closeRequest(request.id, 'customer');
  }

  private async relay(
    requestId: string,
    role: SenderRole,
    senderId: string,
    text: string,
  ): Promise<{ request: SupportRequest; message: ChatMessage; agentId: string } | null> {
    const relayed = await this.store.transaction({ requests: [requestId] }, async (tx) => {
      const request = await tx.getRequest(requestId);
      if (!request || request.status !== 'ASSIGNED' || !request.assignedAgentId) return null;
      if (role === 'agent' && request.assignedAgentId !== senderId) return null;
      if (role === 'customer' && request.userId !== senderId) return null;

      const message = newMessage(requestId, role, senderId, text);
      tx.appendMessage(message);
      return { request, message, agentId: request.assignedAgentId };
    });

    if (relayed) {
      messagesRelayed.inc({ role });
      this.log.debug({ requestId, role }, 'Message relayed');
    }
    return relayed;
  }

  private async closeWithin(snapshot: SupportRequest, initiator: CloseInitiator): Promise<CloseOutcome> {
    const lockedAgentId = snapshot.assignedAgentId;
    return this.store.transaction(
      {
        requests: [snapshot.id],
        users: [snapshot.userId],
        agents: lockedAgentId ? [lockedAgentId] : [],
      },
      async (tx): Promise<CloseOutcome> => {
        const request = await tx.getRequest(snapshot.id);
        if (!request) return { kind: 'rejected', error: 'NotFound' };
        if (request.status === 'CLOSED') return { kind: 'already_closed', request };
        if (request.assignedAgentId !== lockedAgentId) return { kind: 'rescope' };
        if (request.status === 'OPEN' && initiator !== 'admin') {
          return { kind: 'rejected', error: 'NoActiveAssignment' };
        }

        const { event } = this.stateMachine.transition(request.id, request.status, 'CLOSED', `closed by ${initiator}`);
        if (!event) return { kind: 'rejected', error: 'NoActiveAssignment' };

        const closed: SupportRequest = {
          ...request,
          status: 'CLOSED',
          closedAt: event.timestamp,
          closedBy: initiator,
        };
        tx.putRequest(closed);

        if (request.assignedAgentId) {
          const agent = await tx.getAgent(request.assignedAgentId);
          if (agent && agent.activeAssignment === request.id) {
            tx.putAgent({ ...agent, activeAssignment: null });
          }
        }

        const user = await tx.getUser(request.userId);
        if (user && user.activeRequestId === request.id) {
          // The next episode starts again from language choice.
          tx.putUser({ ...user, activeRequestId: null, language: null });
        }

        return { kind: 'closed', request: closed, previous: request, event };
      },
    );
  }

  private async announceClose(closed: SupportRequest, previous: SupportRequest): Promise<void> {
    this.notifier.dispatch('notifyClosed', (g) => g.notifyClosed(closed));
    if (previous.status !== 'OPEN') return;

    // A cancelled OPEN request may still sit in agents' chats with a live claim button.
    let recipients: string[];
    try {
      recipients = await this.store.listBroadcastRecipients(closed.id);
    } catch (err) {
      this.log.error({ err, requestId: closed.id }, 'Failed to load broadcast recipients after cancel');
      return;
    }
    for (const agentId of recipients) {
      this.notifier.dispatch('notifyClaimLost', (g) => g.notifyClaimLost(agentId, closed.id));
    }
  }
}
