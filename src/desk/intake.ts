/**
 * Intake
 *
 * Session start, request creation and broadcast, and the agent-side
 * configuration commands. All conversational state lives on the User and
 * Agent rows, so a restart loses nothing.
 */

import { v4 as uuidv4 } from 'uuid';
import { Agent, ChatMessage, SupportRequest, User } from './types';
import { EntityStore } from '../store';
import { LanguageCatalog, LanguageOption } from '../config/language-catalog';
import { newMessage, normalizeLanguage, parseLanguageList } from './invariants';
import { Matcher } from './matcher';
import { Notifier } from './notifier';
import { logger } from '../observability/logger';

export type StartResult =
  | { kind: 'choose_language'; user: User; languages: LanguageOption[] }
  | { kind: 'pending'; user: User; request: SupportRequest }
  | { kind: 'in_conversation'; user: User; request: SupportRequest };

export type SelectLanguageResult =
  | { ok: true; user: User }
  | { ok: false; error: 'NotFound' | 'InvalidLanguage' | 'ActiveRequestExists' };

export type OpenRequestResult =
  | { ok: true; created: true; request: SupportRequest; notified: number }
  | { ok: true; created: false; request: SupportRequest }
  | { ok: false; error: 'NotFound' | 'LanguageNotSelected' | 'ActiveRequestExists' };

export type PendingMessageResult =
  | { ok: true; message: ChatMessage; request: SupportRequest }
  | { ok: false; error: 'NotFound' | 'NoActiveAssignment' };

export type AgentUpdateResult =
  | { ok: true; agent: Agent }
  | { ok: false; error: 'NotFound' };

export type SetLanguagesResult =
  | { ok: true; agent: Agent }
  | { ok: false; error: 'NotFound' }
  | { ok: false; error: 'InvalidLanguage'; invalid: string[] };

export type AvailabilityResult =
  | { ok: true; agent: Agent; offered: number }
  | { ok: false; error: 'NotFound' };

export type AgentRequestsResult =
  | { ok: true; assigned: SupportRequest | null; pending: SupportRequest[] }
  | { ok: false; error: 'NotFound' };

export class Intake {
  private readonly log = logger.child({ component: 'intake' });

  constructor(
    private readonly store: EntityStore,
    private readonly matcher: Matcher,
    private readonly notifier: Notifier,
    private readonly catalog: LanguageCatalog,
  ) {}

  // ───── Customer side ─────

  /**
   * A customer who already has an OPEN request gets it back unchanged; one in
   * a conversation is told so. Anyone else starts over at language choice.
   */
  async startSession(userId: string, displayName?: string): Promise<StartResult> {
    return this.store.transaction({ users: [userId] }, async (tx): Promise<StartResult> => {
      const existing = await tx.getUser(userId);
      const user: User = existing
        ? { ...existing, displayName: displayName ?? existing.displayName }
        : { id: userId, displayName, language: null, activeRequestId: null, createdAt: Date.now() };

      if (user.activeRequestId) {
        const request = await tx.getRequest(user.activeRequestId);
        if (request?.status === 'OPEN') {
          tx.putUser(user);
          return { kind: 'pending', user, request };
        }
        if (request?.status === 'ASSIGNED') {
          tx.putUser(user);
          return { kind: 'in_conversation', user, request };
        }
      }

      const reset: User = { ...user, language: null, activeRequestId: null };
      tx.putUser(reset);
      if (!existing) this.log.info({ userId }, 'New user created');
      return { kind: 'choose_language', user: reset, languages: this.catalog.list() };
    });
  }

  async selectLanguage(userId: string, code: string): Promise<SelectLanguageResult> {
    if (!this.catalog.has(code)) return { ok: false, error: 'InvalidLanguage' };
    const language = normalizeLanguage(code);

    return this.store.transaction({ users: [userId] }, async (tx): Promise<SelectLanguageResult> => {
      const user = await tx.getUser(userId);
      if (!user) return { ok: false, error: 'NotFound' };
      if (user.activeRequestId) {
        const request = await tx.getRequest(user.activeRequestId);
        if (request && request.status !== 'CLOSED') return { ok: false, error: 'ActiveRequestExists' };
      }
      const updated: User = { ...user, language, activeRequestId: null };
      tx.putUser(updated);
      this.log.info({ userId, language }, 'Customer selected language');
      return { ok: true, user: updated };
    });
  }

  /**
   * Open a request from the customer's first message and broadcast it. A
   * customer with an OPEN request gets that request back and the text joins
   * its log.
   */
  async openRequest(userId: string, text: string): Promise<OpenRequestResult> {
    const requestId = uuidv4();
    type Opened =
      | { ok: true; created: true; request: SupportRequest }
      | { ok: true; created: false; request: SupportRequest }
      | { ok: false; error: 'NotFound' | 'LanguageNotSelected' | 'ActiveRequestExists' };

    const opened = await this.store.transaction(
      { users: [userId], requests: [requestId] },
      async (tx): Promise<Opened> => {
        const user = await tx.getUser(userId);
        if (!user) return { ok: false, error: 'NotFound' };

        if (user.activeRequestId) {
          const existing = await tx.getRequest(user.activeRequestId);
          if (existing?.status === 'OPEN') return { ok: true, created: false, request: existing };
          if (existing?.status === 'ASSIGNED') return { ok: false, error: 'ActiveRequestExists' };
        }
        if (!user.language) return { ok: false, error: 'LanguageNotSelected' };

        const request: SupportRequest = {
          id: requestId,
          userId,
          language: user.language,
          initialQuery: text,
          status: 'OPEN',
          assignedAgentId: null,
          createdAt: Date.now(),
          assignedAt: null,
          closedAt: null,
          closedBy: null,
        };
        tx.putRequest(request);
        tx.appendMessage(newMessage(requestId, 'customer', userId, text));
        tx.putUser({ ...user, activeRequestId: requestId });
        return { ok: true, created: true, request };
      },
    );

    if (!opened.ok) return opened;
    if (!opened.created) {
      await this.logPendingMessage(userId, text);
      return opened;
    }

    this.log.info({ requestId, userId, language: opened.request.language }, 'Support request created');
    const notified = await this.broadcast(opened.request);
    return { ...opened, notified };
  }

  /** Customer text while the request waits for an agent: logged, not relayed. */
  async logPendingMessage(userId: string, text: string): Promise<PendingMessageResult> {
    const user = await this.store.getUser(userId);
    if (!user) return { ok: false, error: 'NotFound' };
    const requestId = user.activeRequestId;
    if (!requestId) return { ok: false, error: 'NoActiveAssignment' };

    return this.store.transaction({ requests: [requestId] }, async (tx): Promise<PendingMessageResult> => {
      const request = await tx.getRequest(requestId);
      if (!request || request.status !== 'OPEN' || request.userId !== userId) {
        return { ok: false, error: 'NoActiveAssignment' };
      }
      const message = newMessage(requestId, 'customer', userId, text);
      tx.appendMessage(message);
      return { ok: true, message, request };
    });
  }

  // ───── Agent side ─────

  async registerAgent(agentId: string, displayName?: string): Promise<{ created: boolean; agent: Agent }> {
    return this.store.transaction({ agents: [agentId] }, async (tx) => {
      const existing = await tx.getAgent(agentId);
      if (existing) return { created: false, agent: existing };

      const agent: Agent = {
        id: agentId,
        displayName,
        languages: [],
        available: true,
        activeAssignment: null,
        createdAt: Date.now(),
      };
      tx.putAgent(agent);
      this.log.info({ agentId }, 'Agent registered');
      return { created: true, agent };
    });
  }

  /** Takes effect for future claims only; a current assignment is kept. */
  async setAgentLanguages(agentId: string, raw: string): Promise<SetLanguagesResult> {
    const { valid, invalid } = parseLanguageList(raw);
    if (invalid.length > 0 || valid.length === 0) return { ok: false, error: 'InvalidLanguage', invalid };

    const updated = await this.updateAgent(agentId, (agent) => ({ ...agent, languages: valid }));
    if (updated.ok) this.log.info({ agentId, languages: valid }, 'Agent languages updated');
    return updated;
  }

  /** Becoming available while free offers the agent every matching pending request. */
  async toggleAvailability(agentId: string): Promise<AvailabilityResult> {
    const updated = await this.updateAgent(agentId, (agent) => ({ ...agent, available: !agent.available }));
    if (!updated.ok) return updated;

    const { agent } = updated;
    this.log.info({ agentId, available: agent.available }, 'Agent availability toggled');
    if (!agent.available || agent.activeAssignment) return { ok: true, agent, offered: 0 };

    const pending = await this.matcher.pendingRequestsFor(agent);
    for (const request of pending) {
      await this.store.recordBroadcast(request.id, [agent.id]);
      this.notifier.dispatch('broadcastNewRequest', (g) => g.broadcastNewRequest(request, [agent]));
    }
    return { ok: true, agent, offered: pending.length };
  }

  /** The agent's current assignment and the OPEN requests in their languages. */
  async listAgentRequests(agentId: string): Promise<AgentRequestsResult> {
    const agent = await this.store.getAgent(agentId);
    if (!agent) return { ok: false, error: 'NotFound' };

    const assigned = agent.activeAssignment ? await this.store.getRequest(agent.activeAssignment) : null;
    const pending = await this.matcher.pendingRequestsFor(agent);
    for (const request of pending) {
      await this.store.recordBroadcast(request.id, [agent.id]);
    }
    return { ok: true, assigned, pending };
  }

  private async updateAgent(agentId: string, change: (agent: Agent) => Agent): Promise<AgentUpdateResult> {
    return this.store.transaction({ agents: [agentId] }, async (tx): Promise<AgentUpdateResult> => {
      const agent = await tx.getAgent(agentId);
      if (!agent) return { ok: false, error: 'NotFound' };
      const updated = change(agent);
      tx.putAgent(updated);
      return { ok: true, agent: updated };
    });
  }

  private async broadcast(request: SupportRequest): Promise<number> {
    const agents = await this.matcher.eligibleAgents(request);
    if (agents.length === 0) {
      this.log.warn({ requestId: request.id, language: request.language }, 'No available agents for language');
      this.notifier.dispatch('notifyNoAgentsAvailable', (g) => g.notifyNoAgentsAvailable(request));
      return 0;
    }

    await this.store.recordBroadcast(request.id, agents.map((a) => a.id));
    this.notifier.dispatch('broadcastNewRequest', (g) => g.broadcastNewRequest(request, agents));
    return agents.length;
  }
}
