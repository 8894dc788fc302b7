import { Agent, ChatMessage, RequestStatus, SupportRequest, User } from '../desk/types';
import { InMemoryKeyedLock } from './keyed-lock';
import { runTransaction } from './transaction';
import { EntityStore, PendingWrites, StoreTransaction, TransactionScope } from './types';

/**
 * In-memory entity store (dev/test fallback).
 * Rows are cloned on the way in and out, so callers never share references
 * with the stored state.
 */
export class InMemoryEntityStore implements EntityStore {
  private readonly users = new Map<string, User>();
  private readonly agents = new Map<string, Agent>();
  private readonly requests = new Map<string, SupportRequest>();
  private readonly messages = new Map<string, ChatMessage[]>();
  private readonly broadcasts = new Map<string, Set<string>>();
  readonly lock = new InMemoryKeyedLock();

  async getUser(id: string): Promise<User | null> {
    const user = this.users.get(id);
    return user ? structuredClone(user) : null;
  }

  async getAgent(id: string): Promise<Agent | null> {
    const agent = this.agents.get(id);
    return agent ? structuredClone(agent) : null;
  }

  async getRequest(id: string): Promise<SupportRequest | null> {
    const request = this.requests.get(id);
    return request ? structuredClone(request) : null;
  }

  transaction<T>(scope: TransactionScope, work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    return runTransaction(this.lock, this, scope, async (writes) => this.apply(writes), work);
  }

  async listAgents(): Promise<Agent[]> {
    return Array.from(this.agents.values())
      .map((a) => structuredClone(a))
      .sort((a, b) => a.createdAt - b.createdAt);
  }

  async listRequests(status?: RequestStatus): Promise<SupportRequest[]> {
    return Array.from(this.requests.values())
      .filter((r) => !status || r.status === status)
      .map((r) => structuredClone(r))
      .sort((a, b) => a.createdAt - b.createdAt);
  }

  async listMessages(requestId: string): Promise<ChatMessage[]> {
    return (this.messages.get(requestId) ?? []).map((m) => ({ ...m }));
  }

  async recordBroadcast(requestId: string, agentIds: string[]): Promise<void> {
    let recipients = this.broadcasts.get(requestId);
    if (!recipients) {
      recipients = new Set();
      this.broadcasts.set(requestId, recipients);
    }
    for (const id of agentIds) recipients.add(id);
  }

  async listBroadcastRecipients(requestId: string): Promise<string[]> {
    return Array.from(this.broadcasts.get(requestId) ?? []);
  }

  private apply(writes: PendingWrites): void {
    for (const [id, user] of writes.users) this.users.set(id, user);
    for (const [id, agent] of writes.agents) this.agents.set(id, agent);
    for (const [id, request] of writes.requests) this.requests.set(id, request);
    for (const message of writes.messages) {
      let log = this.messages.get(message.requestId);
      if (!log) {
        log = [];
        this.messages.set(message.requestId, log);
      }
      log.push(message);
    }
  }
}
