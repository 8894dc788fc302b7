import { Agent, ChatMessage, RequestStatus, SupportRequest, User } from '../desk/types';

/** Rows a transaction locks and may write */
export interface TransactionScope {
  users?: string[];
  agents?: string[];
  requests?: string[];
}

export interface StoreReader {
  getUser(id: string): Promise<User | null>;
  getAgent(id: string): Promise<Agent | null>;
  getRequest(id: string): Promise<SupportRequest | null>;
}

/**
 * Reads see the transaction's own pending writes. Writes are buffered and
 * committed together once the work function resolves.
 */
export interface StoreTransaction extends StoreReader {
  putUser(user: User): void;
  putAgent(agent: Agent): void;
  putRequest(request: SupportRequest): void;
  appendMessage(message: ChatMessage): void;
}

export interface PendingWrites {
  users: Map<string, User>;
  agents: Map<string, Agent>;
  requests: Map<string, SupportRequest>;
  messages: ChatMessage[];
}

export interface EntityStore extends StoreReader {
  transaction<T>(scope: TransactionScope, work: (tx: StoreTransaction) => Promise<T>): Promise<T>;
  listAgents(): Promise<Agent[]>;
  /** Oldest first */
  listRequests(status?: RequestStatus): Promise<SupportRequest[]>;
  listMessages(requestId: string): Promise<ChatMessage[]>;
  recordBroadcast(requestId: string, agentIds: string[]): Promise<void>;
  listBroadcastRecipients(requestId: string): Promise<string[]>;
}

export interface LockLease {
  release(): Promise<void>;
}

export interface KeyedLock<L extends LockLease = LockLease> {
  /** Resolves once every key is held. */
  acquire(keys: string[]): Promise<L>;
}
