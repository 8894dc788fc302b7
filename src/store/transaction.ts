import { Agent, ChatMessage, SupportRequest, User } from '../desk/types';
import { TransactionScopeError } from './errors';
import { KeyedLock, LockLease, PendingWrites, StoreReader, StoreTransaction, TransactionScope } from './types';

type ScopedEntity = keyof TransactionScope;

const LOCK_PREFIX: Record<ScopedEntity, string> = {
  users: 'user',
  agents: 'agent',
  requests: 'request',
};

const SCOPED_ENTITIES: ScopedEntity[] = ['users', 'agents', 'requests'];

/** Lock keys for a scope, de-duplicated and sorted so every caller locks in the same order. */
export function scopeKeys(scope: TransactionScope): string[] {
  const keys = new Set<string>();
  for (const entity of SCOPED_ENTITIES) {
    for (const id of scope[entity] ?? []) {
      keys.add(`${LOCK_PREFIX[entity]}:${id}`);
    }
  }
  return [...keys].sort();
}

export class BufferedTransaction implements StoreTransaction {
  readonly writes: PendingWrites = {
    users: new Map(),
    agents: new Map(),
    requests: new Map(),
    messages: [],
  };

  constructor(
    private readonly reader: StoreReader,
    private readonly scope: TransactionScope,
  ) {}

  async getUser(id: string): Promise<User | null> {
    const pending = this.writes.users.get(id);
    return pending ? structuredClone(pending) : this.reader.getUser(id);
  }

  async getAgent(id: string): Promise<Agent | null> {
    const pending = this.writes.agents.get(id);
    return pending ? structuredClone(pending) : this.reader.getAgent(id);
  }

  async getRequest(id: string): Promise<SupportRequest | null> {
    const pending = this.writes.requests.get(id);
    return pending ? structuredClone(pending) : this.reader.getRequest(id);
  }

  putUser(user: User): void {
    this.assertInScope('users', user.id);
    this.writes.users.set(user.id, structuredClone(user));
  }

  putAgent(agent: Agent): void {
    this.assertInScope('agents', agent.id);
    this.writes.agents.set(agent.id, structuredClone(agent));
  }

  putRequest(request: SupportRequest): void {
    this.assertInScope('requests', request.id);
    this.writes.requests.set(request.id, structuredClone(request));
  }

  appendMessage(message: ChatMessage): void {
    this.assertInScope('requests', message.requestId);
    this.writes.messages.push({ ...message });
  }

  private assertInScope(entity: ScopedEntity, id: string): void {
    if (!(this.scope[entity] ?? []).includes(id)) {
      throw new TransactionScopeError(LOCK_PREFIX[entity], id);
    }
  }
}

/**
 * Lock the scope, run the work against a buffered transaction, then commit
 * every write or none. The commit receives the lease so a driver whose locks
 * can expire may check it still holds them. Locks are released whatever the
 * outcome.
 */
export async function runTransaction<T, L extends LockLease>(
  lock: KeyedLock<L>,
  reader: StoreReader,
  scope: TransactionScope,
  commit: (writes: PendingWrites, lease: L) => Promise<void>,
  work: (tx: StoreTransaction) => Promise<T>,
): Promise<T> {
  const lease = await lock.acquire(scopeKeys(scope));
  try {
    const tx = new BufferedTransaction(reader, scope);
    const result = await work(tx);
    await commit(tx.writes, lease);
    return result;
  } finally {
    await lease.release();
  }
}
