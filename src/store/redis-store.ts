import Redis from 'ioredis';
import { Agent, ChatMessage, RequestStatus, SupportRequest, User } from '../desk/types';
import { logger } from '../observability/logger';
import { StoreUnavailableError } from './errors';
import { RedisKeyedLock, RedisLockLease, RedisLockOptions } from './keyed-lock';
import { runTransaction } from './transaction';
import { EntityStore, PendingWrites, StoreTransaction, TransactionScope } from './types';

const STATUSES: RequestStatus[] = ['OPEN', 'ASSIGNED', 'CLOSED'];

type WriteCommand = 'set' | 'sadd' | 'srem' | 'rpush';

// KEYS: the transaction's lock keys, then one data key per write.
// ARGV: lease token, lock count, then a (command, KEYS index, value) triple per write.
// Writes nothing and returns 0 unless every lock still carries the token.
const COMMIT_SCRIPT = `
local locks = tonumber(ARGV[2])
for i = 1, locks do
  if redis.call("get", KEYS[i]) ~= ARGV[1] then
    return 0
  end
end
for i = 3, #ARGV, 3 do
  redis.call(ARGV[i], KEYS[tonumber(ARGV[i + 1])], ARGV[i + 2])
end
return 1
`;

/**
 * Redis-backed entity store.
 *
 * Rows are JSON strings; status sets index requests and a set indexes agents.
 * A transaction holds SET NX locks on its scope and commits its writes in one
 * script that first checks those locks are still its own.
 */
export class RedisEntityStore implements EntityStore {
  private readonly prefix: string;
  private readonly lock: RedisKeyedLock;
  private readonly log = logger.child({ component: 'entity-store-redis' });

  constructor(
    private readonly redis: Redis,
    options: RedisLockOptions,
  ) {
    this.prefix = options.keyPrefix;
    this.lock = new RedisKeyedLock(redis, options);
  }

  private userKey(id: string): string {
    return `${this.prefix}user:${id}`;
  }

  private agentKey(id: string): string {
    return `${this.prefix}agent:${id}`;
  }

  private requestKey(id: string): string {
    return `${this.prefix}request:${id}`;
  }

  private statusKey(status: RequestStatus): string {
    return `${this.prefix}requests:${status}`;
  }

  private messagesKey(requestId: string): string {
    return `${this.prefix}messages:${requestId}`;
  }

  private broadcastKey(requestId: string): string {
    return `${this.prefix}broadcast:${requestId}`;
  }

  private get agentIndexKey(): string {
    return `${this.prefix}agents`;
  }

  async getUser(id: string): Promise<User | null> {
    return this.readJSON<User>(this.userKey(id));
  }

  async getAgent(id: string): Promise<Agent | null> {
    return this.readJSON<Agent>(this.agentKey(id));
  }

  async getRequest(id: string): Promise<SupportRequest | null> {
    return this.readJSON<SupportRequest>(this.requestKey(id));
  }

  transaction<T>(scope: TransactionScope, work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    return runTransaction(this.lock, this, scope, (writes, lease) => this.commit(writes, lease), work);
  }

  async listAgents(): Promise<Agent[]> {
    const ids = await this.guard('list agents', () => this.redis.smembers(this.agentIndexKey));
    const agents = await this.readMany<Agent>(ids.map((id) => this.agentKey(id)));
    return agents.sort((a, b) => a.createdAt - b.createdAt);
  }

  async listRequests(status?: RequestStatus): Promise<SupportRequest[]> {
    const keys = status ? [this.statusKey(status)] : STATUSES.map((s) => this.statusKey(s));
    const ids = await this.guard('list requests', () => this.redis.sunion(...keys));
    const requests = await this.readMany<SupportRequest>(ids.map((id) => this.requestKey(id)));
    return requests.sort((a, b) => a.createdAt - b.createdAt);
  }

  async listMessages(requestId: string): Promise<ChatMessage[]> {
    const raw = await this.guard('list messages', () => this.redis.lrange(this.messagesKey(requestId), 0, -1));
    return raw.map((r) => JSON.parse(r) as ChatMessage);
  }

  async recordBroadcast(requestId: string, agentIds: string[]): Promise<void> {
    if (agentIds.length === 0) return;
    await this.guard('record broadcast', () => this.redis.sadd(this.broadcastKey(requestId), ...agentIds));
  }

  async listBroadcastRecipients(requestId: string): Promise<string[]> {
    return this.guard('list broadcast recipients', () => this.redis.smembers(this.broadcastKey(requestId)));
  }

  private async commit(writes: PendingWrites, lease: RedisLockLease): Promise<void> {
    const ops: Array<[WriteCommand, string, string]> = [];

    for (const [id, user] of writes.users) {
      ops.push(['set', this.userKey(id), JSON.stringify(user)]);
    }
    for (const [id, agent] of writes.agents) {
      ops.push(['set', this.agentKey(id), JSON.stringify(agent)]);
      ops.push(['sadd', this.agentIndexKey, id]);
    }
    for (const [id, request] of writes.requests) {
      ops.push(['set', this.requestKey(id), JSON.stringify(request)]);
      for (const status of STATUSES) {
        ops.push([status === request.status ? 'sadd' : 'srem', this.statusKey(status), id]);
      }
    }
    for (const message of writes.messages) {
      ops.push(['rpush', this.messagesKey(message.requestId), JSON.stringify(message)]);
    }

    if (ops.length === 0) return;

    const keys = [...lease.lockKeys];
    const args = [lease.token, String(lease.lockKeys.length)];
    for (const [command, key, value] of ops) {
      keys.push(key);
      args.push(command, String(keys.length), value);
    }

    const applied = await this.guard('commit', () =>
      this.redis.eval(COMMIT_SCRIPT, keys.length, ...keys.concat(args)),
    );
    if (applied !== 1) {
      this.log.warn({ lockKeys: lease.lockKeys }, 'Lock expired before commit; transaction discarded');
      throw new StoreUnavailableError('Lock expired before commit; nothing was written');
    }
  }

  private async readJSON<T>(key: string): Promise<T | null> {
    const raw = await this.guard('read', () => this.redis.get(key));
    if (!raw) return null;
    return JSON.parse(raw) as T;
  }

  private async readMany<T>(keys: string[]): Promise<T[]> {
    if (keys.length === 0) return [];
    const raw = await this.guard('read', () => this.redis.mget(...keys));
    const rows: T[] = [];
    for (const value of raw) {
      if (value) rows.push(JSON.parse(value) as T);
    }
    return rows;
  }

  private async guard<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      this.log.error({ err, operation }, 'Redis operation failed');
      throw new StoreUnavailableError(`Redis ${operation} failed`, { cause: err });
    }
  }
}
