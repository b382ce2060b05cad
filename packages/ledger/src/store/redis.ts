import type { ChainableCommander, Redis } from 'ioredis';
import { DuplicateEventError, LedgerError, StoreUnavailableError } from '../errors';
import { refreshDaysOverdue } from '../event';
import { normalizeWallet, withNormalizedWallets } from '../event-id';
import { logger as defaultLogger } from '../logging';
import type { Logger } from '../logging';
import { parseStoredAgent, parseStoredEvent } from '../schema';
import { DEFAULT_SCORING_CONFIG } from '../scoring';
import type { Agent, Clock, PaymentEvent, PaymentRole, PaymentStatus } from '../types';
import { pageWindow } from './paging';
import type { LedgerStore, PageResult } from './types';

// KEYS[1]=event key, KEYS[2..]=index keys; ARGV[1]=event JSON ARGV[2]=reported_at ms ARGV[3]=event id
const INSERT_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 1 then
  return 0
end
redis.call('SET', KEYS[1], ARGV[1])
for i = 2, #KEYS do
  redis.call('ZADD', KEYS[i], ARGV[2], ARGV[3])
end
return 1
`;

export interface RedisLedgerStoreOptions {
  keyPrefix?: string;
  defaultScore?: number;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Redis-backed ledger.
 *
 * Layout (all keys under the prefix):
 *   event:<id>                      JSON event
 *   idx:<role>:<wallet>[:<status>]  sorted sets of event ids scored by reported_at (ms)
 *   agent:<wallet>                  hash of agent fields
 *
 * An event and all of its index entries are written by one script, so a
 * failed insert leaves nothing behind and can be retried.
 *
 * Members with equal scores come back from ZREVRANGE in descending id order,
 * which matches the tie-break of the in-memory store.
 */
export class RedisLedgerStore implements LedgerStore {
  private readonly keyPrefix: string;
  private readonly defaultScore: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly redis: Redis,
    options: RedisLedgerStoreOptions = {},
  ) {
    this.keyPrefix = options.keyPrefix ?? 'credit:';
    this.defaultScore = options.defaultScore ?? DEFAULT_SCORING_CONFIG.defaultScore;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
  }

  async insert(event: PaymentEvent): Promise<PaymentEvent> {
    const stored = withNormalizedWallets(event);
    const keys = [this.eventKey(stored.event_id)];
    for (const [side, wallet] of [
      ['payer', stored.payer_wallet],
      ['payee', stored.payee_wallet],
    ] as const) {
      for (const role of [side, 'all'] as const) {
        keys.push(this.indexKey(role, wallet), this.indexKey(role, wallet, stored.status));
      }
    }

    const created = await this.run('insert', () =>
      this.redis.eval(
        INSERT_SCRIPT,
        keys.length,
        ...keys,
        JSON.stringify(stored),
        Date.parse(stored.reported_at),
        stored.event_id,
      ),
    );
    if (created !== 1 && created !== '1') {
      this.logger.warn({ eventId: stored.event_id }, 'Duplicate payment event rejected');
      throw new DuplicateEventError(stored.event_id);
    }

    this.logger.debug({ eventId: stored.event_id, status: stored.status }, 'Payment event stored in Redis');
    return refreshDaysOverdue(stored, this.clock());
  }

  async findByWallet(wallet: string, role: PaymentRole, status?: PaymentStatus): Promise<PaymentEvent[]> {
    const ids = await this.run('findByWallet', () =>
      this.redis.zrevrange(this.indexKey(role, normalizeWallet(wallet), status), 0, -1),
    );
    return this.loadEvents(ids);
  }

  async page(
    wallet: string,
    role: PaymentRole,
    status: PaymentStatus | undefined,
    page: number,
    pageSize: number,
  ): Promise<PageResult> {
    const { start, end } = pageWindow(page, pageSize);
    const key = this.indexKey(role, normalizeWallet(wallet), status);

    const totalCount = await this.run('page', () => this.redis.zcard(key));
    if (start >= totalCount) {
      return { totalCount, events: [] };
    }

    const ids = await this.run('page', () => this.redis.zrevrange(key, start, end - 1));
    return { totalCount, events: await this.loadEvents(ids) };
  }

  async upsertAgentCounters(payer: string, payee: string): Promise<void> {
    const now = this.clock().toISOString();
    const payerKey = this.agentKey(normalizeWallet(payer));
    const payeeKey = this.agentKey(normalizeWallet(payee));

    const multi = this.redis.multi();
    this.queueAgentDefaults(multi, normalizeWallet(payer), this.defaultScore, now);
    multi.hincrby(payerKey, 'total_payments_made', 1);
    this.queueAgentDefaults(multi, normalizeWallet(payee), this.defaultScore, now);
    multi.hincrby(payeeKey, 'total_payments_received', 1);
    await this.exec('upsertAgentCounters', multi);
  }

  async getAgent(wallet: string): Promise<Agent | null> {
    const fields = await this.run('getAgent', () => this.redis.hgetall(this.agentKey(normalizeWallet(wallet))));
    if (Object.keys(fields).length === 0) {
      return null;
    }
    return parseStoredAgent(fields);
  }

  async createAgentIfAbsent(wallet: string, defaultScore: number): Promise<Agent> {
    const normalized = normalizeWallet(wallet);
    const multi = this.redis.multi();
    this.queueAgentDefaults(multi, normalized, defaultScore, this.clock().toISOString());
    multi.hgetall(this.agentKey(normalized));
    const results = await this.exec('createAgentIfAbsent', multi);

    const fields = results[results.length - 1];
    if (!isStringRecord(fields)) {
      throw new StoreUnavailableError('createAgentIfAbsent');
    }
    return parseStoredAgent(fields);
  }

  async setAgentScore(wallet: string, score: number, paymentCountAsPayer: number, now: Date): Promise<Agent> {
    const normalized = normalizeWallet(wallet);
    const timestamp = now.toISOString();
    const key = this.agentKey(normalized);

    const multi = this.redis.multi();
    this.queueAgentDefaults(multi, normalized, score, timestamp);
    multi.hset(
      key,
      'credit_score',
      String(score),
      'total_payments_made',
      String(paymentCountAsPayer),
      'last_updated',
      timestamp,
    );
    multi.hgetall(key);
    const results = await this.exec('setAgentScore', multi);

    const fields = results[results.length - 1];
    if (!isStringRecord(fields)) {
      throw new StoreUnavailableError('setAgentScore');
    }
    return parseStoredAgent(fields);
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === 'PONG';
    } catch (error) {
      this.logger.error({ err: error }, 'Redis ping failed');
      return false;
    }
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }

  private key(suffix: string): string {
    return `${this.keyPrefix}${suffix}`;
  }

  private eventKey(eventId: string): string {
    return this.key(`event:${eventId}`);
  }

  private agentKey(wallet: string): string {
    return this.key(`agent:${wallet}`);
  }

  private indexKey(role: PaymentRole, wallet: string, status?: PaymentStatus): string {
    return this.key(status ? `idx:${role}:${wallet}:${status}` : `idx:${role}:${wallet}`);
  }

  private queueAgentDefaults(multi: ChainableCommander, wallet: string, score: number, now: string): void {
    const key = this.agentKey(wallet);
    multi.hsetnx(key, 'wallet_address', wallet);
    multi.hsetnx(key, 'credit_score', String(score));
    multi.hsetnx(key, 'total_payments_made', '0');
    multi.hsetnx(key, 'total_payments_received', '0');
    multi.hsetnx(key, 'created_at', now);
    multi.hsetnx(key, 'last_updated', now);
  }

  private async loadEvents(ids: string[]): Promise<PaymentEvent[]> {
    if (ids.length === 0) {
      return [];
    }

    const rows = await this.run('loadEvents', () => this.redis.mget(...ids.map((id) => this.eventKey(id))));
    const now = this.clock();
    const events: PaymentEvent[] = [];
    rows.forEach((row, index) => {
      if (row === null) {
        this.logger.warn({ eventId: ids[index] }, 'Indexed payment event missing from store');
        return;
      }
      events.push(refreshDaysOverdue(parseStoredEvent(row), now));
    });
    return events;
  }

  private async run<T>(operation: string, command: () => Promise<T>): Promise<T> {
    try {
      return await command();
    } catch (error) {
      if (error instanceof LedgerError) {
        throw error;
      }
      this.logger.error({ err: error, operation }, 'Redis command failed');
      throw new StoreUnavailableError(operation, error);
    }
  }

  private async exec(operation: string, multi: ChainableCommander): Promise<unknown[]> {
    const results = await this.run(operation, () => multi.exec());
    if (!results) {
      throw new StoreUnavailableError(operation);
    }

    const values: unknown[] = [];
    for (const [error, value] of results) {
      if (error) {
        this.logger.error({ err: error, operation }, 'Redis transaction command failed');
        throw new StoreUnavailableError(operation, error);
      }
      values.push(value);
    }
    return values;
  }
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((field) => typeof field === 'string')
  );
}
