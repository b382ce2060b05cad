import { DuplicateEventError } from '../errors';
import { refreshDaysOverdue } from '../event';
import { normalizeWallet, withNormalizedWallets } from '../event-id';
import { logger as defaultLogger } from '../logging';
import type { Logger } from '../logging';
import { DEFAULT_SCORING_CONFIG } from '../scoring';
import type { Agent, Clock, PaymentEvent, PaymentRole, PaymentStatus } from '../types';
import { compareNewestFirst, pageWindow } from './paging';
import type { LedgerStore, PageResult } from './types';

export interface InMemoryLedgerStoreOptions {
  /** Score given to agents created as a side effect of counter upserts */
  defaultScore?: number;
  clock?: Clock;
  logger?: Logger;
}

function matchesRole(event: PaymentEvent, wallet: string, role: PaymentRole): boolean {
  switch (role) {
    case 'payer':
      return event.payer_wallet === wallet;
    case 'payee':
      return event.payee_wallet === wallet;
    case 'all':
      return event.payer_wallet === wallet || event.payee_wallet === wallet;
  }
}

/**
 * Process-local ledger. Every method body runs without yielding, so each
 * write is atomic with respect to other callers.
 */
export class InMemoryLedgerStore implements LedgerStore {
  private readonly events = new Map<string, PaymentEvent>();
  private readonly agents = new Map<string, Agent>();
  private readonly defaultScore: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: InMemoryLedgerStoreOptions = {}) {
    this.defaultScore = options.defaultScore ?? DEFAULT_SCORING_CONFIG.defaultScore;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
  }

  async insert(event: PaymentEvent): Promise<PaymentEvent> {
    if (this.events.has(event.event_id)) {
      this.logger.warn({ eventId: event.event_id }, 'Duplicate payment event rejected');
      throw new DuplicateEventError(event.event_id);
    }

    const stored = withNormalizedWallets(event);
    this.events.set(stored.event_id, stored);
    this.logger.debug({ eventId: stored.event_id, status: stored.status }, 'Payment event stored in memory');
    return refreshDaysOverdue(stored, this.clock());
  }

  async findByWallet(wallet: string, role: PaymentRole, status?: PaymentStatus): Promise<PaymentEvent[]> {
    return this.select(wallet, role, status);
  }

  async page(
    wallet: string,
    role: PaymentRole,
    status: PaymentStatus | undefined,
    page: number,
    pageSize: number,
  ): Promise<PageResult> {
    const { start, end } = pageWindow(page, pageSize);
    const matches = this.select(wallet, role, status);
    return { totalCount: matches.length, events: matches.slice(start, end) };
  }

  async upsertAgentCounters(payer: string, payee: string): Promise<void> {
    const payerAgent = this.ensureAgent(normalizeWallet(payer), this.defaultScore);
    const payeeAgent = this.ensureAgent(normalizeWallet(payee), this.defaultScore);
    payerAgent.total_payments_made += 1;
    payeeAgent.total_payments_received += 1;
  }

  async getAgent(wallet: string): Promise<Agent | null> {
    const agent = this.agents.get(normalizeWallet(wallet));
    return agent ? { ...agent } : null;
  }

  async createAgentIfAbsent(wallet: string, defaultScore: number): Promise<Agent> {
    return { ...this.ensureAgent(normalizeWallet(wallet), defaultScore) };
  }

  async setAgentScore(wallet: string, score: number, paymentCountAsPayer: number, now: Date): Promise<Agent> {
    const agent = this.ensureAgent(normalizeWallet(wallet), score);
    agent.credit_score = score;
    agent.total_payments_made = paymentCountAsPayer;
    agent.last_updated = now.toISOString();
    return { ...agent };
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    // Nothing to release
  }

  /**
   * Drop all events and agents (for testing)
   */
  clear(): void {
    this.events.clear();
    this.agents.clear();
    this.logger.warn('In-memory ledger cleared');
  }

  private select(wallet: string, role: PaymentRole, status?: PaymentStatus): PaymentEvent[] {
    const normalized = normalizeWallet(wallet);
    const now = this.clock();
    return Array.from(this.events.values())
      .filter((event) => matchesRole(event, normalized, role) && (!status || event.status === status))
      .sort(compareNewestFirst)
      .map((event) => refreshDaysOverdue(event, now));
  }

  private ensureAgent(wallet: string, defaultScore: number): Agent {
    const existing = this.agents.get(wallet);
    if (existing) {
      return existing;
    }

    const now = this.clock().toISOString();
    const agent: Agent = {
      wallet_address: wallet,
      credit_score: defaultScore,
      total_payments_made: 0,
      total_payments_received: 0,
      created_at: now,
      last_updated: now,
    };
    this.agents.set(wallet, agent);
    this.logger.info({ wallet, creditScore: defaultScore }, 'Agent created');
    return agent;
  }
}
