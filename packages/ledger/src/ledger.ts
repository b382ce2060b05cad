/**
 * Credit ledger facade
 *
 * The three operations a transport needs: report a payment, read a score,
 * read a history page. The store handle is passed in; the caller owns its
 * lifecycle.
 */

import { AgentRecordManager } from './agents';
import { createPaymentEvent } from './event';
import { normalizeWallet } from './event-id';
import { logger as defaultLogger } from './logging';
import type { Logger } from './logging';
import { resolveScoringConfig } from './scoring';
import type { ScoringConfig } from './scoring';
import { DEFAULT_PAGE_SIZE, totalPages } from './store/paging';
import type { LedgerStore } from './store/types';
import type {
  AgentScore,
  Clock,
  HistoryQuery,
  PaymentEvent,
  PaymentHistory,
  RecordedPayment,
  ReportPaymentInput,
} from './types';

export interface CreditLedgerOptions {
  store: LedgerStore;
  scoring?: Partial<ScoringConfig>;
  clock?: Clock;
  logger?: Logger;
}

export class CreditLedger {
  readonly store: LedgerStore;
  readonly scoring: ScoringConfig;
  readonly agents: AgentRecordManager;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: CreditLedgerOptions) {
    this.store = options.store;
    this.scoring = resolveScoringConfig(options.scoring);
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
    this.agents = new AgentRecordManager(this.store, this.scoring, {
      clock: this.clock,
      logger: this.logger,
    });
  }

  /**
   * Validate and append a payment event, then bump both parties' counters.
   *
   * Throws ValidationError before touching the store, or DuplicateEventError
   * when the same payment was already reported.
   */
  async reportPayment(input: ReportPaymentInput): Promise<PaymentEvent> {
    const result = createPaymentEvent(input, this.clock());
    if (!result.success) {
      this.logger.info(
        { field: result.error.field, rule: result.error.rule },
        'Payment report rejected by validation',
      );
      throw result.error;
    }

    const event = await this.store.insert(result.data);
    await this.store.upsertAgentCounters(event.payer_wallet, event.payee_wallet);

    this.logger.info(
      {
        eventId: event.event_id,
        payer: event.payer_wallet,
        payee: event.payee_wallet,
        amount: event.amount,
        status: event.status,
      },
      'Payment event created',
    );
    return event;
  }

  /**
   * reportPayment, then rescore the payer and read (not rescore) the payee.
   */
  async recordPayment(input: ReportPaymentInput): Promise<RecordedPayment> {
    const event = await this.reportPayment(input);
    const payer = await this.agents.recomputeScore(event.payer_wallet);
    const payee = await this.agents.getScoreSnapshot(event.payee_wallet);
    return { event, scores: { payer, payee: payee.score } };
  }

  async getScore(wallet: string): Promise<AgentScore> {
    const agentId = normalizeWallet(wallet);
    const snapshot = await this.agents.getScoreSnapshot(agentId);
    return { agentId, ...snapshot };
  }

  async getHistory(wallet: string, query: HistoryQuery = {}): Promise<PaymentHistory> {
    const agentId = normalizeWallet(wallet);
    const role = query.role ?? 'all';
    const page = query.page ?? 1;
    const pageSize = query.pageSize ?? DEFAULT_PAGE_SIZE;

    const { totalCount, events } = await this.store.page(agentId, role, query.status, page, pageSize);
    this.logger.debug({ wallet: agentId, role, page, pageSize, totalCount }, 'Payment history retrieved');

    return {
      agentId,
      totalCount,
      page,
      pageSize,
      totalPages: totalPages(totalCount, pageSize),
      events,
    };
  }
}
