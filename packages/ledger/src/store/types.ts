import type { Agent, PaymentEvent, PaymentRole, PaymentStatus } from '../types';

export interface PageResult {
  totalCount: number;
  events: PaymentEvent[];
}

/**
 * Persistence contract for the payment ledger.
 *
 * Events are append-only: insert is the only write path and it rejects a
 * second event with the same id. Agents are an upsertable projection.
 * Implementations normalize every wallet before reading or writing.
 */
export interface LedgerStore {
  /** Rejects with DuplicateEventError if event_id is already stored. */
  insert(event: PaymentEvent): Promise<PaymentEvent>;
  /** Newest reported_at first; ties by event_id descending. */
  findByWallet(wallet: string, role: PaymentRole, status?: PaymentStatus): Promise<PaymentEvent[]>;
  /** 1-indexed. Pages past the end are empty but still report totalCount. */
  page(
    wallet: string,
    role: PaymentRole,
    status: PaymentStatus | undefined,
    page: number,
    pageSize: number,
  ): Promise<PageResult>;

  /** payer.total_payments_made += 1 and payee.total_payments_received += 1, creating either record. */
  upsertAgentCounters(payer: string, payee: string): Promise<void>;
  getAgent(wallet: string): Promise<Agent | null>;
  createAgentIfAbsent(wallet: string, defaultScore: number): Promise<Agent>;
  /** Full replace of the score and payer-event count; never an increment. */
  setAgentScore(wallet: string, score: number, paymentCountAsPayer: number, now: Date): Promise<Agent>;

  ping(): Promise<boolean>;
  close(): Promise<void>;
}
