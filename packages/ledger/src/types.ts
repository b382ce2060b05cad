/**
 * Ledger domain types
 *
 * Payment events are a closed union on `status`. Timestamps travel as
 * ISO-8601 strings and amounts as canonical decimal strings, so events
 * survive a JSON round trip through any store unchanged.
 */

export const PAYMENT_STATUSES = ['on_time', 'late', 'defaulted'] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

/**
 * Which side of a payment a wallet is matched on. `all` matches either side.
 */
export const PAYMENT_ROLES = ['all', 'payer', 'payee'] as const;
export type PaymentRole = (typeof PAYMENT_ROLES)[number];

interface PaymentEventBase {
  /** Content address of (payer, payee, amount, due_date) */
  readonly event_id: string;
  readonly payer_wallet: string;
  readonly payee_wallet: string;
  /** Canonical positive decimal, e.g. "150.5" */
  readonly amount: string;
  readonly currency: string;
  readonly due_date: string;
  readonly reported_at: string;
  readonly reporter_wallet: string;
}

export interface OnTimePaymentEvent extends PaymentEventBase {
  readonly status: 'on_time';
  readonly payment_date: string;
  readonly days_overdue: 0;
}

export interface LatePaymentEvent extends PaymentEventBase {
  readonly status: 'late';
  readonly payment_date: string;
  readonly days_overdue: number;
}

export interface DefaultedPaymentEvent extends PaymentEventBase {
  readonly status: 'defaulted';
  readonly payment_date: null;
  /** Days since due_date, refreshed whenever the event is read */
  readonly days_overdue: number;
}

export type PaymentEvent = OnTimePaymentEvent | LatePaymentEvent | DefaultedPaymentEvent;

export interface Agent {
  wallet_address: string;
  credit_score: number;
  total_payments_made: number;
  total_payments_received: number;
  created_at: string;
  last_updated: string;
}

/**
 * Untrusted payment report, as received from a transport.
 */
export interface ReportPaymentInput {
  payer_wallet: string;
  payee_wallet: string;
  amount: string | number;
  currency?: string;
  due_date: string | Date;
  payment_date?: string | Date | null;
  status: string;
  reporter_wallet: string;
}

export interface ScoreSnapshot {
  score: number;
  lastUpdated: string;
  paymentsCount: number;
  isNewAgent: boolean;
}

export interface AgentScore extends ScoreSnapshot {
  agentId: string;
}

export interface HistoryQuery {
  role?: PaymentRole;
  status?: PaymentStatus;
  page?: number;
  pageSize?: number;
}

export interface PaymentHistory {
  agentId: string;
  totalCount: number;
  page: number;
  pageSize: number;
  totalPages: number;
  events: PaymentEvent[];
}

export interface RecordedPayment {
  event: PaymentEvent;
  scores: {
    payer: number;
    payee: number;
  };
}

export type Clock = () => Date;
