/**
 * @agent-credit/ledger
 *
 * Payment event ledger with content-addressed idempotency, agent records
 * and a bounded credit score derived from payer history.
 */

export * from './types';
export * from './errors';
export { canonicalAmount, compareAmounts, isPositiveAmount } from './amount';
export { computeEventId, normalizeWallet, EVENT_ID_PREFIX } from './event-id';
export {
  createPaymentEvent,
  computeDaysOverdue,
  refreshDaysOverdue,
  parseTimestamp,
  isPaymentStatus,
  isWalletAddress,
  DEFAULT_CURRENCY,
  MS_PER_DAY,
} from './event';
export type { ValidationResult } from './event';
export {
  calculateCreditScore,
  clampScore,
  latePenalty,
  resolveScoringConfig,
  DEFAULT_SCORING_CONFIG,
} from './scoring';
export type { ScoringConfig } from './scoring';
export { AgentRecordManager, isNewAgent } from './agents';
export { CreditLedger } from './ledger';
export type { CreditLedgerOptions } from './ledger';
export { KeyedMutex } from './mutex';
export { InMemoryLedgerStore } from './store/memory';
export type { InMemoryLedgerStoreOptions } from './store/memory';
export { RedisLedgerStore } from './store/redis';
export type { RedisLedgerStoreOptions } from './store/redis';
export { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE, pageWindow, totalPages } from './store/paging';
export type { LedgerStore, PageResult } from './store/types';
export { PaymentEventSchema, AgentSchema } from './schema';
export { logger } from './logging';
export type { Logger } from './logging';
