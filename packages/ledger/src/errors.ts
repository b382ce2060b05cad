/**
 * Ledger error model
 *
 * Every failure the ledger reports carries a stable `code` that transports
 * map onto their own responses.
 */

export type LedgerErrorCode = 'validation_error' | 'duplicate_event' | 'store_unavailable';

export type ValidationRule =
  | 'wallet_format'
  | 'self_payment'
  | 'amount_format'
  | 'amount_positive'
  | 'date_format'
  | 'status'
  | 'payment_date_required'
  | 'payment_date_forbidden'
  | 'on_time_after_due'
  | 'late_not_after_due'
  | 'page'
  | 'page_size';

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Input rejected before it reached the store.
 */
export class ValidationError extends LedgerError {
  readonly field: string;
  readonly rule: ValidationRule;

  constructor(field: string, rule: ValidationRule, message: string) {
    super('validation_error', message);
    this.field = field;
    this.rule = rule;
  }
}

/**
 * The same logical payment (payer, payee, amount, due date) is already recorded.
 */
export class DuplicateEventError extends LedgerError {
  readonly eventId: string;

  constructor(eventId: string) {
    super('duplicate_event', `Payment event already exists: ${eventId}`);
    this.eventId = eventId;
  }
}

export class StoreUnavailableError extends LedgerError {
  constructor(operation: string, cause?: unknown) {
    super('store_unavailable', `Ledger store unavailable during ${operation}`, { cause });
  }
}
