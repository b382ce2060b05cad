/**
 * Payment event construction
 *
 * createPaymentEvent is the only way an event comes into existence. It either
 * returns a frozen, fully populated event or the first rule the input broke;
 * nothing half-validated is ever observable.
 */

import { canonicalAmount, isPositiveAmount } from './amount';
import { computeEventId, normalizeWallet } from './event-id';
import { ValidationError } from './errors';
import { PAYMENT_STATUSES } from './types';
import type { PaymentEvent, PaymentStatus, ReportPaymentInput } from './types';

export const MS_PER_DAY = 86_400_000;
export const DEFAULT_CURRENCY = 'USD';

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: ValidationError };

// ISO date-time without an offset; read as UTC rather than host-local time
const NAIVE_DATE_TIME = /T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

export function parseTimestamp(value: string | Date): Date | null {
  let date: Date;
  if (value instanceof Date) {
    date = new Date(value.getTime());
  } else {
    const text = value.trim();
    date = new Date(NAIVE_DATE_TIME.test(text) ? `${text}Z` : text);
  }
  return Number.isNaN(date.getTime()) ? null : date;
}

export function isPaymentStatus(value: unknown): value is PaymentStatus {
  return typeof value === 'string' && (PAYMENT_STATUSES as readonly string[]).includes(value);
}

export function isWalletAddress(wallet: string): boolean {
  return /^0x.+$/.test(normalizeWallet(wallet));
}

/**
 * Whole days from dueDate to paymentDate (or now when unpaid), floored, never negative.
 */
export function computeDaysOverdue(dueDate: Date, paymentDate: Date | null, now: Date): number {
  const end = paymentDate ?? now;
  return Math.max(0, Math.floor((end.getTime() - dueDate.getTime()) / MS_PER_DAY));
}

/**
 * Defaulted events stay open, so their lateness is recomputed on every read.
 */
export function refreshDaysOverdue(event: PaymentEvent, now: Date): PaymentEvent {
  if (event.status !== 'defaulted') {
    return event;
  }
  const days_overdue = computeDaysOverdue(new Date(event.due_date), null, now);
  return days_overdue === event.days_overdue ? event : Object.freeze({ ...event, days_overdue });
}

function fail(field: string, rule: ValidationError['rule'], message: string): ValidationResult<never> {
  return { success: false, error: new ValidationError(field, rule, message) };
}

export function createPaymentEvent(
  input: ReportPaymentInput,
  now: Date = new Date(),
): ValidationResult<PaymentEvent> {
  for (const field of ['payer_wallet', 'payee_wallet', 'reporter_wallet'] as const) {
    if (!isWalletAddress(input[field])) {
      return fail(field, 'wallet_format', `${field} must start with '0x' followed by an identifier`);
    }
  }

  const payer = normalizeWallet(input.payer_wallet);
  const payee = normalizeWallet(input.payee_wallet);
  if (payer === payee) {
    return fail('payee_wallet', 'self_payment', 'Payer and payee must be different');
  }

  const amount = canonicalAmount(input.amount);
  if (amount === null) {
    return fail('amount', 'amount_format', 'amount must be a plain decimal number');
  }
  if (!isPositiveAmount(amount)) {
    return fail('amount', 'amount_positive', 'amount must be greater than zero');
  }

  const dueDate = parseTimestamp(input.due_date);
  if (!dueDate) {
    return fail('due_date', 'date_format', 'due_date must be an ISO-8601 timestamp');
  }

  let paymentDate: Date | null = null;
  if (input.payment_date !== undefined && input.payment_date !== null) {
    paymentDate = parseTimestamp(input.payment_date);
    if (!paymentDate) {
      return fail('payment_date', 'date_format', 'payment_date must be an ISO-8601 timestamp');
    }
  }

  const status = input.status;
  if (!isPaymentStatus(status)) {
    return fail('status', 'status', `status must be one of: ${PAYMENT_STATUSES.join(', ')}`);
  }

  const base = {
    event_id: computeEventId(payer, payee, amount, dueDate),
    payer_wallet: payer,
    payee_wallet: payee,
    amount,
    currency: input.currency?.trim() || DEFAULT_CURRENCY,
    due_date: dueDate.toISOString(),
    reported_at: now.toISOString(),
    reporter_wallet: normalizeWallet(input.reporter_wallet),
  };

  switch (status) {
    case 'on_time':
      if (!paymentDate) {
        return fail('payment_date', 'payment_date_required', "payment_date is required when status is 'on_time'");
      }
      if (paymentDate > dueDate) {
        return fail('payment_date', 'on_time_after_due', "payment_date must be on or before due_date for 'on_time'");
      }
      return {
        success: true,
        data: Object.freeze({ ...base, status, payment_date: paymentDate.toISOString(), days_overdue: 0 as const }),
      };

    case 'late':
      if (!paymentDate) {
        return fail('payment_date', 'payment_date_required', "payment_date is required when status is 'late'");
      }
      if (paymentDate <= dueDate) {
        return fail('payment_date', 'late_not_after_due', "payment_date must be after due_date for 'late'");
      }
      return {
        success: true,
        data: Object.freeze({
          ...base,
          status,
          payment_date: paymentDate.toISOString(),
          days_overdue: computeDaysOverdue(dueDate, paymentDate, now),
        }),
      };

    case 'defaulted':
      if (paymentDate) {
        return fail('payment_date', 'payment_date_forbidden', "payment_date must be omitted when status is 'defaulted'");
      }
      return {
        success: true,
        data: Object.freeze({
          ...base,
          status,
          payment_date: null,
          days_overdue: computeDaysOverdue(dueDate, null, now),
        }),
      };

    default: {
      const unreachable: never = status;
      return fail('status', 'status', `Unknown status: ${String(unreachable)}`);
    }
  }
}
