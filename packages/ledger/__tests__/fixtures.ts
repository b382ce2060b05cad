import { createPaymentEvent, MS_PER_DAY } from '../src/event';
import type { PaymentEvent, ReportPaymentInput } from '../src/types';

export const NOW = new Date('2025-12-01T00:00:00.000Z');
export const DUE = '2025-11-10T00:00:00.000Z';

const HOUR = 3_600_000;

export function report(overrides: Partial<ReportPaymentInput> = {}): ReportPaymentInput {
  return {
    payer_wallet: '0xpayer',
    payee_wallet: '0xpayee',
    amount: '100',
    currency: 'USD',
    due_date: DUE,
    payment_date: '2025-11-09T00:00:00.000Z',
    status: 'on_time',
    reporter_wallet: '0xpayee',
    ...overrides,
  };
}

export function buildEvent(overrides: Partial<ReportPaymentInput> = {}, now: Date = NOW): PaymentEvent {
  const result = createPaymentEvent(report(overrides), now);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

export function onTimeEvent(seq: number, overrides: Partial<ReportPaymentInput> = {}): PaymentEvent {
  return buildEvent({ amount: String(seq + 1), ...overrides });
}

/**
 * Paid `days` whole days (plus an hour) after DUE.
 */
export function lateEvent(days: number, overrides: Partial<ReportPaymentInput> = {}): PaymentEvent {
  const paid = new Date(Date.parse(DUE) + days * MS_PER_DAY + HOUR);
  return buildEvent({ status: 'late', payment_date: paid.toISOString(), amount: `7.${days + 1}`, ...overrides });
}

export function defaultedEvent(seq: number, overrides: Partial<ReportPaymentInput> = {}): PaymentEvent {
  return buildEvent({ status: 'defaulted', payment_date: null, amount: `9${seq}`, ...overrides });
}

/**
 * Mutable test clock.
 */
export function testClock(start: Date = NOW) {
  let current = start.getTime();
  return {
    now: (): Date => new Date(current),
    advance(ms: number): void {
      current += ms;
    },
  };
}
