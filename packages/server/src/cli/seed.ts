import { DuplicateEventError, MS_PER_DAY } from '@agent-credit/ledger';
import type { CreditLedger, ReportPaymentInput } from '@agent-credit/ledger';

const HOUR = 3_600_000;

interface DemoPayment {
  counterparty: string;
  /** Wallet pays the counterparty unless incoming is set */
  incoming?: boolean;
  amount: string;
  dueDaysAgo: number;
  status: 'on_time' | 'late' | 'defaulted';
  /** Whole days after due for late payments */
  daysLate?: number;
}

const DEMO_PAYMENTS: DemoPayment[] = [
  { counterparty: '0xdemo-merchant-1', amount: '25', dueDaysAgo: 20, status: 'on_time' },
  { counterparty: '0xdemo-merchant-1', amount: '50', dueDaysAgo: 30, status: 'on_time' },
  { counterparty: '0xdemo-merchant-2', amount: '75', dueDaysAgo: 50, status: 'on_time' },
  { counterparty: '0xdemo-merchant-2', amount: '100', dueDaysAgo: 60, status: 'on_time' },
  { counterparty: '0xdemo-merchant-3', amount: '125', dueDaysAgo: 80, status: 'on_time' },
  { counterparty: '0xdemo-merchant-3', amount: '150', dueDaysAgo: 90, status: 'on_time' },
  { counterparty: '0xdemo-merchant-1', amount: '310.5', dueDaysAgo: 40, status: 'late', daysLate: 3 },
  { counterparty: '0xdemo-merchant-4', amount: '88', dueDaysAgo: 70, status: 'late', daysLate: 12 },
  { counterparty: '0xdemo-merchant-4', amount: '500', dueDaysAgo: 45, status: 'defaulted' },
  { counterparty: '0xdemo-client-1', incoming: true, amount: '42', dueDaysAgo: 15, status: 'on_time' },
];

export interface SeedResult {
  recorded: number;
  skipped: number;
}

function startOfUtcDay(date: Date): number {
  return Math.floor(date.getTime() / MS_PER_DAY) * MS_PER_DAY;
}

function toReport(wallet: string, payment: DemoPayment, now: Date): ReportPaymentInput {
  // Due dates hang off midnight UTC so every run on one day yields the same event ids
  const due = new Date(startOfUtcDay(now) - payment.dueDaysAgo * MS_PER_DAY);
  const [payer, payee] = payment.incoming ? [payment.counterparty, wallet] : [wallet, payment.counterparty];

  let paymentDate: Date | null = null;
  if (payment.status === 'on_time') {
    paymentDate = new Date(due.getTime() - MS_PER_DAY);
  } else if (payment.status === 'late') {
    paymentDate = new Date(due.getTime() + (payment.daysLate ?? 1) * MS_PER_DAY + HOUR);
  }

  return {
    payer_wallet: payer,
    payee_wallet: payee,
    amount: payment.amount,
    due_date: due,
    payment_date: paymentDate,
    status: payment.status,
    reporter_wallet: payee,
  };
}

/**
 * Write a fixed demo history for `wallet`: six on-time payments, two late,
 * one default, and one incoming payment. Re-seeding the same day skips the
 * payments already recorded.
 */
export async function seedDemoHistory(ledger: CreditLedger, wallet: string, now: Date = new Date()): Promise<SeedResult> {
  const result: SeedResult = { recorded: 0, skipped: 0 };

  for (const payment of DEMO_PAYMENTS) {
    try {
      await ledger.recordPayment(toReport(wallet, payment, now));
      result.recorded++;
    } catch (err) {
      if (!(err instanceof DuplicateEventError)) throw err;
      result.skipped++;
    }
  }
  return result;
}
