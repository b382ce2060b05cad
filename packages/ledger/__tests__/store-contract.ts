import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { DuplicateEventError, ValidationError } from '../src/errors';
import { MS_PER_DAY } from '../src/event';
import type { LedgerStore } from '../src/store/types';
import type { Clock, PaymentEvent, ReportPaymentInput } from '../src/types';
import { NOW, buildEvent } from './fixtures';

export interface StoreHarness {
  store: LedgerStore;
  cleanup?: () => Promise<void>;
}

// Store reads happen ten days after the events were reported
export const READ_TIME = new Date(NOW.getTime() + 10 * MS_PER_DAY);

/**
 * Each event is reported one second after the previous one.
 */
function sequence(): (overrides: Partial<ReportPaymentInput>) => PaymentEvent {
  let seq = 0;
  return (overrides) => {
    seq += 1;
    return buildEvent(overrides, new Date(NOW.getTime() + seq * 1000));
  };
}

export function describeLedgerStore(name: string, createHarness: (clock: Clock) => Promise<StoreHarness>): void {
  describe(`${name} (LedgerStore contract)`, () => {
    let harness: StoreHarness;
    let store: LedgerStore;
    let next: ReturnType<typeof sequence>;

    beforeEach(async () => {
      harness = await createHarness(() => READ_TIME);
      store = harness.store;
      next = sequence();
    });

    afterEach(async () => {
      await harness.cleanup?.();
    });

    describe('insert', () => {
      it('stores an event and returns it', async () => {
        const event = next({});
        await expect(store.insert(event)).resolves.toEqual(event);
        await expect(store.findByWallet('0xpayer', 'payer')).resolves.toEqual([event]);
      });

      it('normalizes wallets before storing', async () => {
        const event = next({});
        const mixedCase = { ...event, payer_wallet: ' 0xPAYER ', payee_wallet: '0xPayee', reporter_wallet: '0XPAYEE' };

        await expect(store.insert(mixedCase)).resolves.toEqual(event);
        await expect(store.findByWallet('0xpayer', 'payer')).resolves.toEqual([event]);
        await expect(store.findByWallet('0xpayee', 'payee')).resolves.toEqual([event]);
      });

      it('rejects a second event with the same id', async () => {
        const event = next({});
        await store.insert(event);

        await expect(store.insert(next({ amount: '100.00' }))).rejects.toBeInstanceOf(DuplicateEventError);
        await expect(store.findByWallet('0xpayer', 'all')).resolves.toHaveLength(1);
      });
    });

    describe('findByWallet', () => {
      let first: PaymentEvent;
      let second: PaymentEvent;
      let third: PaymentEvent;

      beforeEach(async () => {
        first = next({ payer_wallet: '0xa', payee_wallet: '0xb', reporter_wallet: '0xb' });
        second = next({ payer_wallet: '0xb', payee_wallet: '0xa', reporter_wallet: '0xa' });
        third = next({
          payer_wallet: '0xa',
          payee_wallet: '0xc',
          reporter_wallet: '0xc',
          status: 'late',
          payment_date: '2025-11-12T00:00:00Z',
        });
        for (const event of [first, second, third]) {
          await store.insert(event);
        }
      });

      it('filters by role, newest first', async () => {
        await expect(store.findByWallet('0xa', 'payer')).resolves.toEqual([third, first]);
        await expect(store.findByWallet('0xa', 'payee')).resolves.toEqual([second]);
        await expect(store.findByWallet('0xa', 'all')).resolves.toEqual([third, second, first]);
      });

      it('filters by status', async () => {
        await expect(store.findByWallet('0xa', 'all', 'late')).resolves.toEqual([third]);
        await expect(store.findByWallet('0xa', 'payee', 'late')).resolves.toEqual([]);
      });

      it('normalizes the wallet', async () => {
        await expect(store.findByWallet(' 0XA ', 'payee')).resolves.toEqual([second]);
      });

      it('orders events reported at the same instant by id, descending', async () => {
        const reportedAt = new Date(NOW.getTime() + 60_000);
        const tied = ['11', '12', '13', '14'].map((amount) => buildEvent({ amount }, reportedAt));
        for (const event of tied) {
          await store.insert(event);
        }
        const byIdDescending = [...tied].sort((a, b) => (a.event_id < b.event_id ? 1 : -1));

        await expect(store.findByWallet('0xpayer', 'payer')).resolves.toEqual(byIdDescending);
        await expect(store.page('0xpayer', 'payer', undefined, 1, 2)).resolves.toEqual({
          totalCount: 4,
          events: byIdDescending.slice(0, 2),
        });
        await expect(store.page('0xpayer', 'payer', undefined, 2, 2)).resolves.toEqual({
          totalCount: 4,
          events: byIdDescending.slice(2),
        });
      });

      it('returns nothing for unknown wallets', async () => {
        await expect(store.findByWallet('0xnobody', 'all')).resolves.toEqual([]);
      });
    });

    it('refreshes days overdue on defaulted events', async () => {
      const event = next({ status: 'defaulted', payment_date: null });
      expect(event.days_overdue).toBe(21);
      await store.insert(event);

      const [stored] = await store.findByWallet('0xpayer', 'payer');
      expect(stored.days_overdue).toBe(31);
    });

    describe('page', () => {
      beforeEach(async () => {
        for (let i = 1; i <= 97; i++) {
          await store.insert(next({ amount: String(i) }));
        }
      });

      it('splits results into pages', async () => {
        const first = await store.page('0xpayer', 'payer', undefined, 1, 50);
        expect(first.totalCount).toBe(97);
        expect(first.events).toHaveLength(50);
        expect(first.events[0].amount).toBe('97');
        expect(first.events[49].amount).toBe('48');

        const second = await store.page('0xpayer', 'payer', undefined, 2, 50);
        expect(second.totalCount).toBe(97);
        expect(second.events).toHaveLength(47);
        expect(second.events[46].amount).toBe('1');
      });

      it('returns an empty page past the end', async () => {
        await expect(store.page('0xpayer', 'payer', undefined, 3, 50)).resolves.toEqual({
          totalCount: 97,
          events: [],
        });
      });

      it('applies the status filter to the count', async () => {
        await expect(store.page('0xpayee', 'payee', 'late', 1, 10)).resolves.toEqual({ totalCount: 0, events: [] });
      });

      it('rejects bad page parameters', async () => {
        await expect(store.page('0xpayer', 'payer', undefined, 0, 50)).rejects.toBeInstanceOf(ValidationError);
        await expect(store.page('0xpayer', 'payer', undefined, 1, 201)).rejects.toBeInstanceOf(ValidationError);
      });
    });

    describe('agents', () => {
      it('returns null for unknown agents', async () => {
        await expect(store.getAgent('0xnobody')).resolves.toBeNull();
      });

      it('increments counters on both sides', async () => {
        await store.upsertAgentCounters('0xA', '0xB');
        await store.upsertAgentCounters('0xa', '0xb');

        await expect(store.getAgent('0xa')).resolves.toMatchObject({
          wallet_address: '0xa',
          credit_score: 70,
          total_payments_made: 2,
          total_payments_received: 0,
        });
        await expect(store.getAgent('0xb')).resolves.toMatchObject({
          total_payments_made: 0,
          total_payments_received: 2,
        });
      });

      it('creates an agent only once', async () => {
        const created = await store.createAgentIfAbsent('0xc', 70);
        expect(created).toEqual({
          wallet_address: '0xc',
          credit_score: 70,
          total_payments_made: 0,
          total_payments_received: 0,
          created_at: READ_TIME.toISOString(),
          last_updated: READ_TIME.toISOString(),
        });

        await expect(store.createAgentIfAbsent('0xC', 40)).resolves.toEqual(created);
      });

      it('replaces the score and payer count', async () => {
        await store.upsertAgentCounters('0xa', '0xb');
        await store.upsertAgentCounters('0xb', '0xa');
        const scoredAt = new Date('2025-12-20T00:00:00.000Z');

        const agent = await store.setAgentScore('0xa', 64, 3, scoredAt);
        expect(agent).toMatchObject({
          credit_score: 64,
          total_payments_made: 3,
          total_payments_received: 1,
          last_updated: '2025-12-20T00:00:00.000Z',
        });
        await expect(store.getAgent('0xa')).resolves.toEqual(agent);
      });

      it('creates the agent when scoring an unknown wallet', async () => {
        const agent = await store.setAgentScore('0xnew', 55, 1, READ_TIME);
        expect(agent).toMatchObject({ wallet_address: '0xnew', credit_score: 55, total_payments_made: 1 });
      });
    });

    it('answers ping', async () => {
      await expect(store.ping()).resolves.toBe(true);
    });
  });
}
