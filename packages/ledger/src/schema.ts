/**
 * Zod schemas for records read back from a persistent store.
 */

import { z } from 'zod';
import type { Agent, PaymentEvent } from './types';

const isoTimestamp = z.string().datetime({ offset: true });

const eventBase = {
  event_id: z.string().startsWith('evt_'),
  payer_wallet: z.string().min(3),
  payee_wallet: z.string().min(3),
  amount: z.string().regex(/^\d+(\.\d+)?$/),
  currency: z.string().min(1),
  due_date: isoTimestamp,
  reported_at: isoTimestamp,
  reporter_wallet: z.string().min(3),
};

export const PaymentEventSchema = z.discriminatedUnion('status', [
  z.object({
    ...eventBase,
    status: z.literal('on_time'),
    payment_date: isoTimestamp,
    days_overdue: z.literal(0),
  }),
  z.object({
    ...eventBase,
    status: z.literal('late'),
    payment_date: isoTimestamp,
    days_overdue: z.number().int().nonnegative(),
  }),
  z.object({
    ...eventBase,
    status: z.literal('defaulted'),
    payment_date: z.null(),
    days_overdue: z.number().int().nonnegative(),
  }),
]);

export const AgentSchema = z.object({
  wallet_address: z.string().min(3),
  credit_score: z.coerce.number().int(),
  total_payments_made: z.coerce.number().int().nonnegative(),
  total_payments_received: z.coerce.number().int().nonnegative(),
  created_at: isoTimestamp,
  last_updated: isoTimestamp,
});

export function parseStoredEvent(raw: string): PaymentEvent {
  return Object.freeze(PaymentEventSchema.parse(JSON.parse(raw)));
}

export function parseStoredAgent(fields: Record<string, string>): Agent {
  return AgentSchema.parse(fields);
}
