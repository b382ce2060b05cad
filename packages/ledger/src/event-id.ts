import { createHash } from 'node:crypto';
import type { PaymentEvent } from './types';

export const EVENT_ID_PREFIX = 'evt_';
const EVENT_ID_HEX_LENGTH = 16;

export function normalizeWallet(wallet: string): string {
  return wallet.trim().toLowerCase();
}

export function withNormalizedWallets(event: PaymentEvent): PaymentEvent {
  return {
    ...event,
    payer_wallet: normalizeWallet(event.payer_wallet),
    payee_wallet: normalizeWallet(event.payee_wallet),
    reporter_wallet: normalizeWallet(event.reporter_wallet),
  };
}

/**
 * Content address of a payment.
 *
 * SHA-256 over lower(payer) + lower(payee) + canonical amount + ISO due date,
 * truncated and prefixed. Reporting the same payment twice yields the same id.
 *
 * @param amount - canonical decimal string (see canonicalAmount)
 *
 * @example
 * ```typescript
 * computeEventId('0xAAA', '0xbbb', '100', new Date('2025-11-10T00:00:00Z'));
 * // 'evt_' followed by 16 hex chars, identical for '0xaaa'
 * ```
 */
export function computeEventId(payer: string, payee: string, amount: string, dueDate: Date): string {
  const material = `${normalizeWallet(payer)}${normalizeWallet(payee)}${amount}${dueDate.toISOString()}`;
  const digest = createHash('sha256').update(material, 'utf-8').digest('hex');
  return `${EVENT_ID_PREFIX}${digest.slice(0, EVENT_ID_HEX_LENGTH)}`;
}
