/**
 * x402 payment gate (mock verification)
 *
 * Paid endpoints expect three headers: X-402-Payment-Proof, X-402-Amount
 * and X-402-Signature. Verification does not settle anything; a proof is
 * accepted when the declared amount covers the price and the proof carries
 * one of the test prefixes.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { canonicalAmount, compareAmounts } from '@agent-credit/ledger';
import type { AppConfig } from '../config';
import { problemDetails } from '../http/problems';
import type { Logger } from '../logging';
import { metrics } from '../metrics';

export const PROOF_HEADER = 'X-402-Payment-Proof';
export const AMOUNT_HEADER = 'X-402-Amount';
export const SIGNATURE_HEADER = 'X-402-Signature';

const ACCEPTED_PROOF_PREFIXES = ['test_', 'proof_', 'mock_'] as const;

export interface X402Headers {
  proof?: string;
  amount?: string;
  signature?: string;
}

export type X402Verdict =
  | { admitted: true; outcome: 'verified' | 'disabled' }
  | { admitted: false; outcome: 'missing_headers' | 'invalid_amount' | 'insufficient_amount' | 'invalid_proof' };

export class X402Gate {
  constructor(
    private readonly settings: AppConfig['x402'],
    private readonly logger: Logger,
  ) {}

  /**
   * @param price - canonical decimal the caller must cover
   */
  verify(headers: X402Headers, price: string): X402Verdict {
    if (!this.settings.enabled) {
      this.logger.warn('x402 payment verification disabled');
      return { admitted: true, outcome: 'disabled' };
    }

    const { proof, amount, signature } = headers;
    if (!proof || !amount || !signature) {
      this.logger.info(
        { hasProof: Boolean(proof), hasAmount: Boolean(amount), hasSignature: Boolean(signature) },
        'x402 payment headers missing',
      );
      return { admitted: false, outcome: 'missing_headers' };
    }

    const provided = canonicalAmount(amount);
    if (provided === null) {
      this.logger.warn({ amount }, 'x402 payment amount invalid');
      return { admitted: false, outcome: 'invalid_amount' };
    }
    if (compareAmounts(provided, price) < 0) {
      this.logger.warn({ required: price, provided }, 'x402 payment insufficient');
      return { admitted: false, outcome: 'insufficient_amount' };
    }

    const valid = ACCEPTED_PROOF_PREFIXES.some((prefix) => proof.startsWith(prefix));
    this.logger.info({ proofPrefix: proof.slice(0, 20), valid }, 'x402 mock payment checked');
    return valid ? { admitted: true, outcome: 'verified' } : { admitted: false, outcome: 'invalid_proof' };
  }

  /**
   * Express guard for a paid route. Denials answer 402 with the payment
   * terms in both the body and the X-402-* response headers.
   */
  requirePayment(price: string): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      const verdict = this.verify(
        {
          proof: req.get(PROOF_HEADER),
          amount: req.get(AMOUNT_HEADER),
          signature: req.get(SIGNATURE_HEADER),
        },
        price,
      );
      metrics.x402Gate.inc({ outcome: verdict.outcome });

      if (verdict.admitted) {
        return next();
      }

      const { currency, walletAddress } = this.settings;
      this.logger.info({ endpoint: req.path, amount: price, reason: verdict.outcome }, 'Payment required');

      res.set({
        'X-402-Amount': price,
        'X-402-Currency': currency,
        'X-402-Address': walletAddress,
      });
      problemDetails.send(res, 'payment_required', {
        detail: `Payment of $${price} ${currency} required to access this endpoint`,
        reason: verdict.outcome,
        payment_details: {
          amount: price,
          currency,
          payment_address: walletAddress,
          endpoint: req.path,
        },
        instructions: 'Include valid x402 payment proof in request headers',
      });
    };
  }
}
