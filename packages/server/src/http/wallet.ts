import type { Request, Response, NextFunction } from 'express';
import { isWalletAddress, normalizeWallet } from '@agent-credit/ledger';
import { problemDetails } from './problems';

export const WALLET_HEADER = 'X-Agent-Wallet';

/**
 * Identify the caller by X-Agent-Wallet. The normalized wallet is left on
 * res.locals for handlers; read it back with callerWallet().
 */
export function requireWallet(req: Request, res: Response, next: NextFunction): void {
  const header = req.get(WALLET_HEADER);

  if (!header) {
    return problemDetails.send(res, 'unauthorized', {
      detail: `Missing ${WALLET_HEADER} header`,
    });
  }
  if (!isWalletAddress(header)) {
    return problemDetails.send(res, 'invalid_wallet', {
      detail: 'Invalid wallet address format',
      field: WALLET_HEADER,
    });
  }

  res.locals.wallet = normalizeWallet(header);
  next();
}

export function callerWallet(res: Response): string {
  const wallet: unknown = res.locals.wallet;
  if (typeof wallet !== 'string') {
    throw new Error('requireWallet must run before callerWallet');
  }
  return wallet;
}
