import { Router } from 'express';
import type { CreditLedger } from '@agent-credit/ledger';
import type { AppConfig } from '../config';
import { createHealthHandlers } from '../health/handlers';
import type { Logger } from '../logging';
import { X402Gate } from '../x402';
import { createCreditHandlers } from './payments';
import { requireWallet } from './wallet';

export interface RouteDeps {
  ledger: CreditLedger;
  config: AppConfig;
  logger: Logger;
}

export function createRoutes({ ledger, config, logger }: RouteDeps): Router {
  const router = Router();
  const gate = new X402Gate(config.x402, logger);
  const health = createHealthHandlers(ledger.store, config.version);
  const credit = createCreditHandlers({ ledger, logger });

  router.get('/health', health.handleLiveness);
  router.get('/health/ready', health.handleReadiness);

  // Paid reads: wallet header, then x402, then parameters
  router.get(
    '/credit-score/:agentId',
    requireWallet,
    gate.requirePayment(config.x402.creditScorePrice),
    credit.getCreditScore,
  );
  router.get(
    '/payment-history/:agentId',
    requireWallet,
    gate.requirePayment(config.x402.paymentHistoryPrice),
    credit.getPaymentHistory,
  );

  router.post('/report-payment', requireWallet, credit.reportPayment);

  return router;
}
