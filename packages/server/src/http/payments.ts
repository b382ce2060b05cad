/**
 * Credit ledger handlers: score lookup, history lookup and payment reports.
 *
 * The caller wallet and, for paid reads, the x402 gate are checked by
 * middleware before these run.
 */

import type { Request, Response, NextFunction } from 'express';
import { isWalletAddress } from '@agent-credit/ledger';
import type { CreditLedger } from '@agent-credit/ledger';
import type { Logger } from '../logging';
import { metrics } from '../metrics';
import { firstIssue, historyQuerySchema, reportPaymentSchema, validateData } from '../validation/schemas';
import { problemDetails } from './problems';
import { callerWallet } from './wallet';

export interface CreditHandlerDeps {
  ledger: CreditLedger;
  logger: Logger;
}

function invalidAgentId(res: Response): void {
  problemDetails.send(res, 'invalid_wallet', {
    detail: 'Invalid wallet address format for agent_id',
    field: 'agent_id',
  });
}

export function createCreditHandlers({ ledger, logger }: CreditHandlerDeps) {
  async function getCreditScore(req: Request, res: Response, next: NextFunction): Promise<void> {
    const { agentId } = req.params;
    if (!isWalletAddress(agentId)) {
      return invalidAgentId(res);
    }

    try {
      logger.info({ agentId, requester: callerWallet(res) }, 'Credit score requested');
      const score = await ledger.getScore(agentId);

      res.json({
        agent_id: score.agentId,
        credit_score: score.score,
        last_updated: score.lastUpdated,
        payments_count: score.paymentsCount,
        is_new_agent: score.isNewAgent,
      });
    } catch (err) {
      next(err);
    }
  }

  async function getPaymentHistory(req: Request, res: Response, next: NextFunction): Promise<void> {
    const { agentId } = req.params;
    if (!isWalletAddress(agentId)) {
      return invalidAgentId(res);
    }

    const query = validateData(historyQuerySchema, req.query);
    if (!query.success) {
      const issue = firstIssue(query.errors);
      return problemDetails.send(res, 'invalid_parameter', {
        detail: issue.message,
        field: issue.field,
        rule: issue.code,
      });
    }

    try {
      const { page, page_size: pageSize, role, status } = query.data;
      logger.info({ agentId, requester: callerWallet(res), page, pageSize, role, status }, 'Payment history requested');

      const history = await ledger.getHistory(agentId, { page, pageSize, role, status });
      res.json({
        agent_id: history.agentId,
        total_count: history.totalCount,
        page: history.page,
        page_size: history.pageSize,
        total_pages: history.totalPages,
        payments: history.events,
      });
    } catch (err) {
      next(err);
    }
  }

  async function reportPayment(req: Request, res: Response, next: NextFunction): Promise<void> {
    const body = validateData(reportPaymentSchema, req.body);
    if (!body.success) {
      const issue = firstIssue(body.errors);
      return problemDetails.send(res, 'validation_error', {
        detail: `${issue.field}: ${issue.message}`,
        field: issue.field,
        rule: issue.code,
      });
    }

    try {
      const reporter = callerWallet(res);
      logger.info(
        { reporter, payer: body.data.payer_wallet, payee: body.data.payee_wallet, status: body.data.status },
        'Payment report received',
      );

      const { event, scores } = await ledger.recordPayment({ ...body.data, reporter_wallet: reporter });
      metrics.paymentsReported.inc({ status: event.status });
      metrics.scoreRecomputations.inc();

      res.status(201).json({
        event_id: event.event_id,
        message: 'Payment event recorded successfully',
        payer_wallet: event.payer_wallet,
        payee_wallet: event.payee_wallet,
        amount: event.amount,
        status: event.status,
        days_overdue: event.days_overdue,
        reported_at: event.reported_at,
        credit_score_updated: true,
        new_credit_scores: scores,
      });
    } catch (err) {
      next(err);
    }
  }

  return { getCreditScore, getPaymentHistory, reportPayment };
}
