/**
 * Agent Record Manager
 *
 * Holds no state of its own: it combines ledger store queries with the
 * scoring engine. Scores only ever change through recomputeScore, which
 * rebuilds them from the agent's full payer-role history.
 */

import { normalizeWallet } from './event-id';
import { logger as defaultLogger } from './logging';
import type { Logger } from './logging';
import { KeyedMutex } from './mutex';
import { calculateCreditScore } from './scoring';
import type { ScoringConfig } from './scoring';
import type { LedgerStore } from './store/types';
import type { Agent, Clock, ScoreSnapshot } from './types';

export interface AgentRecordManagerOptions {
  clock?: Clock;
  logger?: Logger;
}

/**
 * An agent is new until it appears on either side of a payment. A score can
 * equal the default after real history, so the score is not the signal.
 */
export function isNewAgent(agent: Agent): boolean {
  return agent.total_payments_made === 0 && agent.total_payments_received === 0;
}

export class AgentRecordManager {
  private readonly recomputeLock = new KeyedMutex();
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly store: LedgerStore,
    private readonly scoring: ScoringConfig,
    options: AgentRecordManagerOptions = {},
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
  }

  async getOrCreate(wallet: string): Promise<{ agent: Agent; isNewAgent: boolean }> {
    const agent = await this.store.createAgentIfAbsent(wallet, this.scoring.defaultScore);
    return { agent, isNewAgent: isNewAgent(agent) };
  }

  /**
   * Rescore from the full payer-role history and persist it, together with
   * the payer-event count so total_payments_made heals itself.
   *
   * Recomputations for one wallet are serialized so a slower, staler pass
   * can never overwrite a newer one from this process.
   */
  async recomputeScore(wallet: string): Promise<number> {
    const normalized = normalizeWallet(wallet);
    return this.recomputeLock.runExclusive(normalized, async () => {
      const events = await this.store.findByWallet(normalized, 'payer');
      const score = calculateCreditScore(events, this.scoring);
      await this.store.setAgentScore(normalized, score, events.length, this.clock());

      this.logger.info({ wallet: normalized, creditScore: score, paymentCount: events.length }, 'Credit score updated');
      return score;
    });
  }

  /**
   * Current score without recomputing.
   */
  async getScoreSnapshot(wallet: string): Promise<ScoreSnapshot> {
    const { agent, isNewAgent } = await this.getOrCreate(wallet);
    return {
      score: agent.credit_score,
      lastUpdated: agent.last_updated,
      paymentsCount: agent.total_payments_made,
      isNewAgent,
    };
  }
}
