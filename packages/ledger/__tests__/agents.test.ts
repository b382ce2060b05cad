import { describe, it, expect, beforeEach } from '@jest/globals';
import { AgentRecordManager, isNewAgent } from '../src/agents';
import { DEFAULT_SCORING_CONFIG } from '../src/scoring';
import { InMemoryLedgerStore } from '../src/store/memory';
import { NOW, defaultedEvent, lateEvent, onTimeEvent } from './fixtures';

describe('AgentRecordManager', () => {
  let store: InMemoryLedgerStore;
  let agents: AgentRecordManager;

  beforeEach(() => {
    store = new InMemoryLedgerStore({ clock: () => NOW });
    agents = new AgentRecordManager(store, DEFAULT_SCORING_CONFIG, { clock: () => NOW });
  });

  it('treats an agent as new until it takes part in a payment', async () => {
    const { agent, isNewAgent: fresh } = await agents.getOrCreate('0xpayer');
    expect(fresh).toBe(true);
    expect(agent.credit_score).toBe(70);

    await store.upsertAgentCounters('0xother', '0xpayer');
    await expect(agents.getOrCreate('0xpayer')).resolves.toMatchObject({ isNewAgent: false });
  });

  it('rebuilds the score from payer history only', async () => {
    await store.insert(onTimeEvent(1));
    await store.insert(lateEvent(3));
    await store.insert(defaultedEvent(1, { payer_wallet: '0xpayee', payee_wallet: '0xpayer' }));

    // 70 + 0.5 - 2
    await expect(agents.recomputeScore('0xPAYER')).resolves.toBe(68);
    await expect(store.getAgent('0xpayer')).resolves.toMatchObject({ credit_score: 68, total_payments_made: 2 });
  });

  it('reads a snapshot without rescoring', async () => {
    await store.setAgentScore('0xpayer', 42, 7, NOW);
    await store.insert(onTimeEvent(1));

    await expect(agents.getScoreSnapshot('0xpayer')).resolves.toEqual({
      score: 42,
      lastUpdated: NOW.toISOString(),
      paymentsCount: 7,
      isNewAgent: false,
    });
  });
});

describe('isNewAgent', () => {
  it('looks at both counters', () => {
    const base = {
      wallet_address: '0xa',
      credit_score: 70,
      created_at: NOW.toISOString(),
      last_updated: NOW.toISOString(),
    };
    expect(isNewAgent({ ...base, total_payments_made: 0, total_payments_received: 0 })).toBe(true);
    expect(isNewAgent({ ...base, total_payments_made: 0, total_payments_received: 1 })).toBe(false);
  });
});
