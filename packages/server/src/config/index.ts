import { canonicalAmount, resolveScoringConfig } from '@agent-credit/ledger';
import type { ScoringConfig } from '@agent-credit/ledger';
import { SERVICE_VERSION } from '../version';

export type NodeEnv = 'development' | 'production' | 'test';
export type StoreBackend = 'memory' | 'redis';

export interface AppConfig {
  env: NodeEnv;
  version: string;
  http: {
    port: number;
    host: string;
  };
  log: {
    level: string;
  };
  store: {
    backend: StoreBackend;
    redisUrl: string;
    keyPrefix: string;
  };
  scoring: ScoringConfig;
  x402: {
    enabled: boolean;
    walletAddress: string;
    currency: string;
    /** Canonical decimal strings */
    creditScorePrice: string;
    paymentHistoryPrice: string;
  };
  gates: {
    metricsEnabled: boolean;
    corsOrigins: string[];
  };
}

type Env = Record<string, string | undefined>;

function bool(v: string | undefined, d = false): boolean {
  return v === 'true' ? true : v === 'false' ? false : d;
}

function num(v: string | undefined, d: number): number {
  const n = v ? Number(v) : NaN;
  return Number.isFinite(n) ? n : d;
}

function arr(v: string | undefined, d: string[] = []): string[] {
  const list = (v || '').split(',').map((s) => s.trim()).filter(Boolean);
  return list.length ? list : d;
}

function price(v: string | undefined, d: string, name: string): string {
  const amount = canonicalAmount(v || d);
  if (amount === null) throw new Error(`config_invalid_${name}`);
  return amount;
}

function nodeEnv(v: string | undefined): NodeEnv {
  if (!v) return 'development';
  if (v === 'development' || v === 'production' || v === 'test') return v;
  throw new Error('config_invalid_node_env');
}

function storeBackend(v: string | undefined): StoreBackend {
  if (!v) return 'memory';
  if (v === 'memory' || v === 'redis') return v;
  throw new Error('config_invalid_store_backend');
}

/**
 * Read configuration from the environment. Throws `config_*` errors on
 * values that parse but make no sense.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const port = num(env.PORT, 8000);
  if (!Number.isInteger(port) || port < 0 || port > 65535) throw new Error('config_invalid_port');

  const scoring = resolveScoringConfig({
    defaultScore: num(env.DEFAULT_CREDIT_SCORE, 70),
    minScore: num(env.MIN_CREDIT_SCORE, 0),
    maxScore: num(env.MAX_CREDIT_SCORE, 100),
    onTimeBonus: num(env.ON_TIME_PAYMENT_BONUS, 0.5),
    maxOnTimeBonus: num(env.MAX_ON_TIME_BONUS, 30),
    latePenalty1To7Days: num(env.LATE_PENALTY_1_7_DAYS, 2),
    latePenalty8To30Days: num(env.LATE_PENALTY_8_30_DAYS, 5),
    latePenaltyOver30Days: num(env.LATE_PENALTY_OVER_30_DAYS, 10),
    defaultedPenalty: num(env.DEFAULTED_PENALTY, 15),
  });

  const resolvedEnv = nodeEnv(env.NODE_ENV);

  return {
    env: resolvedEnv,
    version: SERVICE_VERSION,

    http: {
      port,
      host: env.HOST || '0.0.0.0',
    },

    log: {
      level: env.LOG_LEVEL || (resolvedEnv === 'test' ? 'silent' : 'info'),
    },

    store: {
      backend: storeBackend(env.STORE_BACKEND),
      redisUrl: env.REDIS_URL || 'redis://localhost:6379',
      keyPrefix: env.REDIS_KEY_PREFIX || 'credit:',
    },

    scoring,

    x402: {
      enabled: bool(env.X402_ENABLED, true),
      walletAddress: env.X402_WALLET_ADDRESS || '0x0000000000000000000000000000000000000000',
      currency: 'USD',
      creditScorePrice: price(env.CREDIT_SCORE_PRICE, '0.002', 'credit_score_price'),
      paymentHistoryPrice: price(env.PAYMENT_HISTORY_PRICE, '0.001', 'payment_history_price'),
    },

    gates: {
      metricsEnabled: bool(env.METRICS_ENABLED, false),
      corsOrigins: arr(env.CORS_ORIGINS, ['*']),
    },
  };
}
