import { describe, it, expect } from '@jest/globals';
import { DEFAULT_SCORING_CONFIG } from '@agent-credit/ledger';
import { loadConfig } from '../../src/config';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const config = loadConfig({});

    expect(config.env).toBe('development');
    expect(config.http).toEqual({ port: 8000, host: '0.0.0.0' });
    expect(config.log.level).toBe('info');
    expect(config.store).toEqual({ backend: 'memory', redisUrl: 'redis://localhost:6379', keyPrefix: 'credit:' });
    expect(config.scoring).toEqual(DEFAULT_SCORING_CONFIG);
    expect(config.x402).toMatchObject({ enabled: true, creditScorePrice: '0.002', paymentHistoryPrice: '0.001' });
    expect(config.gates).toEqual({ metricsEnabled: false, corsOrigins: ['*'] });
  });

  it('silences logs under test', () => {
    expect(loadConfig({ NODE_ENV: 'test' }).log.level).toBe('silent');
    expect(loadConfig({ NODE_ENV: 'test', LOG_LEVEL: 'debug' }).log.level).toBe('debug');
  });

  it('reads overrides', () => {
    const config = loadConfig({
      PORT: '9100',
      STORE_BACKEND: 'redis',
      REDIS_KEY_PREFIX: 'ledger:',
      DEFAULT_CREDIT_SCORE: '60',
      DEFAULTED_PENALTY: '20',
      X402_ENABLED: 'false',
      CREDIT_SCORE_PRICE: '0.0050',
      METRICS_ENABLED: 'true',
      CORS_ORIGINS: 'https://a.example, https://b.example',
    });

    expect(config.http.port).toBe(9100);
    expect(config.store).toMatchObject({ backend: 'redis', keyPrefix: 'ledger:' });
    expect(config.scoring).toMatchObject({ defaultScore: 60, defaultedPenalty: 20 });
    expect(config.x402).toMatchObject({ enabled: false, creditScorePrice: '0.005' });
    expect(config.gates).toEqual({
      metricsEnabled: true,
      corsOrigins: ['https://a.example', 'https://b.example'],
    });
  });

  it('ignores numbers that do not parse', () => {
    expect(loadConfig({ PORT: 'eighty' }).http.port).toBe(8000);
  });

  const invalid: Array<[Record<string, string>, string]> = [
    [{ STORE_BACKEND: 'mongo' }, 'config_invalid_store_backend'],
    [{ NODE_ENV: 'staging' }, 'config_invalid_node_env'],
    [{ PORT: '70000' }, 'config_invalid_port'],
    [{ CREDIT_SCORE_PRICE: 'free' }, 'config_invalid_credit_score_price'],
    [{ MIN_CREDIT_SCORE: '90', MAX_CREDIT_SCORE: '10' }, 'config_invalid_score_bounds'],
    [{ DEFAULT_CREDIT_SCORE: '150' }, 'config_invalid_default_score'],
  ];

  it.each(invalid)('rejects %j', (env, message) => {
    expect(() => loadConfig(env)).toThrow(message);
  });
});
