import { InMemoryLedgerStore, RedisLedgerStore } from '@agent-credit/ledger';
import type { LedgerStore } from '@agent-credit/ledger';
import type { Logger } from '../logging';
import { getRedis } from '../utils/redis-pool';
import type { AppConfig } from './index';

/**
 * Build the ledger store for the configured backend.
 */
export function createLedgerStore(config: AppConfig, logger: Logger): LedgerStore {
  const { backend, redisUrl, keyPrefix } = config.store;
  const defaultScore = config.scoring.defaultScore;

  let store: LedgerStore;
  switch (backend) {
    case 'redis':
      store = new RedisLedgerStore(getRedis(redisUrl), { keyPrefix, defaultScore, logger });
      break;
    case 'memory':
    default:
      store = new InMemoryLedgerStore({ defaultScore, logger });
      break;
  }

  logger.info({ backend }, 'Store backend configured');
  return store;
}
