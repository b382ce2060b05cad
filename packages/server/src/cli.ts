#!/usr/bin/env node
/**
 * agent-credit: serve the credit API, seed demo data, inspect a wallet.
 */

import { Command, InvalidArgumentError } from 'commander';
import { CreditLedger, isWalletAddress, normalizeWallet } from '@agent-credit/ledger';
import { loadConfig } from './config';
import type { AppConfig } from './config';
import { createLedgerStore } from './config/stores';
import { createServer } from './http/server';
import { createLogger } from './logging';
import type { Logger } from './logging';
import { GracefulShutdownManager } from './shutdown/graceful-shutdown';
import { disconnectRedis } from './utils/redis-pool';
import { SERVICE_VERSION } from './version';
import { seedDemoHistory } from './cli/seed';

export interface LedgerHandle {
  ledger: CreditLedger;
  close: () => Promise<void>;
}

export interface CliDeps {
  loadConfig?: () => AppConfig;
  openLedger?: (config: AppConfig, logger: Logger) => LedgerHandle;
  write?: (text: string) => void;
  now?: () => Date;
}

export function openLedger(config: AppConfig, logger: Logger): LedgerHandle {
  const store = createLedgerStore(config, logger);
  const ledger = new CreditLedger({ store, scoring: config.scoring, logger });
  return {
    ledger,
    close: async () => {
      if (config.store.backend === 'redis') {
        await disconnectRedis();
      } else {
        await store.close();
      }
    },
  };
}

function parseWallet(value: string): string {
  if (!isWalletAddress(value)) {
    throw new InvalidArgumentError("wallet must start with '0x'");
  }
  return normalizeWallet(value);
}

export function createProgram(deps: CliDeps = {}): Command {
  const readConfig = deps.loadConfig ?? (() => loadConfig());
  const open = deps.openLedger ?? openLedger;
  const write = deps.write ?? ((text: string) => void process.stdout.write(text));
  const now = deps.now ?? (() => new Date());

  const program = new Command();

  program.name('agent-credit').description('Agent payment ledger and credit scoring service').version(SERVICE_VERSION);

  program
    .command('serve')
    .description('Start the HTTP server')
    .option('-p, --port <port>', 'port to listen on (default: PORT or 8000)')
    .action(async (options: { port?: string }) => {
      const config = readConfig();
      const logger = createLogger(config.log.level);
      const handle = open(config, logger);
      const app = createServer({ ledger: handle.ledger, config, logger });

      const port = options.port ? Number(options.port) : config.http.port;
      const server = app.listen(port, config.http.host, () => {
        logger.info({ host: config.http.host, port, backend: config.store.backend }, 'Credit server listening');
      });

      const shutdown = new GracefulShutdownManager();
      shutdown.registerServer(server);
      shutdown.registerResource({ name: 'ledger-store', priority: 10, cleanup: handle.close, required: true });
      shutdown.installSignalHandlers();
    });

  program
    .command('seed')
    .description('Record a demo payment history for a wallet')
    .argument('<wallet>', 'wallet to seed', parseWallet)
    .action(async (wallet: string) => {
      const config = readConfig();
      const handle = open(config, createLogger(config.log.level));
      try {
        const { recorded, skipped } = await seedDemoHistory(handle.ledger, wallet, now());
        const score = await handle.ledger.getScore(wallet);
        write(`Seeded ${recorded} payments for ${wallet} (${skipped} already present); credit score ${score.score}\n`);
      } finally {
        await handle.close();
      }
    });

  program
    .command('inspect')
    .description("Print a wallet's credit score and recent payments as JSON")
    .argument('<wallet>', 'wallet to inspect', parseWallet)
    .option('-n, --limit <count>', 'recent payments to include', '10')
    .action(async (wallet: string, options: { limit: string }) => {
      const config = readConfig();
      const handle = open(config, createLogger(config.log.level));
      try {
        const score = await handle.ledger.getScore(wallet);
        const history = await handle.ledger.getHistory(wallet, { pageSize: Number(options.limit) });
        const report = {
          agent_id: score.agentId,
          credit_score: score.score,
          payments_count: score.paymentsCount,
          is_new_agent: score.isNewAgent,
          last_updated: score.lastUpdated,
          total_payments: history.totalCount,
          recent_payments: history.events,
        };
        write(JSON.stringify(report, null, 2) + '\n');
      } finally {
        await handle.close();
      }
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      process.stderr.write(`agent-credit: ${error instanceof Error ? error.message : String(error)}\n`);
      process.exit(1);
    });
}
