import type { Request, Response } from 'express';
import type { LedgerStore } from '@agent-credit/ledger';
import { logger } from '../logging';

export function createHealthHandlers(store: LedgerStore, version: string) {
  async function handleLiveness(_req: Request, res: Response): Promise<void> {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version,
    });
  }

  async function handleReadiness(_req: Request, res: Response): Promise<void> {
    let storeUp = false;
    try {
      storeUp = await store.ping();
    } catch (err) {
      logger.error({ err }, 'Store ping threw');
    }

    const checks: Record<string, boolean> = {
      server: true,
      store: storeUp,
    };

    const allHealthy = Object.values(checks).every((v) => v);
    res.status(allHealthy ? 200 : 503).json({
      status: allHealthy ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString(),
    });

    if (!allHealthy) {
      logger.warn({ checks }, 'Readiness check failed');
    }
  }

  return { handleLiveness, handleReadiness };
}
