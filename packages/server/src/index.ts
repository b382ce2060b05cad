/**
 * Agent credit HTTP service
 */

export { createServer } from './http/server';
export type { ServerDeps } from './http/server';
export { loadConfig } from './config';
export type { AppConfig, NodeEnv, StoreBackend } from './config';
export { createLedgerStore } from './config/stores';
export { X402Gate } from './x402';
export type { X402Verdict, X402Headers } from './x402';
export { problemDetails } from './http/problems';
export type { ProblemType } from './http/problems';
export { metrics, getMetricsRegistry } from './metrics';
export { logger, createLogger } from './logging';
export { GracefulShutdownManager } from './shutdown/graceful-shutdown';
export { createProgram, openLedger } from './cli';
export { seedDemoHistory } from './cli/seed';
export { SERVICE_VERSION } from './version';
