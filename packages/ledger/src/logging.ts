import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

export const logger: Logger = pino({
  name: 'credit-ledger',
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info'),
});
