import express from 'express';
import type { Express, Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import type { CreditLedger } from '@agent-credit/ledger';
import type { AppConfig } from '../config';
import { correlationMiddleware, logger as defaultLogger } from '../logging';
import type { Logger } from '../logging';
import { getMetricsRegistry, metrics } from '../metrics';
import { errorHandler, notFoundHandler } from '../middleware/error';
import { createRoutes } from './routes';

export interface ServerDeps {
  ledger: CreditLedger;
  config: AppConfig;
  logger?: Logger;
}

function routeLabel(req: Request): string {
  const route: unknown = req.route;
  if (typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string') {
    return `${req.baseUrl}${route.path}`;
  }
  return 'unmatched';
}

function httpMetrics(req: Request, res: Response, next: NextFunction): void {
  res.on('finish', () => {
    metrics.httpRequestTotal.inc({ method: req.method, route: routeLabel(req), status: String(res.statusCode) });
  });
  next();
}

export function createServer({ ledger, config, logger = defaultLogger }: ServerDeps): Express {
  const app = express();

  app.disable('x-powered-by');
  app.set('trust proxy', true);

  app.use(helmet());
  app.use(cors({ origin: config.gates.corsOrigins.includes('*') ? '*' : config.gates.corsOrigins }));
  app.use(correlationMiddleware);
  app.use(httpMetrics);
  app.use(express.json({ limit: '100kb' }));

  if (config.gates.metricsEnabled) {
    app.get('/metrics', async (_req, res, next) => {
      try {
        const reg = getMetricsRegistry();
        res.setHeader('Content-Type', reg.contentType);
        res.send(await reg.metrics());
      } catch (err) {
        next(err);
      }
    });
  }

  app.use(createRoutes({ ledger, config, logger }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
