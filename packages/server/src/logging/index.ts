/* istanbul ignore file */
import { AsyncLocalStorage } from "node:async_hooks";
import pino from "pino";
import type { Logger } from "pino";
import { randomUUID } from "node:crypto";
import type { Request, Response, NextFunction } from "express";

export type { Logger } from "pino";

export const correlationStore = new AsyncLocalStorage<{ requestId: string }>();

export function createLogger(level: string = process.env["LOG_LEVEL"] || (process.env["NODE_ENV"] === "test" ? "silent" : "info")): Logger {
  return pino({
    name: "agent-credit",
    level,
    redact: {
      paths: [
        // x402 payment headers
        'req.headers["x-402-payment-proof"]',
        'req.headers["x-402-signature"]',
        'headers["x-402-payment-proof"]',
        'headers["x-402-signature"]',
        "req.headers.authorization",
        "headers.authorization",

        "paymentProof",
        "signature",
        "*.password",
        "*.secret",
        "*.apiKey",
      ],
      censor: "[REDACTED]",
    },
    mixin() {
      const store = correlationStore.getStore();
      return store ? { requestId: store.requestId } : {};
    },
  });
}

export const logger = createLogger();

export function correlationMiddleware(req: Request, res: Response, next: NextFunction) {
  const ridHeader = req.headers["x-request-id"];
  const requestId = Array.isArray(ridHeader) ? ridHeader[0] : ridHeader || randomUUID();
  res.setHeader("x-request-id", requestId);
  correlationStore.run({ requestId }, () => next());
}
