/* istanbul ignore file */
import { Registry, Counter } from "prom-client";

const register = new Registry();

export const metrics = {
  paymentsReported: new Counter({
    name: "credit_payments_reported_total",
    help: "Payment events accepted into the ledger",
    labelNames: ["status"] as const,
    registers: [register],
  }),
  duplicateReports: new Counter({
    name: "credit_duplicate_reports_total",
    help: "Payment reports rejected as duplicates",
    registers: [register],
  }),
  scoreRecomputations: new Counter({
    name: "credit_score_recomputations_total",
    help: "Credit score recomputations triggered by payment reports",
    registers: [register],
  }),
  x402Gate: new Counter({
    name: "credit_x402_gate_total",
    help: "x402 gate decisions",
    labelNames: ["outcome"] as const, // outcome: verified|disabled|missing_headers|invalid_amount|insufficient_amount|invalid_proof
    registers: [register],
  }),
  httpRequestTotal: new Counter({
    name: "credit_http_requests_total",
    help: "Total number of HTTP requests",
    labelNames: ["method", "route", "status"] as const,
    registers: [register],
  }),
};

export function getMetricsRegistry(): Registry {
  return register;
}
