import type { Response } from 'express';

export interface ProblemDetails {
  type?: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  [key: string]: unknown;
}

export type ProblemType =
  | 'validation_error'
  | 'invalid_wallet'
  | 'invalid_parameter'
  | 'unauthorized'
  | 'payment_required'
  | 'not_found'
  | 'duplicate_event'
  | 'store_unavailable'
  | 'internal_error';

const PROBLEM_BASE = '/problems';

export class ProblemDetailsHandler {
  private readonly problemMap: Map<ProblemType, ProblemDetails> = new Map([
    ['validation_error', { type: `${PROBLEM_BASE}/validation-error`, title: 'Validation Error', status: 400 }],
    ['invalid_wallet', { type: `${PROBLEM_BASE}/invalid-wallet`, title: 'Invalid Wallet', status: 400 }],
    ['invalid_parameter', { type: `${PROBLEM_BASE}/invalid-parameter`, title: 'Invalid Parameter', status: 400 }],
    ['unauthorized', { type: `${PROBLEM_BASE}/unauthorized`, title: 'Unauthorized', status: 401 }],
    ['payment_required', { type: `${PROBLEM_BASE}/payment-required`, title: 'Payment Required', status: 402 }],
    ['not_found', { type: `${PROBLEM_BASE}/not-found`, title: 'Not Found', status: 404 }],
    ['duplicate_event', { type: `${PROBLEM_BASE}/duplicate-event`, title: 'Conflict', status: 409 }],
    ['store_unavailable', { type: `${PROBLEM_BASE}/store-unavailable`, title: 'Service Unavailable', status: 503 }],
    ['internal_error', { type: `${PROBLEM_BASE}/internal-error`, title: 'Internal Server Error', status: 500 }],
  ]);

  send(res: Response, problemType: ProblemType, extensions?: Record<string, unknown>): void {
    const problem = this.problemMap.get(problemType) || {
      type: 'about:blank',
      title: 'Unknown Error',
      status: 500,
    };

    const response: ProblemDetails = {
      ...problem,
      ...extensions,
    };

    // trace_id from X-Request-Id if available
    const requestId = res.get('X-Request-Id');
    if (requestId) {
      response.trace_id = requestId;
    }

    if (!response.instance) {
      response.instance = res.req?.originalUrl || res.req?.url || undefined;
    }

    res.set('Content-Type', 'application/problem+json');
    res.status(response.status).json(response);
  }
}

export const problemDetails = new ProblemDetailsHandler();
