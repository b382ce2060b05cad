import type { Request, Response, NextFunction } from 'express';
import { DuplicateEventError, StoreUnavailableError, ValidationError } from '@agent-credit/ledger';
import { problemDetails } from '../http/problems';
import { logger } from '../logging';
import { metrics } from '../metrics';

function isBodyParseError(err: unknown): boolean {
  if (err instanceof SyntaxError) return true;
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * Maps ledger errors onto problem details. Anything unrecognized is logged
 * and answered with a bare internal_error.
 */
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) {
    return next(err);
  }

  if (isBodyParseError(err)) {
    return problemDetails.send(res, 'validation_error', {
      detail: 'Invalid JSON in request body',
      field: 'body',
      rule: 'json',
    });
  }

  if (err instanceof ValidationError) {
    return problemDetails.send(res, 'validation_error', {
      detail: err.message,
      field: err.field,
      rule: err.rule,
    });
  }

  if (err instanceof DuplicateEventError) {
    metrics.duplicateReports.inc();
    return problemDetails.send(res, 'duplicate_event', {
      detail: err.message,
      event_id: err.eventId,
    });
  }

  if (err instanceof StoreUnavailableError) {
    logger.error({ err, path: req.path }, 'Ledger store unavailable');
    return problemDetails.send(res, 'store_unavailable', {
      detail: 'Ledger store unavailable, retry later',
    });
  }

  logger.error({ err, method: req.method, path: req.path }, 'Request error occurred');
  return problemDetails.send(res, 'internal_error');
}

export function notFoundHandler(req: Request, res: Response) {
  problemDetails.send(res, 'not_found', { detail: `No route for ${req.method} ${req.path}` });
}
