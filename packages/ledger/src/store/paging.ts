import { ValidationError } from '../errors';

export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 200;

export interface PageWindow {
  start: number;
  /** Exclusive */
  end: number;
}

export function pageWindow(page: number, pageSize: number): PageWindow {
  if (!Number.isInteger(page) || page < 1) {
    throw new ValidationError('page', 'page', 'page must be an integer >= 1');
  }
  if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
    throw new ValidationError('page_size', 'page_size', `page_size must be between 1 and ${MAX_PAGE_SIZE}`);
  }
  const start = (page - 1) * pageSize;
  return { start, end: start + pageSize };
}

export function totalPages(totalCount: number, pageSize: number): number {
  return Math.ceil(totalCount / pageSize);
}

/**
 * Sort order shared by every store: newest report first, then event id descending.
 */
export function compareNewestFirst(
  a: { reported_at: string; event_id: string },
  b: { reported_at: string; event_id: string },
): number {
  const byTime = Date.parse(b.reported_at) - Date.parse(a.reported_at);
  if (byTime !== 0) return byTime;
  if (a.event_id === b.event_id) return 0;
  return a.event_id < b.event_id ? 1 : -1;
}
