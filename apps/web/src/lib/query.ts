import type { Request } from 'express';
import type { ListFilter } from '@duetrack/core';

/** First string value of a query parameter, or '' */
export function queryString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return '';
}

/**
 * Read the list selectors from the query string.
 * `show_done=1` is the only value that turns on done tasks.
 */
export function parseListQuery(query: Request['query']): ListFilter {
  return {
    subject: queryString(query['subject']),
    range: queryString(query['range']),
    showDone: queryString(query['show_done']) === '1',
  };
}

const ID_RE = /^\d+$/;

/** Route ids are positive integers; anything else is treated as missing */
export function parseTaskId(raw: string | undefined): number | null {
  if (!raw || !ID_RE.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) ? id : null;
}
