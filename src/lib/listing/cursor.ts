import { ValidationError } from '../errors/RequestErrors';
import type { Cursor, Page, RawQuery } from './types';

/** Sorts before any EntityId (ASCII 0x2d, below the digits). */
export const MIN_CURSOR: Cursor = '-';
/** Sorts after any EntityId (ASCII 0x7c, above the letters). */
export const MAX_CURSOR: Cursor = '|';

/** First value of a query parameter, trimmed; '' when absent. */
export function queryParam(query: RawQuery, name: string): string {
  const raw = query[name];
  const first = Array.isArray(raw) ? raw[0] : raw;
  return typeof first === 'string' ? first.trim() : '';
}

/**
 * Exclusive start of the next page. Empty input starts at the near end of
 * the index for the given direction.
 */
export function resolveOffset(reverse: boolean, supplied?: string): Cursor {
  if (!supplied) return reverse ? MAX_CURSOR : MIN_CURSOR;
  return supplied;
}

/**
 * Parse a page size. Absent input yields the fallback, which may itself be
 * undefined (unbounded).
 */
export function parseLimit(
  supplied: string | undefined,
  fallback?: number,
): number | undefined {
  if (supplied === undefined || supplied === '') return fallback;
  if (!/^\d+$/.test(supplied)) {
    throw new ValidationError('limit', supplied, 'expecting a positive integer');
  }
  const n = Number.parseInt(supplied, 10);
  if (!Number.isSafeInteger(n) || n < 1) {
    throw new ValidationError('limit', supplied, 'expecting a positive integer');
  }
  return n;
}

const TRUE_VALUES = new Set(['1', 't', 'true']);
const FALSE_VALUES = new Set(['0', 'f', 'false']);

export function parseBool(
  name: string,
  supplied: string | undefined,
  fallback: boolean,
): boolean {
  if (supplied === undefined || supplied === '') return fallback;
  const v = supplied.toLowerCase();
  if (TRUE_VALUES.has(v)) return true;
  if (FALSE_VALUES.has(v)) return false;
  throw new ValidationError(name, supplied, 'expecting true or false');
}

/**
 * Pagination parameters (reverse, limit, offset) with the endpoint's default
 * limit. Used by endpoints that always page, such as version histories.
 */
export function resolvePage(query: RawQuery, defaultLimit: number): Page {
  const reverse = parseBool('reverse', queryParam(query, 'reverse'), false);
  const limit =
    parseLimit(queryParam(query, 'limit'), defaultLimit) ?? defaultLimit;
  return {
    reverse,
    limit,
    offset: resolveOffset(reverse, queryParam(query, 'offset')),
  };
}
