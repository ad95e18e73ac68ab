import { ValidationError } from '../errors/RequestErrors';
import { isEntityId } from '../ids/entity-id';
import { queryParam } from './cursor';
import type { ListingFilter } from './dispatcher';
import type { RawQuery } from './types';

/** Free-text key, used as supplied. */
export function keyFilter(param: string, index = param): ListingFilter {
  return { param, index };
}

/** Upper-cased and checked against a closed set. */
export function enumFilter(
  param: string,
  values: ReadonlyArray<string>,
  index = param,
): ListingFilter {
  return {
    param,
    index,
    parse: (raw) => {
      const v = raw.toUpperCase();
      return values.includes(v) ? v : undefined;
    },
    expecting: `expecting one of ${values.join(', ')}`,
  };
}

export function idFilter(param: string, index = param): ListingFilter {
  return {
    param,
    index,
    parse: (raw) => {
      const v = raw.toLowerCase();
      return isEntityId(v) ? v : undefined;
    },
    expecting: 'expecting an entity id',
  };
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const d = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(d.getTime()) && d.toISOString().startsWith(value);
}

export function dateFilter(param: string, index = param): ListingFilter {
  return {
    param,
    index,
    parse: (raw) => (isIsoDate(raw) ? raw : undefined),
    expecting: 'expecting YYYY-MM-DD',
  };
}

/** Optional YYYY-MM-DD query parameter outside any index, e.g. a range bound. */
export function dateParam(query: RawQuery, param: string): string | undefined {
  const raw = queryParam(query, param);
  if (!raw) return undefined;
  if (!isIsoDate(raw)) throw new ValidationError(param, raw, 'expecting YYYY-MM-DD');
  return raw;
}

const EMAIL = /^[^\s@<>]+@[^\s@<>]+\.[^\s@<>]+$/;

export function isEmailAddress(value: string): boolean {
  return EMAIL.test(value);
}

export function emailFilter(param: string, index = param): ListingFilter {
  return {
    param,
    index,
    parse: (raw) => {
      const v = raw.toLowerCase();
      return isEmailAddress(v) ? v : undefined;
    },
    expecting: 'expecting an email address',
  };
}
