import type { EntityId } from '../ids/entity-id';

/** Pagination boundary: an EntityId, or one of the sentinels in cursor.ts. */
export type Cursor = string;

export interface Page {
  readonly reverse: boolean;
  readonly limit: number;
  /** Exclusive start of the page. */
  readonly offset: Cursor;
}

/** Lightweight (id, display text) pair for list and drop-down presentations. */
export interface TextValue {
  readonly id: EntityId;
  readonly value: string;
}

/** Key within one secondary index, e.g. { index: 'tag', key: 'fiction' }. */
export interface IndexRef {
  readonly index: string;
  readonly key: string;
}

export interface SearchQuery {
  /** Lower-cased, de-duplicated, in query order. */
  readonly terms: ReadonlyArray<string>;
  readonly matchAny: boolean;
}

/** Raw query string as Express hands it over. */
export type RawQuery = Readonly<
  Record<string, string | string[] | undefined | unknown>
>;

/** Per-request execution context shared by every store call of a listing. */
export interface ListingContext {
  readonly signal?: AbortSignal;
}
