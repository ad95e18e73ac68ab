import { ValidationError } from '../errors/RequestErrors';
import { throwIfAborted } from './abort';
import { parseBool, parseLimit, queryParam, resolveOffset } from './cursor';
import { compileSearch, filterBySearch, isEmptySearch, sortByText } from './search';
import type {
  IndexRef,
  ListingContext,
  Page,
  RawQuery,
  SearchQuery,
} from './types';

export interface ListingFilter {
  /** Query parameter name, e.g. 'tag'. */
  readonly param: string;
  /** Secondary index it selects, e.g. 'tag'. */
  readonly index: string;
  /** Normalized index key, or undefined when the value is not acceptable. */
  readonly parse?: (raw: string) => string | undefined;
  /** Appended to the validation message. */
  readonly expecting?: string;
}

export interface ListingDefinition {
  readonly name: string;
  /** Highest precedence first. */
  readonly filters: ReadonlyArray<ListingFilter>;
  /** Page size when `limit` is omitted; undefined means return everything. */
  readonly defaultLimit?: number;
}

export type ListingPlan =
  | { readonly mode: 'search'; readonly index?: IndexRef; readonly search: SearchQuery }
  | { readonly mode: 'all'; readonly index?: IndexRef; readonly sorted: boolean }
  | { readonly mode: 'page'; readonly index?: IndexRef; readonly page: Page };

/** Where a plan reads from; the facade binds this to a store table. */
export interface ListingSource<R> {
  readPage(page: Page, index: IndexRef | undefined, ctx: ListingContext): Promise<R[]>;
  readAll(index: IndexRef | undefined, ctx: ListingContext): Promise<R[]>;
}

/**
 * Validates every supplied filter, then returns the highest-precedence one.
 * Undefined selects the primary index.
 */
export function selectIndex(
  filters: ReadonlyArray<ListingFilter>,
  query: RawQuery,
): IndexRef | undefined {
  let chosen: IndexRef | undefined;
  for (const filter of filters) {
    const raw = queryParam(query, filter.param);
    if (!raw) continue;
    const key = filter.parse ? filter.parse(raw) : raw;
    if (key === undefined || key === '') {
      throw new ValidationError(filter.param, raw, filter.expecting);
    }
    chosen ??= { index: filter.index, key };
  }
  return chosen;
}

export function planListing(definition: ListingDefinition, query: RawQuery): ListingPlan {
  const index = selectIndex(definition.filters, query);
  const search = compileSearch(
    queryParam(query, 'search'),
    parseBool('any', queryParam(query, 'any'), false),
  );
  const sorted = parseBool('sorted', queryParam(query, 'sorted'), false);
  const reverse = parseBool('reverse', queryParam(query, 'reverse'), false);
  const limit = parseLimit(queryParam(query, 'limit'), definition.defaultLimit);

  if (!isEmptySearch(search)) return { mode: 'search', index, search };
  if (sorted || limit === undefined) return { mode: 'all', index, sorted };
  return {
    mode: 'page',
    index,
    page: { reverse, limit, offset: resolveOffset(reverse, queryParam(query, 'offset')) },
  };
}

export async function runPlan<R>(
  plan: ListingPlan,
  source: ListingSource<R>,
  textOf: (item: R) => string,
  ctx: ListingContext = {},
): Promise<R[]> {
  throwIfAborted(ctx.signal);
  const result = await read(plan, source, textOf, ctx);
  throwIfAborted(ctx.signal);
  return result;
}

async function read<R>(
  plan: ListingPlan,
  source: ListingSource<R>,
  textOf: (item: R) => string,
  ctx: ListingContext,
): Promise<R[]> {
  if (plan.mode === 'page') return source.readPage(plan.page, plan.index, ctx);
  const all = await source.readAll(plan.index, ctx);
  if (plan.mode === 'search') {
    return sortByText(filterBySearch(all, plan.search, textOf), textOf);
  }
  return plan.sorted ? sortByText(all, textOf) : all;
}
