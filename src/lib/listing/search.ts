import type { SearchQuery } from './types';

export function compileSearch(query: string, matchAny: boolean): SearchQuery {
  const terms: string[] = [];
  for (const token of query.toLowerCase().split(/\s+/)) {
    if (token && !terms.includes(token)) terms.push(token);
  }
  return { terms, matchAny };
}

export function isEmptySearch(search: SearchQuery): boolean {
  return search.terms.length === 0;
}

/** Case-insensitive substring test of every (or any) term. */
export function matchesSearch(search: SearchQuery, text: string): boolean {
  if (search.terms.length === 0) return true;
  const haystack = text.toLowerCase();
  return search.matchAny
    ? search.terms.some((t) => haystack.includes(t))
    : search.terms.every((t) => haystack.includes(t));
}

export function filterBySearch<R>(
  items: ReadonlyArray<R>,
  search: SearchQuery,
  textOf: (item: R) => string,
): R[] {
  if (isEmptySearch(search)) return [...items];
  return items.filter((item) => matchesSearch(search, textOf(item)));
}

/** Stable ordinal sort by display text (code-unit order, not locale). */
export function sortByText<R>(
  items: ReadonlyArray<R>,
  textOf: (item: R) => string,
): R[] {
  return items
    .map((item, i) => ({ item, i, text: textOf(item) }))
    .sort((a, b) =>
      a.text < b.text ? -1 : a.text > b.text ? 1 : a.i - b.i,
    )
    .map((e) => e.item);
}
