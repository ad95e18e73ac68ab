import { RequestAbortedError, ValidationError } from '../../errors/RequestErrors';
import {
  planListing,
  runPlan,
  selectIndex,
  type ListingDefinition,
  type ListingSource,
} from '../dispatcher';
import { dateFilter, emailFilter, enumFilter, idFilter, keyFilter } from '../filters';
import type { TextValue } from '../types';

const editorId = '65a1f0c2e4b0a1b2c3d4e5f6';

const titles: ListingDefinition = {
  name: 'titles',
  filters: [
    enumFilter('type', ['BOOK', 'ARTICLE']),
    keyFilter('author'),
    idFilter('editor'),
    keyFilter('tag'),
  ],
};

function fakeSource(rows: TextValue[]) {
  const readPage = jest.fn(async () => rows.slice(0, 1));
  const readAll = jest.fn(async () => rows);
  const source: ListingSource<TextValue> = { readPage, readAll };
  return { source, readPage, readAll };
}

describe('selectIndex()', () => {
  it('picks the highest-precedence supplied filter', () => {
    expect(selectIndex(titles.filters, { tag: 'x', author: 'Ann' })).toEqual({
      index: 'author',
      key: 'Ann',
    });
  });

  it('normalizes keys through the filter', () => {
    expect(selectIndex(titles.filters, { type: 'book' })).toEqual({
      index: 'type',
      key: 'BOOK',
    });
    expect(selectIndex(titles.filters, { editor: editorId.toUpperCase() })).toEqual({
      index: 'editor',
      key: editorId,
    });
  });

  it('selects the primary index when nothing is supplied', () => {
    expect(selectIndex(titles.filters, { unrelated: 'x' })).toBeUndefined();
  });

  it('still validates filters that lose on precedence', () => {
    expect(() => selectIndex(titles.filters, { type: 'BOOK', editor: 'nope' })).toThrow(
      'bad request: invalid parameter, editor: nope (expecting an entity id)',
    );
  });

  it('names the expected form of each filter kind', () => {
    const filters = [dateFilter('date'), emailFilter('email'), enumFilter('type', ['BOOK'])];
    expect(() => selectIndex(filters, { date: '2024-13-01' })).toThrow(
      'bad request: invalid parameter, date: 2024-13-01 (expecting YYYY-MM-DD)',
    );
    expect(() => selectIndex(filters, { email: 'nobody' })).toThrow(
      'bad request: invalid parameter, email: nobody (expecting an email address)',
    );
    expect(() => selectIndex(filters, { type: 'poem' })).toThrow(
      'bad request: invalid parameter, type: poem (expecting one of BOOK)',
    );
  });
});

describe('planListing()', () => {
  it('prefers search over everything else', () => {
    expect(
      planListing(titles, { search: 'Dragon', sorted: 'false', limit: '2' }),
    ).toEqual({
      mode: 'search',
      index: undefined,
      search: { terms: ['dragon'], matchAny: false },
    });
  });

  it('reads everything when sorted', () => {
    expect(planListing(titles, { sorted: 'true', limit: '2', tag: 'x' })).toEqual({
      mode: 'all',
      index: { index: 'tag', key: 'x' },
      sorted: true,
    });
  });

  it('reads everything when no limit applies', () => {
    expect(planListing(titles, {})).toEqual({
      mode: 'all',
      index: undefined,
      sorted: false,
    });
  });

  it('pages with the default limit', () => {
    expect(planListing({ ...titles, defaultLimit: 20 }, {})).toEqual({
      mode: 'page',
      index: undefined,
      page: { reverse: false, limit: 20, offset: '-' },
    });
  });

  it('pages backwards from a supplied offset', () => {
    expect(
      planListing(titles, { limit: '2', reverse: 'true', offset: editorId }),
    ).toEqual({
      mode: 'page',
      index: undefined,
      page: { reverse: true, limit: 2, offset: editorId },
    });
  });

  it('rejects a bad limit even when searching', () => {
    expect(() => planListing(titles, { search: 'x', limit: '0' })).toThrow(ValidationError);
  });
});

describe('runPlan()', () => {
  const rows: TextValue[] = [
    { id: '01', value: 'Zebra Dragon' },
    { id: '02', value: 'Plain' },
    { id: '03', value: 'Alpha dragon' },
  ];

  it('filters and sorts search results', async () => {
    const { source, readPage } = fakeSource(rows);
    const out = await runPlan(planListing(titles, { search: 'dragon' }), source, (r) => r.value);
    expect(out.map((r) => r.id)).toEqual(['03', '01']);
    expect(readPage).not.toHaveBeenCalled();
  });

  it('hands the page to the source', async () => {
    const { source, readPage } = fakeSource(rows);
    const out = await runPlan(planListing(titles, { limit: '1', tag: 'x' }), source, (r) => r.value);
    expect(out).toEqual([rows[0]]);
    expect(readPage).toHaveBeenCalledWith(
      { reverse: false, limit: 1, offset: '-' },
      { index: 'tag', key: 'x' },
      {},
    );
  });

  it('keeps store order for unsorted reads', async () => {
    const { source } = fakeSource(rows);
    const out = await runPlan(planListing(titles, {}), source, (r) => r.value);
    expect(out.map((r) => r.id)).toEqual(['01', '02', '03']);
  });

  it('does not touch the source once aborted', async () => {
    const { source, readAll, readPage } = fakeSource(rows);
    const controller = new AbortController();
    controller.abort();
    await expect(
      runPlan(planListing(titles, {}), source, (r) => r.value, { signal: controller.signal }),
    ).rejects.toBeInstanceOf(RequestAbortedError);
    expect(readAll).not.toHaveBeenCalled();
    expect(readPage).not.toHaveBeenCalled();
  });
});
