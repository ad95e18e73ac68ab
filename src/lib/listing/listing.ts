import { Logger } from '@nestjs/common';
import type { EntityId } from '../ids/entity-id';
import type {
  EntityTable,
  StoredEntity,
} from '../../modules/store/store.types';
import { throwIfAborted } from './abort';
import {
  planListing,
  runPlan,
  type ListingDefinition,
  type ListingPlan,
  type ListingSource,
} from './dispatcher';
import { fetchAll, missingSlots, presentSlots } from './fanout';
import type { ListingContext, RawQuery, TextValue } from './types';

/** One listing endpoint: a declared filter set bound to a source. */
export class Listing<R> {
  constructor(
    readonly definition: ListingDefinition,
    private readonly source: ListingSource<R>,
    private readonly textOf: (item: R) => string,
  ) {}

  /** Parses and validates the query without touching the store. */
  plan(query: RawQuery): ListingPlan {
    return planListing(this.definition, query);
  }

  async list(query: RawQuery, ctx: ListingContext = {}): Promise<R[]> {
    return runPlan(this.plan(query), this.source, this.textOf, ctx);
  }
}

export function textListing<T extends StoredEntity>(
  table: EntityTable<T>,
  definition: ListingDefinition,
): Listing<TextValue> {
  return new Listing<TextValue>(
    definition,
    {
      readPage: (page, index, ctx) => table.readTextValues(page, index, ctx),
      readAll: (index, ctx) => table.readAllTextValues(index, ctx),
    },
    (tv) => tv.value,
  );
}

export interface EntityListingOptions {
  /** Cap on concurrent body loads for unfiltered listings. */
  readonly concurrency?: number;
}

/**
 * Full-body listing. Filtered reads come straight from the index; unfiltered
 * reads fetch ids from the primary index and expand them concurrently,
 * dropping ids whose body vanished in between.
 */
export function entityListing<T extends StoredEntity>(
  table: EntityTable<T>,
  definition: ListingDefinition,
  options: EntityListingOptions = {},
): Listing<T> {
  const logger = new Logger(`Listing:${definition.name}`);

  const expand = async (ids: EntityId[], ctx: ListingContext): Promise<T[]> => {
    const slots = await fetchAll(
      ids,
      (id, signal) => table.readEntity(id, { signal }),
      { signal: ctx.signal, concurrency: options.concurrency },
    );
    for (const gap of missingSlots(slots)) {
      logger.debug(`omitting ${table.definition.entityType} ${gap.id}: ${gap.reason}`);
    }
    return presentSlots(slots);
  };

  return new Listing<T>(
    definition,
    {
      readPage: async (page, index, ctx) => {
        if (index) return table.readEntities(page, index, ctx);
        return expand(await table.readIds(page, undefined, ctx), ctx);
      },
      readAll: async (index, ctx) => {
        if (index) return table.readAllEntities(index, ctx);
        return expand(await table.readAllIds(undefined, ctx), ctx);
      },
    },
    table.definition.text,
  );
}

/** All distinct keys of one secondary index, ordinal order. */
export class KeyListing<T extends StoredEntity = StoredEntity> {
  constructor(
    private readonly table: EntityTable<T>,
    readonly index: string,
  ) {}

  async list(ctx: ListingContext = {}): Promise<string[]> {
    throwIfAborted(ctx.signal);
    const keys = await this.table.readKeys(this.index, ctx);
    return [...new Set(keys)].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  }
}

export function keyListing<T extends StoredEntity>(
  table: EntityTable<T>,
  index: string,
): KeyListing<T> {
  return new KeyListing(table, index);
}
