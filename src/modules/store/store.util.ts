import type { Page } from '../../lib/listing/types';
import type { StoredEntity, TableDefinition } from './store.types';

/** Index name to the distinct, non-blank keys an entity is filed under. */
export function indexKeysOf<T extends StoredEntity>(
  definition: TableDefinition<T>,
  entity: T,
): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  for (const index of definition.indexes) {
    const keys: string[] = [];
    for (const raw of index.keys(entity)) {
      const key = raw?.trim();
      if (key && !keys.includes(key)) keys.push(key);
    }
    out[index.name] = keys;
  }
  return out;
}

/** Applies an exclusive-offset page to ids already in ascending order. */
export function slicePage<E>(
  ascending: ReadonlyArray<E>,
  idOf: (item: E) => string,
  page: Page,
): E[] {
  const out: E[] = [];
  if (page.reverse) {
    for (let i = ascending.length - 1; i >= 0 && out.length < page.limit; i--) {
      if (idOf(ascending[i]) < page.offset) out.push(ascending[i]);
    }
  } else {
    for (let i = 0; i < ascending.length && out.length < page.limit; i++) {
      if (idOf(ascending[i]) > page.offset) out.push(ascending[i]);
    }
  }
  return out;
}

export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
