import type { EntityId } from '../../lib/ids/entity-id';
import { NotFoundError } from '../../lib/errors/RequestErrors';
import { throwIfAborted } from '../../lib/listing/abort';
import type {
  IndexRef,
  ListingContext,
  Page,
  TextValue,
} from '../../lib/listing/types';
import type {
  EntityStore,
  EntityTable,
  StoredEntity,
  TableDefinition,
} from './store.types';
import { compareIds, indexKeysOf, slicePage } from './store.util';

interface Row<T> {
  readonly entity: T;
  readonly text: string;
  readonly keys: Record<string, string[]>;
  /** Epoch ms; absent for kinds that never expire. */
  readonly expiresAt?: number;
}

/**
 * In-process table. Bodies are cloned on the way in and out so callers
 * never share state with the store. Expired rows are purged as reads
 * come across them.
 */
export class MemoryEntityTable<T extends StoredEntity> implements EntityTable<T> {
  private readonly rows = new Map<EntityId, Row<T>>();
  private readonly versions = new Map<EntityId, Map<EntityId, T>>();

  constructor(readonly definition: TableDefinition<T>) {}

  async readIds(page: Page, index?: IndexRef, ctx?: ListingContext): Promise<EntityId[]> {
    throwIfAborted(ctx?.signal);
    return slicePage(this.select(index), (id) => id, page);
  }

  async readAllIds(index?: IndexRef, ctx?: ListingContext): Promise<EntityId[]> {
    throwIfAborted(ctx?.signal);
    return this.select(index);
  }

  // Rows deleted between the id read and this point are skipped.
  async readTextValues(page: Page, index?: IndexRef, ctx?: ListingContext): Promise<TextValue[]> {
    const ids = await this.readIds(page, index, ctx);
    return this.present(ids).map(([id, row]) => ({ id, value: row.text }));
  }

  async readAllTextValues(index?: IndexRef, ctx?: ListingContext): Promise<TextValue[]> {
    const ids = await this.readAllIds(index, ctx);
    return this.present(ids).map(([id, row]) => ({ id, value: row.text }));
  }

  async readEntities(page: Page, index: IndexRef, ctx?: ListingContext): Promise<T[]> {
    const ids = await this.readIds(page, index, ctx);
    return this.present(ids).map(([, row]) => structuredClone(row.entity));
  }

  async readAllEntities(index: IndexRef, ctx?: ListingContext): Promise<T[]> {
    const ids = await this.readAllIds(index, ctx);
    return this.present(ids).map(([, row]) => structuredClone(row.entity));
  }

  async readKeys(index: string, ctx?: ListingContext): Promise<string[]> {
    throwIfAborted(ctx?.signal);
    const keys = new Set<string>();
    for (const [id, row] of this.rows) {
      if (!this.live(id, row)) continue;
      for (const key of row.keys[index] ?? []) keys.add(key);
    }
    return [...keys].sort(compareIds);
  }

  async readEntity(id: EntityId, ctx?: ListingContext): Promise<T> {
    throwIfAborted(ctx?.signal);
    const row = this.row(id);
    if (!row) throw new NotFoundError(this.definition.entityType, id);
    return structuredClone(row.entity);
  }

  async entityExists(id: EntityId, ctx?: ListingContext): Promise<boolean> {
    throwIfAborted(ctx?.signal);
    return this.row(id) !== undefined;
  }

  async writeEntity(entity: T): Promise<T> {
    const stored = structuredClone(entity);
    const expiresAt = this.definition.expiresAt?.(stored);
    this.rows.set(stored.id, {
      entity: stored,
      text: this.definition.text(stored),
      keys: indexKeysOf(this.definition, stored),
      expiresAt: expiresAt === undefined ? undefined : new Date(expiresAt).getTime(),
    });
    if (this.definition.versioned && stored.versionId) {
      const history = this.versions.get(stored.id) ?? new Map<EntityId, T>();
      history.set(stored.versionId, structuredClone(stored));
      this.versions.set(stored.id, history);
    }
    return structuredClone(stored);
  }

  async deleteEntity(id: EntityId): Promise<T> {
    const row = this.row(id);
    if (!row) throw new NotFoundError(this.definition.entityType, id);
    this.rows.delete(id);
    this.versions.delete(id);
    return structuredClone(row.entity);
  }

  async readVersion(id: EntityId, versionId: EntityId): Promise<T> {
    const version = this.versions.get(id)?.get(versionId);
    if (!version) throw new NotFoundError(this.definition.entityType, id, versionId);
    return structuredClone(version);
  }

  async versionExists(id: EntityId, versionId: EntityId): Promise<boolean> {
    return this.versions.get(id)?.has(versionId) ?? false;
  }

  async readVersions(id: EntityId, page: Page): Promise<T[]> {
    const history = this.versions.get(id);
    if (!history) return [];
    const ids = [...history.keys()].sort(compareIds);
    return slicePage(ids, (v) => v, page).map((v) => {
      const version = history.get(v);
      if (!version) throw new NotFoundError(this.definition.entityType, id, v);
      return structuredClone(version);
    });
  }

  async deleteVersion(id: EntityId, versionId: EntityId): Promise<T> {
    const history = this.versions.get(id);
    const version = history?.get(versionId);
    if (!history || !version) throw new NotFoundError(this.definition.entityType, id, versionId);
    history.delete(versionId);
    return structuredClone(version);
  }

  private select(index?: IndexRef): EntityId[] {
    const ids: EntityId[] = [];
    for (const [id, row] of this.rows) {
      if (!this.live(id, row)) continue;
      if (!index || (row.keys[index.index] ?? []).includes(index.key)) ids.push(id);
    }
    return ids.sort(compareIds);
  }

  /** The live row for an id, or undefined when it is missing or expired. */
  private row(id: EntityId): Row<T> | undefined {
    const row = this.rows.get(id);
    return row && this.live(id, row) ? row : undefined;
  }

  private present(ids: ReadonlyArray<EntityId>): Array<[EntityId, Row<T>]> {
    const out: Array<[EntityId, Row<T>]> = [];
    for (const id of ids) {
      const row = this.row(id);
      if (row) out.push([id, row]);
    }
    return out;
  }

  private live(id: EntityId, row: Row<T>): boolean {
    if (row.expiresAt === undefined || row.expiresAt > Date.now()) return true;
    this.rows.delete(id);
    this.versions.delete(id);
    return false;
  }
}

export class MemoryEntityStore implements EntityStore {
  table<T extends StoredEntity>(definition: TableDefinition<T>): EntityTable<T> {
    return new MemoryEntityTable(definition);
  }
}
