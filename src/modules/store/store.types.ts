import type { EntityId } from '../../lib/ids/entity-id';
import type {
  IndexRef,
  ListingContext,
  Page,
  TextValue,
} from '../../lib/listing/types';

/** Fields every stored body carries. Versioned kinds also set the version pair. */
export interface StoredEntity {
  id: EntityId;
  createdAt: string;
  versionId?: EntityId;
  updatedAt?: string;
}

export interface IndexDefinition<T> {
  readonly name: string;
  /** Keys this entity is filed under. Empty or blank keys are skipped. */
  readonly keys: (entity: T) => ReadonlyArray<string | undefined>;
}

export interface TableDefinition<T extends StoredEntity> {
  /** Human name used in errors, e.g. 'Content'. */
  readonly entityType: string;
  readonly collection: string;
  readonly versioned: boolean;
  readonly text: (entity: T) => string;
  readonly indexes: ReadonlyArray<IndexDefinition<T>>;
  /** Expiring kinds only. Past this instant a row reads as absent and may be purged. */
  readonly expiresAt?: (entity: T) => string;
}

/**
 * Store contract consumed by the listing layer and the entity services.
 * Secondary indexes hold (key, id) pairs ordered by id within a key; page
 * offsets are exclusive.
 */
export interface EntityTable<T extends StoredEntity> {
  readonly definition: TableDefinition<T>;

  readIds(page: Page, index?: IndexRef, ctx?: ListingContext): Promise<EntityId[]>;
  readAllIds(index?: IndexRef, ctx?: ListingContext): Promise<EntityId[]>;
  readTextValues(page: Page, index?: IndexRef, ctx?: ListingContext): Promise<TextValue[]>;
  readAllTextValues(index?: IndexRef, ctx?: ListingContext): Promise<TextValue[]>;
  readEntities(page: Page, index: IndexRef, ctx?: ListingContext): Promise<T[]>;
  readAllEntities(index: IndexRef, ctx?: ListingContext): Promise<T[]>;
  readKeys(index: string, ctx?: ListingContext): Promise<string[]>;

  readEntity(id: EntityId, ctx?: ListingContext): Promise<T>;
  entityExists(id: EntityId, ctx?: ListingContext): Promise<boolean>;
  /** Insert or replace; versioned tables also append to the history. */
  writeEntity(entity: T): Promise<T>;
  /** Removes the entity, its index entries and every version. */
  deleteEntity(id: EntityId): Promise<T>;

  readVersion(id: EntityId, versionId: EntityId): Promise<T>;
  versionExists(id: EntityId, versionId: EntityId): Promise<boolean>;
  readVersions(id: EntityId, page: Page): Promise<T[]>;
  /** Drops one retained version. The current state is left as it is. */
  deleteVersion(id: EntityId, versionId: EntityId): Promise<T>;
}

/**
 * Opens a table for a definition. Each call returns a fresh handle; the owning
 * service keeps the one it opened.
 */
export abstract class EntityStore {
  abstract table<T extends StoredEntity>(definition: TableDefinition<T>): EntityTable<T>;
}
