import { Logger } from '@nestjs/common';
import type { Collection, Document, Filter, Sort } from 'mongodb';
import type { EntityId } from '../../lib/ids/entity-id';
import { NotFoundError } from '../../lib/errors/RequestErrors';
import { StoreError, type StoreOperation } from '../../lib/errors/StoreError';
import { raceAbort, throwIfAborted } from '../../lib/listing/abort';
import type {
  IndexRef,
  ListingContext,
  Page,
  TextValue,
} from '../../lib/listing/types';
import type { MongodbService } from '../mongodb/mongodb.service';
import type {
  EntityStore,
  EntityTable,
  StoredEntity,
  TableDefinition,
} from './store.types';
import { compareIds, indexKeysOf } from './store.util';

/** Current state of one entity. `keys.<index>` holds that index's keys. */
export interface EntityDocument {
  _id: EntityId;
  body: Document;
  keys: Record<string, string[]>;
  text: string;
  /** Set on expiring kinds; a TTL index removes the document after it passes. */
  expiresAt?: Date;
}

/** One retained version, keyed by its versionId. */
export interface VersionDocument {
  _id: EntityId;
  entityId: EntityId;
  body: Document;
}

export const versionsCollection = (collection: string): string =>
  `${collection}_versions`;

export class MongoEntityTable<T extends StoredEntity> implements EntityTable<T> {
  private readonly logger = new Logger(MongoEntityTable.name);
  private indexed?: Promise<void>;

  constructor(
    private readonly mongo: MongodbService,
    readonly definition: TableDefinition<T>,
  ) {}

  async readIds(page: Page, index?: IndexRef, ctx?: ListingContext): Promise<EntityId[]> {
    const docs = await this.find('readIds', page, index, { _id: 1 }, ctx);
    return docs.map((d) => d._id);
  }

  async readAllIds(index?: IndexRef, ctx?: ListingContext): Promise<EntityId[]> {
    const docs = await this.find('readIds', undefined, index, { _id: 1 }, ctx);
    return docs.map((d) => d._id);
  }

  async readTextValues(page: Page, index?: IndexRef, ctx?: ListingContext): Promise<TextValue[]> {
    const docs = await this.find('readTextValues', page, index, { _id: 1, text: 1 }, ctx);
    return docs.map((d) => ({ id: d._id, value: d.text }));
  }

  async readAllTextValues(index?: IndexRef, ctx?: ListingContext): Promise<TextValue[]> {
    const docs = await this.find('readTextValues', undefined, index, { _id: 1, text: 1 }, ctx);
    return docs.map((d) => ({ id: d._id, value: d.text }));
  }

  async readEntities(page: Page, index: IndexRef, ctx?: ListingContext): Promise<T[]> {
    const docs = await this.find('readEntities', page, index, { _id: 1, body: 1 }, ctx);
    return docs.map((d) => this.bodyOf(d.body));
  }

  async readAllEntities(index: IndexRef, ctx?: ListingContext): Promise<T[]> {
    const docs = await this.find('readEntities', undefined, index, { _id: 1, body: 1 }, ctx);
    return docs.map((d) => this.bodyOf(d.body));
  }

  async readKeys(index: string, ctx?: ListingContext): Promise<string[]> {
    return this.run('readKeys', ctx, async () => {
      const col = await this.entities();
      const keys = await col.distinct(`keys.${index}`, this.live());
      return keys.filter((k): k is string => typeof k === 'string').sort(compareIds);
    });
  }

  async readEntity(id: EntityId, ctx?: ListingContext): Promise<T> {
    const doc = await this.run('readEntity', ctx, async () => {
      const col = await this.entities();
      return col.findOne({ _id: id, ...this.live() }, { projection: { body: 1 } });
    });
    if (!doc) throw new NotFoundError(this.definition.entityType, id);
    return this.bodyOf(doc.body);
  }

  async entityExists(id: EntityId, ctx?: ListingContext): Promise<boolean> {
    return this.run('entityExists', ctx, async () => {
      const col = await this.entities();
      return (await col.countDocuments({ _id: id, ...this.live() }, { limit: 1 })) > 0;
    });
  }

  async writeEntity(entity: T): Promise<T> {
    return this.run('writeEntity', undefined, async () => {
      const col = await this.entities();
      const doc: Omit<EntityDocument, '_id'> = {
        body: { ...entity },
        keys: indexKeysOf(this.definition, entity),
        text: this.definition.text(entity),
      };
      const expiresAt = this.definition.expiresAt?.(entity);
      if (expiresAt !== undefined) doc.expiresAt = new Date(expiresAt);
      await col.replaceOne({ _id: entity.id }, doc, { upsert: true });
      if (this.definition.versioned && entity.versionId) {
        const versions = await this.versions();
        await versions.replaceOne(
          { _id: entity.versionId },
          { entityId: entity.id, body: { ...entity } },
          { upsert: true },
        );
      }
      return entity;
    });
  }

  async deleteEntity(id: EntityId): Promise<T> {
    const doc = await this.run('deleteEntity', undefined, async () => {
      const col = await this.entities();
      const removed = await col.findOneAndDelete({ _id: id });
      if (removed && this.definition.versioned) {
        const versions = await this.versions();
        await versions.deleteMany({ entityId: id });
      }
      return removed;
    });
    if (!doc) throw new NotFoundError(this.definition.entityType, id);
    return this.bodyOf(doc.body);
  }

  async readVersion(id: EntityId, versionId: EntityId): Promise<T> {
    const doc = await this.run('readVersion', undefined, async () => {
      const versions = await this.versions();
      return versions.findOne({ _id: versionId, entityId: id });
    });
    if (!doc) throw new NotFoundError(this.definition.entityType, id, versionId);
    return this.bodyOf(doc.body);
  }

  async versionExists(id: EntityId, versionId: EntityId): Promise<boolean> {
    return this.run('readVersion', undefined, async () => {
      const versions = await this.versions();
      return (await versions.countDocuments({ _id: versionId, entityId: id }, { limit: 1 })) > 0;
    });
  }

  async readVersions(id: EntityId, page: Page): Promise<T[]> {
    const docs = await this.run('readVersions', undefined, async () => {
      const versions = await this.versions();
      const filter: Filter<VersionDocument> = {
        entityId: id,
        _id: page.reverse ? { $lt: page.offset } : { $gt: page.offset },
      };
      return versions
        .find(filter)
        .sort({ _id: page.reverse ? -1 : 1 })
        .limit(page.limit)
        .toArray();
    });
    return docs.map((d) => this.bodyOf(d.body));
  }

  async deleteVersion(id: EntityId, versionId: EntityId): Promise<T> {
    const doc = await this.run('deleteVersion', undefined, async () => {
      const versions = await this.versions();
      return versions.findOneAndDelete({ _id: versionId, entityId: id });
    });
    if (!doc) throw new NotFoundError(this.definition.entityType, id, versionId);
    return this.bodyOf(doc.body);
  }

  private async find(
    operation: StoreOperation,
    page: Page | undefined,
    index: IndexRef | undefined,
    projection: Document,
    ctx?: ListingContext,
  ): Promise<EntityDocument[]> {
    return this.run(operation, ctx, async () => {
      const col = await this.entities();
      const filter: Filter<EntityDocument> = this.live();
      if (index) filter[`keys.${index.index}`] = index.key;
      let sort: Sort = { _id: 1 };
      if (page) {
        filter._id = page.reverse ? { $lt: page.offset } : { $gt: page.offset };
        sort = { _id: page.reverse ? -1 : 1 };
      }
      const cursor = col.find(filter, { projection }).sort(sort);
      if (page) cursor.limit(page.limit);
      return cursor.toArray();
    });
  }

  /** Bodies are written from T by writeEntity, so reading them back as T holds. */
  private bodyOf(body: Document): T {
    return body as T;
  }

  /**
   * TTL removal runs about once a minute, so expiring kinds also filter on
   * read. Empty for kinds that never expire.
   */
  private live(): Filter<EntityDocument> {
    return this.definition.expiresAt ? { expiresAt: { $gt: new Date() } } : {};
  }

  private async run<R>(
    operation: StoreOperation,
    ctx: ListingContext | undefined,
    action: () => Promise<R>,
  ): Promise<R> {
    try {
      throwIfAborted(ctx?.signal);
      return await raceAbort(action(), ctx?.signal);
    } catch (err) {
      const wrapped = StoreError.wrap(err, {
        operation,
        entityType: this.definition.entityType,
        collection: this.definition.collection,
      });
      if (wrapped instanceof StoreError) this.logger.error(wrapped.summary());
      throw wrapped;
    }
  }

  private async entities(): Promise<Collection<EntityDocument>> {
    const col = await this.mongo.getCollection<EntityDocument>(this.definition.collection);
    this.indexed ??= this.ensureIndexes(col);
    await this.indexed;
    return col;
  }

  private async versions(): Promise<Collection<VersionDocument>> {
    return this.mongo.getCollection<VersionDocument>(
      versionsCollection(this.definition.collection),
    );
  }

  private async ensureIndexes(col: Collection<EntityDocument>): Promise<void> {
    try {
      for (const index of this.definition.indexes) {
        await col.createIndex({ [`keys.${index.name}`]: 1, _id: 1 });
      }
      if (this.definition.expiresAt) {
        await col.createIndex({ expiresAt: 1 }, { expireAfterSeconds: 0 });
      }
      if (this.definition.versioned) {
        const versions = await this.versions();
        await versions.createIndex({ entityId: 1, _id: 1 });
      }
    } catch (err) {
      this.indexed = undefined;
      throw err;
    }
  }
}

export class MongoEntityStore implements EntityStore {
  constructor(private readonly mongo: MongodbService) {}

  table<T extends StoredEntity>(definition: TableDefinition<T>): EntityTable<T> {
    return new MongoEntityTable(this.mongo, definition);
  }
}
