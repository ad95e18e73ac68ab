import { Logger } from '@nestjs/common';
import { UnprocessableEntityError, ValidationError, NotFoundError } from '../errors/RequestErrors';
import { newEntityId, type EntityId } from '../ids/entity-id';
import { resolvePage } from '../listing/cursor';
import type { ListingContext, RawQuery } from '../listing/types';
import type {
  EntityStore,
  EntityTable,
  StoredEntity,
  TableDefinition,
} from '../../modules/store/store.types';

/** Identity and version stamps assigned by the service, never by the caller. */
export interface EntityStamps {
  id: EntityId;
  createdAt: string;
  versionId: EntityId;
  updatedAt: string;
}

/**
 * Single-entity operations shared by every kind. Subclasses add creation,
 * update and listings, and state what makes a body acceptable.
 */
export abstract class EntityService<T extends StoredEntity> {
  protected readonly logger: Logger;
  protected readonly table: EntityTable<T>;

  protected constructor(
    store: EntityStore,
    definition: TableDefinition<T>,
    /** Page size for version histories. */
    protected readonly versionsLimit = 100,
  ) {
    this.table = store.table(definition);
    this.logger = new Logger(`${definition.entityType}Service`);
  }

  get entityType(): string {
    return this.table.definition.entityType;
  }

  get versioned(): boolean {
    return this.table.definition.versioned;
  }

  /** Problems with a fully stamped body; empty when it can be stored. */
  protected abstract validate(entity: T): string[];

  async read(id: EntityId, ctx?: ListingContext): Promise<T> {
    return this.table.readEntity(id, ctx);
  }

  async exists(id: EntityId, ctx?: ListingContext): Promise<boolean> {
    return this.table.entityExists(id, ctx);
  }

  async delete(id: EntityId): Promise<T> {
    const removed = await this.table.deleteEntity(id);
    this.logger.log(`deleted ${this.entityType} ${id}`);
    return removed;
  }

  async readVersion(id: EntityId, versionId: EntityId): Promise<T> {
    return this.table.readVersion(id, versionId);
  }

  async versionExists(id: EntityId, versionId: EntityId): Promise<boolean> {
    return this.table.versionExists(id, versionId);
  }

  /**
   * Removes one version. Removing the current version first restores the
   * newest older one as the current state; the only version cannot go.
   */
  async deleteVersion(id: EntityId, versionId: EntityId): Promise<T> {
    const current = await this.table.readEntity(id);
    if (current.versionId === versionId) {
      const [previous] = await this.table.readVersions(id, {
        reverse: true,
        limit: 1,
        offset: versionId,
      });
      if (!previous) {
        throw new UnprocessableEntityError(this.entityType, [
          `Version ${versionId} is the only version; delete the ${this.entityType} instead`,
        ]);
      }
      await this.table.writeEntity(previous);
      this.logger.log(`restored ${this.entityType} ${id} version ${previous.versionId ?? ''}`);
    }
    const removed = await this.table.deleteVersion(id, versionId);
    this.logger.log(`deleted ${this.entityType} ${id} version ${versionId}`);
    return removed;
  }

  async readVersions(id: EntityId, query: RawQuery, ctx?: ListingContext): Promise<T[]> {
    const page = resolvePage(query, this.versionsLimit);
    if (!(await this.table.entityExists(id, ctx))) {
      throw new NotFoundError(this.entityType, id);
    }
    return this.table.readVersions(id, page);
  }

  /** Stamps for a new entity; the first version shares the entity id. */
  protected newStamps(now = new Date()): EntityStamps {
    const id = newEntityId();
    const at = now.toISOString();
    return { id, createdAt: at, versionId: id, updatedAt: at };
  }

  /** Stamps for the next version of an existing entity. */
  protected nextStamps(existing: T, now = new Date()): EntityStamps {
    return {
      id: existing.id,
      createdAt: existing.createdAt,
      versionId: newEntityId(),
      updatedAt: now.toISOString(),
    };
  }

  /** Rejects a replacement body whose id disagrees with the path. */
  protected checkBodyId(pathId: EntityId, bodyId: string | undefined): void {
    if (bodyId !== undefined && bodyId !== '' && bodyId !== pathId) {
      throw new ValidationError('id', bodyId, `does not match ${pathId}`);
    }
  }

  protected async save(entity: T): Promise<T> {
    const problems = this.validate(entity);
    if (problems.length > 0) {
      throw new UnprocessableEntityError(this.entityType, problems);
    }
    const saved = await this.table.writeEntity(entity);
    this.logger.log(
      `saved ${this.entityType} ${saved.id}${saved.versionId ? ` version ${saved.versionId}` : ''}`,
    );
    return saved;
  }
}
