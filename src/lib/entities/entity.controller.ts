import {
  Delete,
  Get,
  Head,
  HttpCode,
  HttpStatus,
  Param,
  Query,
} from '@nestjs/common';
import { NotFoundError } from '../errors/RequestErrors';
import { ParseEntityIdPipe } from '../http/entity-id.pipe';
import { RequestSignal } from '../http/request-context';
import type { EntityId } from '../ids/entity-id';
import type { RawQuery } from '../listing/types';
import type { StoredEntity } from '../../modules/store/store.types';
import type { EntityService } from './entity.service';

/**
 * Read, exists and delete routes under `:id`. HEAD handlers are declared
 * before their GET twins so Express does not answer HEAD with the GET route.
 */
export abstract class EntityController<T extends StoredEntity> {
  protected constructor(protected readonly service: EntityService<T>) {}

  @Head(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async exists(
    @Param('id', ParseEntityIdPipe) id: EntityId,
    @RequestSignal() signal: AbortSignal,
  ): Promise<void> {
    if (!(await this.service.exists(id, { signal }))) {
      throw new NotFoundError(this.service.entityType, id);
    }
  }

  @Get(':id')
  async read(
    @Param('id', ParseEntityIdPipe) id: EntityId,
    @RequestSignal() signal: AbortSignal,
  ): Promise<T> {
    return this.service.read(id, { signal });
  }

  @Delete(':id')
  async delete(@Param('id', ParseEntityIdPipe) id: EntityId): Promise<T> {
    return this.service.delete(id);
  }
}

/** Adds the version history routes, including removal of a single version. */
export abstract class VersionedEntityController<
  T extends StoredEntity,
> extends EntityController<T> {
  @Head(':id/versions/:versionId')
  @HttpCode(HttpStatus.NO_CONTENT)
  async versionExists(
    @Param('id', ParseEntityIdPipe) id: EntityId,
    @Param('versionId', ParseEntityIdPipe) versionId: EntityId,
  ): Promise<void> {
    if (!(await this.service.versionExists(id, versionId))) {
      throw new NotFoundError(this.service.entityType, id, versionId);
    }
  }

  @Get(':id/versions/:versionId')
  async readVersion(
    @Param('id', ParseEntityIdPipe) id: EntityId,
    @Param('versionId', ParseEntityIdPipe) versionId: EntityId,
  ): Promise<T> {
    return this.service.readVersion(id, versionId);
  }

  @Delete(':id/versions/:versionId')
  async deleteVersion(
    @Param('id', ParseEntityIdPipe) id: EntityId,
    @Param('versionId', ParseEntityIdPipe) versionId: EntityId,
  ): Promise<T> {
    return this.service.deleteVersion(id, versionId);
  }

  @Get(':id/versions')
  async readVersions(
    @Param('id', ParseEntityIdPipe) id: EntityId,
    @Query() query: RawQuery,
    @RequestSignal() signal: AbortSignal,
  ): Promise<T[]> {
    return this.service.readVersions(id, query, { signal });
  }
}
