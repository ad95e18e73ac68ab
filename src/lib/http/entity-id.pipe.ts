import { Injectable, type ArgumentMetadata, type PipeTransform } from '@nestjs/common';
import { ValidationError } from '../errors/RequestErrors';
import { isEntityId, type EntityId } from '../ids/entity-id';

/** Rejects path ids that are not EntityIDs before any store access. */
@Injectable()
export class ParseEntityIdPipe implements PipeTransform<string, EntityId> {
  transform(value: string, metadata: ArgumentMetadata): EntityId {
    const id = typeof value === 'string' ? value.trim().toLowerCase() : '';
    if (!isEntityId(id)) {
      throw new ValidationError(metadata.data ?? 'id', String(value), 'expecting an entity id');
    }
    return id;
  }
}
