import { SetMetadata } from '@nestjs/common';

export const AUDITED_ENTITY_TYPE = 'audit:entityType';

/**
 * Marks a controller (or a single handler) whose mutating routes emit an
 * audit event, attributed to the given entity type.
 */
export const Audited = (entityType: string) =>
  SetMetadata(AUDITED_ENTITY_TYPE, entityType);
