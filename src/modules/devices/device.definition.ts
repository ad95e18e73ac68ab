import type { EntityId } from '../../lib/ids/entity-id';
import type { StoredEntity, TableDefinition } from '../store/store.types';

export interface Device extends StoredEntity {
  versionId: EntityId;
  updatedAt: string;
  /** Refreshed on every write. */
  lastSeenAt: string;
  userId?: EntityId;
  userAgent: string;
}

export function lastSeenOn(d: Pick<Device, 'lastSeenAt'>): string {
  return d.lastSeenAt.slice(0, 10);
}

export const deviceTable: TableDefinition<Device> = {
  entityType: 'Device',
  collection: 'devices',
  versioned: true,
  text: (d) => d.userAgent,
  indexes: [
    { name: 'user', keys: (d) => [d.userId] },
    { name: 'date', keys: (d) => [lastSeenOn(d)] },
  ],
};
