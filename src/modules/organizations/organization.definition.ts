import type { EntityId } from '../../lib/ids/entity-id';
import type { StoredEntity, TableDefinition } from '../store/store.types';

export const ORGANIZATION_STATUSES = ['PENDING', 'ENABLED', 'DISABLED'] as const;
export type OrganizationStatus = (typeof ORGANIZATION_STATUSES)[number];

export interface Organization extends StoredEntity {
  versionId: EntityId;
  updatedAt: string;
  name: string;
  status: OrganizationStatus;
}

export const organizationTable: TableDefinition<Organization> = {
  entityType: 'Organization',
  collection: 'organizations',
  versioned: true,
  text: (o) => o.name,
  indexes: [{ name: 'status', keys: (o) => [o.status] }],
};
