import type { EntityId } from '../../lib/ids/entity-id';
import type { StoredEntity, TableDefinition } from '../store/store.types';

export interface Metric extends StoredEntity {
  expiresAt: string;
  title: string;
  label?: string;
  entityId?: EntityId;
  entityType?: string;
  tags: string[];
  value: number;
  units: string;
}

export type NewMetric = Omit<Metric, 'id' | 'createdAt' | 'expiresAt' | 'versionId' | 'updatedAt'>;

export const metricTable: TableDefinition<Metric> = {
  entityType: 'Metric',
  collection: 'metrics',
  versioned: false,
  text: (m) => m.label || m.title,
  indexes: [
    { name: 'entity', keys: (m) => [m.entityId] },
    { name: 'type', keys: (m) => [m.entityType] },
    { name: 'tag', keys: (m) => m.tags },
  ],
  expiresAt: (m) => m.expiresAt,
};
