import type { StoredEntity, TableDefinition } from '../store/store.types';

/** Devices last seen on one calendar day. The id is the day itself. */
export interface DeviceCount extends StoredEntity {
  date: string;
  total: number;
  /** Devices tied to a user. */
  users: number;
  userAgents: Record<string, number>;
}

export const deviceCountTable: TableDefinition<DeviceCount> = {
  entityType: 'DeviceCount',
  collection: 'device_counts',
  versioned: false,
  text: (c) => c.date,
  indexes: [],
};
