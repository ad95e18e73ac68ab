import type { EntityId } from '../../lib/ids/entity-id';
import type { StoredEntity, TableDefinition } from '../store/store.types';

export const LOG_LEVELS = ['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Something that happened to an entity, kept until it expires. */
export interface EventRecord extends StoredEntity {
  expiresAt: string;
  userId?: EntityId;
  entityId?: EntityId;
  entityType?: string;
  logLevel: LogLevel;
  message: string;
  uri?: string;
}

export type NewEvent = Omit<EventRecord, 'id' | 'createdAt' | 'expiresAt' | 'versionId' | 'updatedAt'>;

export const eventTable: TableDefinition<EventRecord> = {
  entityType: 'Event',
  collection: 'events',
  versioned: false,
  text: (e) => e.message,
  indexes: [
    { name: 'entity', keys: (e) => [e.entityId] },
    { name: 'type', keys: (e) => [e.entityType] },
    { name: 'log_level', keys: (e) => [e.logLevel] },
    { name: 'date', keys: (e) => [e.createdAt.slice(0, 10)] },
  ],
  expiresAt: (e) => e.expiresAt,
};
