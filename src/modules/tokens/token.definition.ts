import type { EntityId } from '../../lib/ids/entity-id';
import type { StoredEntity, TableDefinition } from '../store/store.types';

export interface Token extends StoredEntity {
  expiresAt: string;
  userId: EntityId;
  email?: string;
}

export const tokenTable: TableDefinition<Token> = {
  entityType: 'Token',
  collection: 'tokens',
  versioned: false,
  text: (t) => (t.email ? `${t.email} ${t.id}` : t.id),
  indexes: [{ name: 'user', keys: (t) => [t.userId] }],
  expiresAt: (t) => t.expiresAt,
};
