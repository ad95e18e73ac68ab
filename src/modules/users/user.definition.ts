import type { EntityId } from '../../lib/ids/entity-id';
import type { StoredEntity, TableDefinition } from '../store/store.types';

export const USER_STATUSES = ['PENDING', 'ENABLED', 'DISABLED'] as const;
export type UserStatus = (typeof USER_STATUSES)[number];

export interface User extends StoredEntity {
  versionId: EntityId;
  updatedAt: string;
  givenName?: string;
  familyName?: string;
  /** Always lower-case. */
  email: string;
  roles: string[];
  orgId?: EntityId;
  orgName?: string;
  avatarUrl?: string;
  websiteUrl?: string;
  status: UserStatus;
}

export function fullName(u: Pick<User, 'givenName' | 'familyName'>): string {
  return `${u.givenName ?? ''} ${u.familyName ?? ''}`.trim();
}

/** "Given Family <email>", or whichever half is present. */
export function userName(u: Pick<User, 'givenName' | 'familyName' | 'email'>): string {
  const name = fullName(u);
  if (!name) return u.email;
  if (!u.email) return name;
  return `${name} <${u.email}>`;
}

export function standardizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export const userTable: TableDefinition<User> = {
  entityType: 'User',
  collection: 'users',
  versioned: true,
  text: userName,
  indexes: [
    { name: 'email', keys: (u) => [u.email] },
    { name: 'org', keys: (u) => [u.orgId] },
    { name: 'role', keys: (u) => u.roles },
    { name: 'status', keys: (u) => [u.status] },
  ],
};
