import type { EntityId } from '../../lib/ids/entity-id';
import { isEmailAddress } from '../../lib/listing/filters';
import type { StoredEntity, TableDefinition } from '../store/store.types';

export const EMAIL_STATUSES = ['PENDING', 'SENT', 'UNSENT', 'ERROR'] as const;
export type EmailStatus = (typeof EMAIL_STATUSES)[number];

export interface Identity {
  name?: string;
  /** Always lower-case. */
  address: string;
}

export interface Email extends StoredEntity {
  versionId: EntityId;
  updatedAt: string;
  from: Identity;
  to: Identity[];
  cc: Identity[];
  bcc: Identity[];
  subject: string;
  bodyText: string;
  bodyHtml?: string;
  eventMessage?: string;
  status: EmailStatus;
}

export function isValidIdentity(i: Identity): boolean {
  return isEmailAddress(i.address);
}

/** "Name <address>", or the bare address. */
export function identityText(i: Identity): string {
  return i.name ? `${i.name} <${i.address}>` : i.address;
}

export function allAddresses(e: Pick<Email, 'from' | 'to' | 'cc' | 'bcc'>): string[] {
  return [e.from, ...e.to, ...e.cc, ...e.bcc].map((i) => i.address).filter((a) => a);
}

export const emailTable: TableDefinition<Email> = {
  entityType: 'Email',
  collection: 'emails',
  versioned: true,
  text: (e) => e.subject,
  indexes: [
    { name: 'address', keys: allAddresses },
    { name: 'status', keys: (e) => [e.status] },
  ],
};
