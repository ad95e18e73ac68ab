import { ObjectId } from 'mongodb';

/**
 * Entity IDs are lower-case hex ObjectIds. The leading four bytes are the
 * creation second, so string order is creation order.
 */
export type EntityId = string;

const ENTITY_ID = /^[0-9a-f]{24}$/;

export function newEntityId(): EntityId {
  return new ObjectId().toHexString();
}

export function isEntityId(value: unknown): value is EntityId {
  return typeof value === 'string' && ENTITY_ID.test(value);
}

/**
 * Smallest ID that can be minted at `at`. IDs at or above it were created
 * at or after that second.
 */
export function firstEntityIdAt(at: Date): EntityId {
  return ObjectId.createFromTime(Math.floor(at.getTime() / 1000)).toHexString();
}
