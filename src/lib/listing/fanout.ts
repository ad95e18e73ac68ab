import type { EntityId } from '../ids/entity-id';
import { raceAbort, throwIfAborted } from './abort';

export type FanOutSlot<T> =
  | { readonly id: EntityId; readonly status: 'found'; readonly body: T }
  | { readonly id: EntityId; readonly status: 'missing'; readonly reason: string };

export type FanOutLoader<T> = (id: EntityId, signal?: AbortSignal) => Promise<T>;

export interface FanOutOptions {
  readonly signal?: AbortSignal;
  /** Upper bound on in-flight loads. Defaults to one per id. */
  readonly concurrency?: number;
}

/**
 * Loads every id through a bounded worker pool. Slot i always answers ids[i],
 * whatever order the loads complete in. A failed load becomes a missing slot;
 * only cancellation rejects the batch.
 */
export async function fetchAll<T>(
  ids: ReadonlyArray<EntityId>,
  load: FanOutLoader<T>,
  options: FanOutOptions = {},
): Promise<FanOutSlot<T>[]> {
  const { signal } = options;
  throwIfAborted(signal);
  if (ids.length === 0) return [];

  const cap = options.concurrency && options.concurrency > 0 ? options.concurrency : ids.length;
  const workers = Math.min(ids.length, cap);
  const slots = new Array<FanOutSlot<T>>(ids.length);
  let next = 0;

  const work = async (): Promise<void> => {
    while (next < ids.length && !signal?.aborted) {
      const i = next++;
      const id = ids[i];
      try {
        slots[i] = { id, status: 'found', body: await load(id, signal) };
      } catch (err) {
        slots[i] = {
          id,
          status: 'missing',
          reason: err instanceof Error ? err.message : String(err),
        };
      }
    }
  };

  await raceAbort(
    Promise.all(Array.from({ length: workers }, () => work())),
    signal,
  );
  throwIfAborted(signal);
  return slots;
}

export function presentSlots<T>(slots: ReadonlyArray<FanOutSlot<T>>): T[] {
  const out: T[] = [];
  for (const slot of slots) {
    if (slot.status === 'found') out.push(slot.body);
  }
  return out;
}

export function missingSlots<T>(
  slots: ReadonlyArray<FanOutSlot<T>>,
): Array<Extract<FanOutSlot<T>, { status: 'missing' }>> {
  const out: Array<Extract<FanOutSlot<T>, { status: 'missing' }>> = [];
  for (const slot of slots) {
    if (slot.status === 'missing') out.push(slot);
  }
  return out;
}
