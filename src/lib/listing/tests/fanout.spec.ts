import { RequestAbortedError } from '../../errors/RequestErrors';
import { fetchAll, missingSlots, presentSlots } from '../fanout';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('fetchAll()', () => {
  it('keeps slot order whatever order loads finish in', async () => {
    const ids = ['a', 'b', 'c'];
    const slots = await fetchAll(ids, async (id) => {
      await sleep((3 - ids.indexOf(id)) * 5);
      return id.toUpperCase();
    });
    expect(presentSlots(slots)).toEqual(['A', 'B', 'C']);
  });

  it('caps the number of loads in flight', async () => {
    let inFlight = 0;
    let peak = 0;
    const slots = await fetchAll(
      ['a', 'b', 'c', 'd', 'e'],
      async (id) => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await sleep(2);
        inFlight--;
        return id;
      },
      { concurrency: 2 },
    );
    expect(peak).toBe(2);
    expect(presentSlots(slots)).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('turns a failed load into a missing slot', async () => {
    const slots = await fetchAll(['a', 'b', 'c'], async (id) => {
      if (id === 'b') throw new Error('gone');
      return id;
    });
    expect(presentSlots(slots)).toEqual(['a', 'c']);
    expect(missingSlots(slots)).toEqual([{ id: 'b', status: 'missing', reason: 'gone' }]);
  });

  it('returns nothing for no ids', async () => {
    const load = jest.fn(async (id: string) => id);
    await expect(fetchAll([], load)).resolves.toEqual([]);
    expect(load).not.toHaveBeenCalled();
  });

  it('rejects without loading when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const load = jest.fn(async (id: string) => id);
    await expect(fetchAll(['a'], load, { signal: controller.signal })).rejects.toBeInstanceOf(
      RequestAbortedError,
    );
    expect(load).not.toHaveBeenCalled();
  });

  it('rejects the whole batch when aborted mid-flight', async () => {
    const controller = new AbortController();
    const pending = fetchAll(
      ['a', 'b'],
      async (id) => {
        await sleep(30);
        return id;
      },
      { signal: controller.signal },
    );
    setTimeout(() => controller.abort(), 5);
    await expect(pending).rejects.toBeInstanceOf(RequestAbortedError);
  });
});
