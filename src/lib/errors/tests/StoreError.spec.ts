import { NotFoundError } from '../RequestErrors';
import { StoreError } from '../StoreError';

describe('StoreError', () => {
  it('passes application errors through wrap', () => {
    const notFound = new NotFoundError('Content', 'abc');
    expect(StoreError.wrap(notFound, { operation: 'readEntity' })).toBe(notFound);
  });

  it('keeps the driver code and message', () => {
    const driverErr = Object.assign(new Error('E11000 duplicate key'), { code: 11000 });
    const err = StoreError.wrap(driverErr, {
      operation: 'writeEntity',
      entityType: 'User',
      collection: 'users',
    });
    expect(err).toBeInstanceOf(StoreError);
    if (err instanceof StoreError) {
      expect(err.message).toBe('E11000 duplicate key');
      expect(err.summary()).toBe('store action failed: op=writeEntity type=User coll=users driverCode=11000');
      expect(err.toJSON().cause).toEqual({ name: 'Error', message: 'E11000 duplicate key' });
    }
  });

  it('falls back when the thrown value has no message', () => {
    const err = StoreError.wrap(42, { operation: 'ping' });
    expect(err.message).toBe('store action failed');
    expect(err.status).toBe(500);
  });
});
