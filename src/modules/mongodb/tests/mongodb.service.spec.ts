import type { Db } from 'mongodb';
import { StoreError } from '../../../lib/errors/StoreError';
import type { MongoConnection } from '../internal/mongodb.client';
import { MongodbService } from '../mongodb.service';

describe('MongodbService (unit)', () => {
  let service: MongodbService;
  const getDb = jest.fn();
  const close = jest.fn();
  const command = jest.fn();
  const collection = jest.fn();
  const db = { command, collection } as unknown as Db;

  beforeEach(() => {
    jest.clearAllMocks();
    const connection = { dbName: 'entities', getDb, close } as unknown as MongoConnection;
    service = new MongodbService(connection);
  });

  it('opens the default database', async () => {
    getDb.mockResolvedValue(db);
    await expect(service.getDb()).resolves.toBe(db);
    expect(getDb).toHaveBeenCalledWith('entities');
  });

  it('wraps connection failures', async () => {
    getDb.mockRejectedValue(Object.assign(new Error('ECONNREFUSED'), { code: 'ECONNREFUSED' }));
    const err = await service.getDb('entities_test').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StoreError);
    if (err instanceof StoreError) {
      expect(err.summary()).toBe('store action failed: op=connect driverCode=ECONNREFUSED');
      expect(err.context.argsPreview).toEqual({ dbName: 'entities_test' });
    }
  });

  it('refuses a blank collection name', async () => {
    await expect(service.getCollection('')).rejects.toThrow('Collection name must be a non-empty string');
    expect(getDb).not.toHaveBeenCalled();
  });

  it('hands out driver collections', async () => {
    getDb.mockResolvedValue(db);
    collection.mockReturnValue('contents-collection');
    await expect(service.getCollection('contents')).resolves.toBe('contents-collection');
    expect(collection).toHaveBeenCalledWith('contents');
  });

  it('pings', async () => {
    getDb.mockResolvedValue(db);
    command.mockResolvedValue({ ok: 1 });
    await expect(service.ping()).resolves.toBe(true);
    expect(command).toHaveBeenCalledWith({ ping: 1 });
  });

  it('wraps a failed ping', async () => {
    getDb.mockResolvedValue(db);
    command.mockRejectedValue(new Error('not primary'));
    await expect(service.ping()).rejects.toThrow(StoreError);
  });

  it('closes the client on shutdown', async () => {
    await service.onModuleDestroy();
    expect(close).toHaveBeenCalledTimes(1);
  });
});
