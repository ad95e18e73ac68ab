import { NotFoundError, RequestAbortedError } from '../../../lib/errors/RequestErrors';
import { StoreError } from '../../../lib/errors/StoreError';
import type { MongodbService } from '../../mongodb/mongodb.service';
import { MongoEntityTable } from '../mongo-entity.table';
import type { StoredEntity, TableDefinition } from '../store.types';

interface Note extends StoredEntity {
  title: string;
  tags: string[];
}

const notes: TableDefinition<Note> = {
  entityType: 'Note',
  collection: 'notes',
  versioned: true,
  text: (n) => n.title,
  indexes: [{ name: 'tag', keys: (n) => n.tags }],
};

const mkCursor = (docs: unknown[]) => {
  const cursor = {
    sort: jest.fn(),
    limit: jest.fn(),
    toArray: jest.fn().mockResolvedValue(docs),
  };
  cursor.sort.mockReturnValue(cursor);
  cursor.limit.mockReturnValue(cursor);
  return cursor;
};

const mkCollection = () => ({
  find: jest.fn(),
  findOne: jest.fn(),
  findOneAndDelete: jest.fn(),
  countDocuments: jest.fn(),
  distinct: jest.fn(),
  replaceOne: jest.fn().mockResolvedValue({ acknowledged: true }),
  deleteMany: jest.fn().mockResolvedValue({ deletedCount: 0 }),
  createIndex: jest.fn().mockResolvedValue('ok'),
});

describe('MongoEntityTable (unit)', () => {
  const id = '65a1f0c2e4b0a1b2c3d4e5f6';
  let entities: ReturnType<typeof mkCollection>;
  let versions: ReturnType<typeof mkCollection>;
  let getCollection: jest.Mock;
  let table: MongoEntityTable<Note>;

  beforeEach(() => {
    entities = mkCollection();
    versions = mkCollection();
    getCollection = jest.fn(async (name: string) => (name === 'notes_versions' ? versions : entities));
    const mongo = { getCollection } as unknown as MongodbService;
    table = new MongoEntityTable(mongo, notes);
  });

  it('pages ids within an index key', async () => {
    const cursor = mkCursor([{ _id: 'a' }, { _id: 'b' }]);
    entities.find.mockReturnValue(cursor);

    const ids = await table.readIds({ reverse: true, limit: 2, offset: '|' }, { index: 'tag', key: 'x' });

    expect(ids).toEqual(['a', 'b']);
    expect(entities.find).toHaveBeenCalledWith(
      { 'keys.tag': 'x', _id: { $lt: '|' } },
      { projection: { _id: 1 } },
    );
    expect(cursor.sort).toHaveBeenCalledWith({ _id: -1 });
    expect(cursor.limit).toHaveBeenCalledWith(2);
  });

  it('reads every text value without a limit', async () => {
    const cursor = mkCursor([{ _id: 'a', text: 'Alpha' }]);
    entities.find.mockReturnValue(cursor);

    await expect(table.readAllTextValues()).resolves.toEqual([{ id: 'a', value: 'Alpha' }]);
    expect(entities.find).toHaveBeenCalledWith({}, { projection: { _id: 1, text: 1 } });
    expect(cursor.limit).not.toHaveBeenCalled();
  });

  it('creates one index per secondary index once', async () => {
    entities.find.mockImplementation(() => mkCursor([]));
    await table.readAllIds();
    await table.readAllIds();
    expect(entities.createIndex).toHaveBeenCalledTimes(1);
    expect(entities.createIndex).toHaveBeenCalledWith({ 'keys.tag': 1, _id: 1 });
    expect(versions.createIndex).toHaveBeenCalledWith({ entityId: 1, _id: 1 });
  });

  it('writes the current state and the version', async () => {
    const note: Note = {
      id,
      createdAt: '2024-01-01T00:00:00.000Z',
      versionId: id,
      updatedAt: '2024-01-01T00:00:00.000Z',
      title: 'Hello',
      tags: ['a', ' a ', ''],
    };
    await expect(table.writeEntity(note)).resolves.toEqual(note);
    expect(entities.replaceOne).toHaveBeenCalledWith(
      { _id: id },
      { body: note, keys: { tag: ['a'] }, text: 'Hello' },
      { upsert: true },
    );
    expect(versions.replaceOne).toHaveBeenCalledWith(
      { _id: id },
      { entityId: id, body: note },
      { upsert: true },
    );
  });

  it('reports a missing entity as not found', async () => {
    entities.findOne.mockResolvedValue(null);
    await expect(table.readEntity(id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('wraps driver failures', async () => {
    entities.distinct.mockRejectedValue(new Error('socket closed'));
    const err = await table.readKeys('tag').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StoreError);
    if (err instanceof StoreError) {
      expect(err.summary()).toBe('store action failed: op=readKeys type=Note coll=notes');
    }
  });

  it('stops when the request is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(table.entityExists(id, { signal: controller.signal })).rejects.toBeInstanceOf(
      RequestAbortedError,
    );
  });

  it('drops the history with the entity', async () => {
    entities.findOneAndDelete.mockResolvedValue({ _id: id, body: { id, title: 'Hello' } });
    await expect(table.deleteEntity(id)).resolves.toEqual({ id, title: 'Hello' });
    expect(versions.deleteMany).toHaveBeenCalledWith({ entityId: id });
  });

  it('removes a single version', async () => {
    versions.findOneAndDelete.mockResolvedValue({ _id: 'v2', entityId: id, body: { id, title: 'Old' } });
    await expect(table.deleteVersion(id, 'v2')).resolves.toEqual({ id, title: 'Old' });
    expect(versions.findOneAndDelete).toHaveBeenCalledWith({ _id: 'v2', entityId: id });

    versions.findOneAndDelete.mockResolvedValue(null);
    await expect(table.deleteVersion(id, 'v3')).rejects.toBeInstanceOf(NotFoundError);
  });

  describe('expiring kinds', () => {
    interface Ticket extends StoredEntity {
      expiresAt: string;
    }

    const tickets: TableDefinition<Ticket> = {
      entityType: 'Ticket',
      collection: 'tickets',
      versioned: false,
      text: (t) => t.id,
      indexes: [],
      expiresAt: (t) => t.expiresAt,
    };

    let expiring: MongoEntityTable<Ticket>;

    beforeEach(() => {
      expiring = new MongoEntityTable({ getCollection } as unknown as MongodbService, tickets);
    });

    it('stores the expiry as a date under a TTL index', async () => {
      const ticket: Ticket = { id, createdAt: '2024-01-01T00:00:00.000Z', expiresAt: '2024-01-02T00:00:00.000Z' };
      await expiring.writeEntity(ticket);
      expect(entities.createIndex).toHaveBeenCalledWith({ expiresAt: 1 }, { expireAfterSeconds: 0 });
      expect(entities.replaceOne).toHaveBeenCalledWith(
        { _id: id },
        {
          body: ticket,
          keys: {},
          text: id,
          expiresAt: new Date('2024-01-02T00:00:00.000Z'),
        },
        { upsert: true },
      );
    });

    it('hides documents the TTL monitor has not removed yet', async () => {
      entities.findOne.mockResolvedValue(null);
      entities.find.mockImplementation(() => mkCursor([]));
      await expect(expiring.readEntity(id)).rejects.toBeInstanceOf(NotFoundError);
      await expiring.readAllIds();
      expect(entities.findOne).toHaveBeenCalledWith(
        { _id: id, expiresAt: { $gt: expect.any(Date) } },
        { projection: { body: 1 } },
      );
      expect(entities.find).toHaveBeenCalledWith(
        { expiresAt: { $gt: expect.any(Date) } },
        { projection: { _id: 1 } },
      );
    });
  });
});
