import { Injectable, OnModuleDestroy } from '@nestjs/common';
import type { Db, Document, Collection } from 'mongodb';
import { MongoConnection } from './internal/mongodb.client';
import { isNonEmptyString } from './internal/mongodb.types';
import { StoreError } from '../../lib/errors/StoreError';

@Injectable()
export class MongodbService implements OnModuleDestroy {
  public constructor(private readonly connection: MongoConnection) {}

  /**
   * Returns a connected native driver Db handle.
   * Defaults to MONGO_DB_NAME when not provided.
   */
  public async getDb(dbName?: string): Promise<Db> {
    const name: string = dbName ?? this.connection.dbName;
    try {
      return await this.connection.getDb(name);
    } catch (err) {
      throw StoreError.wrap(err, {
        operation: 'connect',
        argsPreview: { dbName: name },
      });
    }
  }

  /** Native driver Collection<T>; no schema enforcement here. */
  public async getCollection<T extends Document = Document>(
    collection: string,
    dbName?: string,
  ): Promise<Collection<T>> {
    if (!isNonEmptyString(collection)) {
      throw new StoreError('Collection name must be a non-empty string', {
        operation: 'getCollection',
        argsPreview: { collection: String(collection) },
      });
    }
    const db: Db = await this.getDb(dbName);
    return db.collection<T>(collection);
  }

  /** Round-trips a ping against the database. */
  public async ping(dbName?: string): Promise<boolean> {
    const db: Db = await this.getDb(dbName);
    try {
      const res = await db.command({ ping: 1 });
      return res.ok === 1;
    } catch (err) {
      throw StoreError.wrap(err, { operation: 'ping' });
    }
  }

  /** Graceful shutdown for local runs/tests. */
  public async onModuleDestroy(): Promise<void> {
    await this.connection.close();
  }
}
