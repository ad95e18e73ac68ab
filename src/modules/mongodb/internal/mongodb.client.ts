import { MongoClient, Db, MongoClientOptions } from 'mongodb';
import {
  buildMongoUri,
  type MongoConfig,
} from '../../../infra/mongo/mongo.config';

/**
 * Lazily connected MongoDB client, owned by MongodbModule.
 * Concurrent first calls share one connect attempt; a failed attempt is
 * forgotten so the next call retries.
 */
export class MongoConnection {
  private client?: MongoClient;
  private connecting?: Promise<MongoClient>;

  public constructor(private readonly config: MongoConfig) {}

  /** Database used when callers don't pass one. */
  public get dbName(): string {
    return this.config.dbName;
  }

  /** Get (or create) a connected MongoClient instance. */
  public async getClient(): Promise<MongoClient> {
    const existing: MongoClient | undefined = this.client;
    if (existing) return existing;

    const inflight: Promise<MongoClient> | undefined = this.connecting;
    if (inflight) return inflight;

    const options: MongoClientOptions = {
      ignoreUndefined: true,
    };
    // authSource=admin; the entity database is selected via db(name)
    const uri = buildMongoUri(this.config, 'admin');

    const connectPromise: Promise<MongoClient> = (async () => {
      const created = new MongoClient(uri, options);
      await created.connect();
      this.client = created;
      this.connecting = undefined;
      return created;
    })();

    this.connecting = connectPromise;

    try {
      return await connectPromise;
    } catch (err) {
      this.connecting = undefined;
      this.client = undefined;

      if (err instanceof Error) {
        throw err;
      }
      throw new Error('Failed to connect to MongoDB');
    }
  }

  public async getDb(dbName: string = this.dbName): Promise<Db> {
    const client: MongoClient = await this.getClient();
    return client.db(dbName);
  }

  /** Close client if connected (idempotent). */
  public async close(): Promise<void> {
    const current: MongoClient | undefined = this.client;
    if (!current) return;
    this.client = undefined;
    this.connecting = undefined;
    await current.close();
  }
}
