import { readPositiveInt, readString } from '../../config/env';

export const ENV_MONGO_HOST = 'MONGO_HOST';
export const ENV_MONGO_PORT = 'MONGO_PORT';
export const ENV_MONGO_ROOT_USERNAME = 'MONGO_ROOT_USERNAME';
export const ENV_MONGO_ROOT_PASSWORD = 'MONGO_ROOT_PASSWORD';
export const ENV_MONGO_DB_NAME = 'MONGO_DB_NAME';

export interface MongoConfig {
  readonly host: string;
  readonly port: number;
  readonly rootUsername: string;
  readonly rootPassword: string;
  /** Database holding every entity collection. */
  readonly dbName: string;
}

export const MONGO_DEFAULTS: Readonly<MongoConfig> = {
  host: '127.0.0.1',
  port: 27017,
  rootUsername: 'entities_root',
  rootPassword: 'entities_root_dev', // dev-only fallback; override via env
  dbName: 'entities',
};

/**
 * Load Mongo connection settings from process.env.
 * Never throws; always returns a complete config with defaults.
 */
export function loadMongoConfig(env: NodeJS.ProcessEnv = process.env): MongoConfig {
  return {
    host: readString(env[ENV_MONGO_HOST], MONGO_DEFAULTS.host),
    port: readPositiveInt(env[ENV_MONGO_PORT], MONGO_DEFAULTS.port, 65535),
    rootUsername: readString(env[ENV_MONGO_ROOT_USERNAME], MONGO_DEFAULTS.rootUsername),
    rootPassword: readString(env[ENV_MONGO_ROOT_PASSWORD], MONGO_DEFAULTS.rootPassword),
    dbName: readString(env[ENV_MONGO_DB_NAME], MONGO_DEFAULTS.dbName),
  };
}

/** Formats the URI; does not connect. */
export function buildMongoUri(cfg: MongoConfig, dbName = 'admin'): string {
  const u = encodeURIComponent(cfg.rootUsername);
  const p = encodeURIComponent(cfg.rootPassword);
  return `mongodb://${u}:${p}@${cfg.host}:${cfg.port}/${dbName}?authSource=admin&directConnection=true`;
}
