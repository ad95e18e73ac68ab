import { registerAs } from '@nestjs/config';
import { readBool, readChoice, readPositiveInt, readString } from './env';

export const STORE_DRIVERS = ['mongo', 'memory'] as const;
export type StoreDriver = (typeof STORE_DRIVERS)[number];

export interface AppConfig {
  readonly port: number;
  readonly name: string;
  /** Deployment environment label, e.g. dev, staging, prod. */
  readonly env: string;
  readonly version: string;
  readonly storeDriver: StoreDriver;
  /** Cap on concurrent body loads in one unfiltered listing. */
  readonly fanoutConcurrency: number;
  readonly tokenTtlHours: number;
  readonly eventTtlDays: number;
  readonly auditEnabled: boolean;
}

export const APP_DEFAULTS: Readonly<AppConfig> = {
  port: 3000,
  name: 'versioned-entities-api',
  env: 'dev',
  version: '0.1.0',
  storeDriver: 'mongo',
  fanoutConcurrency: 16,
  tokenTtlHours: 168,
  eventTtlDays: 90,
  auditEnabled: true,
};

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: readPositiveInt(env.PORT, APP_DEFAULTS.port, 65535),
    name: readString(env.APP_NAME, APP_DEFAULTS.name),
    env: readString(env.APP_ENV, APP_DEFAULTS.env),
    version: readString(env.APP_VERSION, APP_DEFAULTS.version),
    storeDriver: readChoice(env.STORE_DRIVER, STORE_DRIVERS, APP_DEFAULTS.storeDriver),
    fanoutConcurrency: readPositiveInt(
      env.FANOUT_CONCURRENCY,
      APP_DEFAULTS.fanoutConcurrency,
    ),
    tokenTtlHours: readPositiveInt(env.TOKEN_TTL_HOURS, APP_DEFAULTS.tokenTtlHours),
    eventTtlDays: readPositiveInt(env.EVENT_TTL_DAYS, APP_DEFAULTS.eventTtlDays),
    auditEnabled: readBool(env.AUDIT_ENABLED, APP_DEFAULTS.auditEnabled),
  };
}

/** Injected with `@Inject(appConfig.KEY) cfg: ConfigType<typeof appConfig>`. */
export const appConfig = registerAs('app', () => loadAppConfig());
