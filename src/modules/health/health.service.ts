import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { appConfig } from '../../config/app.config';
import { MongodbService } from '../mongodb/mongodb.service';

/** `memory` when no database is in use. */
export type StoreStatus = 'up' | 'down' | 'memory';

export interface PingResult {
  ok: true;
  name: string;
  timestamp: string; // ISO-8601 timestamp
  epochMs: number;
  uptimeSec: number;
}

export interface AboutResult {
  name: string;
  env: string;
  version: string;
  node: string;
  storeDriver: string;
  storeStatus: StoreStatus;
  timestamp: string; // ISO-8601 timestamp
  uptimeSec: number;
}

@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  public constructor(
    @Inject(appConfig.KEY) private readonly cfg: ConfigType<typeof appConfig>,
    private readonly mongo: MongodbService,
  ) {}

  public ping(): PingResult {
    const now = new Date();
    return {
      ok: true,
      name: this.cfg.name,
      timestamp: now.toISOString(),
      epochMs: now.getTime(),
      uptimeSec: Math.floor(process.uptime()),
    };
  }

  public async about(): Promise<AboutResult> {
    return {
      name: this.cfg.name,
      env: this.cfg.env,
      version: this.cfg.version,
      node: process.version,
      storeDriver: this.cfg.storeDriver,
      storeStatus: await this.storeStatus(),
      timestamp: new Date().toISOString(),
      uptimeSec: Math.floor(process.uptime()),
    };
  }

  private async storeStatus(): Promise<StoreStatus> {
    if (this.cfg.storeDriver === 'memory') return 'memory';
    try {
      return (await this.mongo.ping()) ? 'up' : 'down';
    } catch (err) {
      this.logger.warn(`store ping failed: ${err instanceof Error ? err.message : String(err)}`);
      return 'down';
    }
  }
}
