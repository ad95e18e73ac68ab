import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { appConfig } from '../../config/app.config';
import { EntityService } from '../../lib/entities/entity.service';
import { isEntityId, type EntityId } from '../../lib/ids/entity-id';
import { dateFilter, idFilter } from '../../lib/listing/filters';
import {
  entityListing,
  keyListing,
  textListing,
  type KeyListing,
  type Listing,
} from '../../lib/listing/listing';
import type { ListingContext, TextValue } from '../../lib/listing/types';
import { EntityStore } from '../store/store.types';
import { deviceTable, type Device } from './device.definition';

export interface DeviceInput {
  id?: string;
  userId?: EntityId;
  userAgent?: string;
}

@Injectable()
export class DevicesService extends EntityService<Device> {
  readonly devices: Listing<Device>;
  readonly agents: Listing<TextValue>;
  readonly userIds: KeyListing<Device>;
  readonly dates: KeyListing<Device>;

  constructor(
    store: EntityStore,
    @Inject(appConfig.KEY) cfg: ConfigType<typeof appConfig>,
  ) {
    super(store, deviceTable);
    this.devices = entityListing(
      this.table,
      { name: 'devices', filters: [idFilter('user'), dateFilter('date')], defaultLimit: 100 },
      { concurrency: cfg.fanoutConcurrency },
    );
    this.agents = textListing(this.table, { name: 'device_agents', filters: [] });
    this.userIds = keyListing(this.table, 'user');
    this.dates = keyListing(this.table, 'date');
  }

  async create(input: DeviceInput, now = new Date()): Promise<Device> {
    const stamps = this.newStamps(now);
    return this.save({
      ...stamps,
      lastSeenAt: stamps.createdAt,
      userId: input.userId,
      userAgent: input.userAgent?.trim() ?? '',
    });
  }

  /** Records a sighting; the agent and user are kept unless supplied. */
  async update(id: EntityId, input: DeviceInput, now = new Date()): Promise<Device> {
    this.checkBodyId(id, input.id);
    const existing = await this.read(id);
    const stamps = this.nextStamps(existing, now);
    return this.save({
      ...stamps,
      lastSeenAt: stamps.updatedAt,
      userId: input.userId ?? existing.userId,
      userAgent: input.userAgent?.trim() || existing.userAgent,
    });
  }

  /** Every device whose last sighting fell on `date` (YYYY-MM-DD). */
  async readAllByDate(date: string, ctx?: ListingContext): Promise<Device[]> {
    return this.table.readAllEntities({ index: 'date', key: date }, ctx);
  }

  protected validate(d: Device): string[] {
    const problems: string[] = [];
    if (d.userId && !isEntityId(d.userId)) problems.push('UserID is invalid');
    if (!d.userAgent) problems.push('UserAgent is missing');
    return problems;
  }
}
