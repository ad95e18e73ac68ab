import { Injectable } from '@nestjs/common';
import { EntityService } from '../../lib/entities/entity.service';
import { entityListing, type Listing } from '../../lib/listing/listing';
import { isIsoDate } from '../../lib/listing/filters';
import type { ListingContext } from '../../lib/listing/types';
import { EntityStore } from '../store/store.types';
import type { Device } from './device.definition';
import { deviceCountTable, type DeviceCount } from './device-count.definition';
import { DevicesService } from './devices.service';

/** Daily device tallies, rebuilt on demand from the devices' date index. */
@Injectable()
export class DeviceCountsService extends EntityService<DeviceCount> {
  readonly counts: Listing<DeviceCount>;

  constructor(
    store: EntityStore,
    private readonly devices: DevicesService,
  ) {
    super(store, deviceCountTable);
    this.counts = entityListing(this.table, {
      name: 'device_counts',
      filters: [],
      defaultLimit: 100,
    });
  }

  /** Recounts the devices last seen on `date` and stores the result. */
  async update(date: string, ctx?: ListingContext, now = new Date()): Promise<DeviceCount> {
    const devices = await this.devices.readAllByDate(date, ctx);
    return this.save({
      ...countDevices(date, devices),
      id: date,
      createdAt: now.toISOString(),
    });
  }

  protected validate(c: DeviceCount): string[] {
    const problems: string[] = [];
    if (!isIsoDate(c.date) || c.id !== c.date) problems.push('Date is missing or invalid');
    if (!Number.isInteger(c.total) || c.total < 0) problems.push('Total is invalid');
    return problems;
  }
}

export function countDevices(
  date: string,
  devices: ReadonlyArray<Device>,
): Pick<DeviceCount, 'date' | 'total' | 'users' | 'userAgents'> {
  const userAgents: Record<string, number> = {};
  let users = 0;
  for (const d of devices) {
    if (d.userId) users++;
    userAgents[d.userAgent] = (userAgents[d.userAgent] ?? 0) + 1;
  }
  return { date, total: devices.length, users, userAgents };
}
