import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { appConfig } from '../../config/app.config';
import { EntityService } from '../../lib/entities/entity.service';
import { isEntityId } from '../../lib/ids/entity-id';
import { dateFilter, enumFilter, idFilter, keyFilter } from '../../lib/listing/filters';
import { entityListing, keyListing, type KeyListing, type Listing } from '../../lib/listing/listing';
import { EntityStore } from '../store/store.types';
import {
  eventTable,
  LOG_LEVELS,
  type EventRecord,
  type NewEvent,
} from './event.definition';

const DAY_MS = 24 * 60 * 60 * 1000;

@Injectable()
export class EventsService extends EntityService<EventRecord> {
  readonly events: Listing<EventRecord>;
  readonly entityIds: KeyListing<EventRecord>;
  readonly entityTypes: KeyListing<EventRecord>;
  readonly logLevels: KeyListing<EventRecord>;
  readonly dates: KeyListing<EventRecord>;

  private readonly ttlMs: number;

  constructor(
    store: EntityStore,
    @Inject(appConfig.KEY) cfg: ConfigType<typeof appConfig>,
  ) {
    super(store, eventTable);
    this.ttlMs = cfg.eventTtlDays * DAY_MS;
    this.events = entityListing(
      this.table,
      {
        name: 'events',
        filters: [
          idFilter('entity'),
          keyFilter('type'),
          enumFilter('log_level', LOG_LEVELS),
          dateFilter('date'),
        ],
        defaultLimit: 100,
      },
      { concurrency: cfg.fanoutConcurrency },
    );
    this.entityIds = keyListing(this.table, 'entity');
    this.entityTypes = keyListing(this.table, 'type');
    this.logLevels = keyListing(this.table, 'log_level');
    this.dates = keyListing(this.table, 'date');
  }

  async create(input: NewEvent, now = new Date()): Promise<EventRecord> {
    const { id, createdAt } = this.newStamps(now);
    return this.save({
      ...input,
      id,
      createdAt,
      expiresAt: new Date(now.getTime() + this.ttlMs).toISOString(),
    });
  }

  protected validate(e: EventRecord): string[] {
    const problems: string[] = [];
    if (e.userId && !isEntityId(e.userId)) problems.push('UserID is invalid');
    if (e.entityId && !isEntityId(e.entityId)) problems.push('EntityID is invalid');
    if (!LOG_LEVELS.includes(e.logLevel)) problems.push('LogLevel is invalid');
    if (!e.message.trim()) problems.push('Message is missing');
    return problems;
  }
}
