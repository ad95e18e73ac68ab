import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { appConfig } from '../../config/app.config';
import { MissingParameterError, NotFoundError } from '../../lib/errors/RequestErrors';
import { EntityService } from '../../lib/entities/entity.service';
import { firstEntityIdAt, isEntityId } from '../../lib/ids/entity-id';
import { MAX_CURSOR, MIN_CURSOR } from '../../lib/listing/cursor';
import { selectIndex, type ListingFilter } from '../../lib/listing/dispatcher';
import { dateParam, idFilter, keyFilter } from '../../lib/listing/filters';
import {
  entityListing,
  keyListing,
  textListing,
  type KeyListing,
  type Listing,
} from '../../lib/listing/listing';
import type { IndexRef, ListingContext, RawQuery, TextValue } from '../../lib/listing/types';
import { EntityStore } from '../store/store.types';
import { metricTable, type Metric, type NewMetric } from './metric.definition';
import { calculateStats, type MetricStat, type MetricStatSubject } from './metric.stats';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Point measurements; they share the event retention period. */
@Injectable()
export class MetricsService extends EntityService<Metric> {
  readonly metrics: Listing<Metric>;
  readonly labels: Listing<TextValue>;
  readonly entityIds: KeyListing<Metric>;
  readonly entityTypes: KeyListing<Metric>;
  readonly tags: KeyListing<Metric>;

  private readonly ttlMs: number;
  private readonly filters: ReadonlyArray<ListingFilter>;

  constructor(
    store: EntityStore,
    @Inject(appConfig.KEY) cfg: ConfigType<typeof appConfig>,
  ) {
    super(store, metricTable);
    this.ttlMs = cfg.eventTtlDays * DAY_MS;
    const filters = [idFilter('entity'), keyFilter('type'), keyFilter('tag')];
    this.filters = filters;
    this.metrics = entityListing(
      this.table,
      { name: 'metrics', filters, defaultLimit: 100 },
      { concurrency: cfg.fanoutConcurrency },
    );
    this.labels = textListing(this.table, { name: 'metric_labels', filters });
    this.entityIds = keyListing(this.table, 'entity');
    this.entityTypes = keyListing(this.table, 'type');
    this.tags = keyListing(this.table, 'tag');
  }

  async create(input: NewMetric, now = new Date()): Promise<Metric> {
    const { id, createdAt } = this.newStamps(now);
    return this.save({
      ...input,
      title: input.title.trim(),
      label: input.label?.trim() || undefined,
      tags: [...new Set(input.tags.map((t) => t.trim()).filter((t) => t))],
      id,
      createdAt,
      expiresAt: new Date(now.getTime() + this.ttlMs).toISOString(),
    });
  }

  /**
   * Statistics over the metrics of one entity, entity type or tag (same
   * precedence as the listing), optionally bounded by `from` (inclusive) and
   * `to` (exclusive) calendar days.
   */
  async stats(query: RawQuery, ctx?: ListingContext): Promise<MetricStat> {
    const index = selectIndex(this.filters, query);
    const from = dateParam(query, 'from');
    const to = dateParam(query, 'to');
    if (!index) throw new MissingParameterError(['entity', 'type', 'tag']);

    const lo = from ? firstEntityIdAt(new Date(`${from}T00:00:00Z`)) : MIN_CURSOR;
    const hi = to ? firstEntityIdAt(new Date(`${to}T00:00:00Z`)) : MAX_CURSOR;
    const metrics = (await this.table.readAllEntities(index, ctx)).filter(
      (m) => m.id >= lo && m.id < hi,
    );
    const stat = calculateStats(metrics, statSubject(index));
    if (!stat) throw new NotFoundError('MetricStat', `${index.index} ${index.key}`);
    return stat;
  }

  protected validate(m: Metric): string[] {
    const problems: string[] = [];
    if (!m.title) problems.push('Title is missing');
    if (m.entityId && !isEntityId(m.entityId)) problems.push('EntityID is not a valid entity id');
    if (!Number.isFinite(m.value)) problems.push('Value is missing');
    if (!m.units) problems.push('Units are missing');
    return problems;
  }
}

function statSubject(index: IndexRef): MetricStatSubject {
  if (index.index === 'entity') return { entityId: index.key };
  if (index.index === 'type') return { entityType: index.key };
  return { tag: index.key };
}
