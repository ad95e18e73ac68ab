import { Controller, Get, Query } from '@nestjs/common';
import { RequestSignal } from '../../lib/http/request-context';
import type { RawQuery, TextValue } from '../../lib/listing/types';
import { Audited } from '../audit/audited.decorator';
import type { MetricStat } from './metric.stats';
import { MetricsService } from './metrics.service';

@Audited('Metric')
@Controller('v1')
export class MetricsListingController {
  constructor(private readonly metrics: MetricsService) {}

  @Get('metric_labels')
  async labels(
    @Query() query: RawQuery,
    @RequestSignal() signal: AbortSignal,
  ): Promise<TextValue[]> {
    return this.metrics.labels.list(query, { signal });
  }

  /** Requires one of entity, type or tag; from/to bound the range by day. */
  @Get('metric_stats')
  async stats(
    @Query() query: RawQuery,
    @RequestSignal() signal: AbortSignal,
  ): Promise<MetricStat> {
    return this.metrics.stats(query, { signal });
  }

  @Get('metric_entity_ids')
  async entityIds(@RequestSignal() signal: AbortSignal): Promise<string[]> {
    return this.metrics.entityIds.list({ signal });
  }

  @Get('metric_entity_types')
  async entityTypes(@RequestSignal() signal: AbortSignal): Promise<string[]> {
    return this.metrics.entityTypes.list({ signal });
  }

  @Get('metric_tags')
  async tags(@RequestSignal() signal: AbortSignal): Promise<string[]> {
    return this.metrics.tags.list({ signal });
  }
}
