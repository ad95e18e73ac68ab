import { Body, Controller, Get, Post, Query, Res } from '@nestjs/common';
import type { Response } from 'express';
import { EntityController } from '../../lib/entities/entity.controller';
import { RequestSignal, resourceLocation } from '../../lib/http/request-context';
import type { RawQuery } from '../../lib/listing/types';
import { Audited } from '../audit/audited.decorator';
import { CreateMetricRequestDto } from './dto/CreateMetric.request.dto';
import type { Metric } from './metric.definition';
import { MetricsService } from './metrics.service';

@Audited('Metric')
@Controller('v1/metrics')
export class MetricsController extends EntityController<Metric> {
  constructor(private readonly metrics: MetricsService) {
    super(metrics);
  }

  /** Filters, highest precedence first: entity, type, tag. */
  @Get()
  async list(
    @Query() query: RawQuery,
    @RequestSignal() signal: AbortSignal,
  ): Promise<Metric[]> {
    return this.metrics.metrics.list(query, { signal });
  }

  @Post()
  async create(
    @Body() dto: CreateMetricRequestDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<Metric> {
    const metric = await this.metrics.create({
      title: dto.title,
      label: dto.label,
      entityId: dto.entityId,
      entityType: dto.entityType,
      tags: dto.tags ?? [],
      value: dto.value,
      units: dto.units.trim(),
    });
    res.location(resourceLocation('v1/metrics', metric.id));
    return metric;
  }
}
