import {
  Controller,
  Get,
  Head,
  HttpCode,
  HttpStatus,
  Param,
  Put,
  Query,
} from '@nestjs/common';
import { NotFoundError } from '../../lib/errors/RequestErrors';
import { ParseIsoDatePipe } from '../../lib/http/iso-date.pipe';
import { RequestSignal } from '../../lib/http/request-context';
import type { RawQuery } from '../../lib/listing/types';
import { Audited } from '../audit/audited.decorator';
import type { DeviceCount } from './device-count.definition';
import { DeviceCountsService } from './device-counts.service';

@Audited('DeviceCount')
@Controller('v1/device_counts')
export class DeviceCountsController {
  constructor(private readonly counts: DeviceCountsService) {}

  /** Chronological by date; `offset` is the last date already seen. */
  @Get()
  async list(
    @Query() query: RawQuery,
    @RequestSignal() signal: AbortSignal,
  ): Promise<DeviceCount[]> {
    return this.counts.counts.list(query, { signal });
  }

  @Head(':date')
  @HttpCode(HttpStatus.NO_CONTENT)
  async exists(
    @Param('date', ParseIsoDatePipe) date: string,
    @RequestSignal() signal: AbortSignal,
  ): Promise<void> {
    if (!(await this.counts.exists(date, { signal }))) {
      throw new NotFoundError(this.counts.entityType, date);
    }
  }

  @Get(':date')
  async read(
    @Param('date', ParseIsoDatePipe) date: string,
    @RequestSignal() signal: AbortSignal,
  ): Promise<DeviceCount> {
    return this.counts.read(date, { signal });
  }

  @Put(':date')
  async update(
    @Param('date', ParseIsoDatePipe) date: string,
    @RequestSignal() signal: AbortSignal,
  ): Promise<DeviceCount> {
    return this.counts.update(date, { signal });
  }
}
