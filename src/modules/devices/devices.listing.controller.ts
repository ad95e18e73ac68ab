import { Controller, Get, Query } from '@nestjs/common';
import { RequestSignal } from '../../lib/http/request-context';
import type { RawQuery, TextValue } from '../../lib/listing/types';
import { Audited } from '../audit/audited.decorator';
import { DevicesService } from './devices.service';

@Audited('Device')
@Controller('v1')
export class DevicesListingController {
  constructor(private readonly devices: DevicesService) {}

  @Get('device_agents')
  async agents(
    @Query() query: RawQuery,
    @RequestSignal() signal: AbortSignal,
  ): Promise<TextValue[]> {
    return this.devices.agents.list(query, { signal });
  }

  @Get('device_user_ids')
  async userIds(@RequestSignal() signal: AbortSignal): Promise<string[]> {
    return this.devices.userIds.list({ signal });
  }

  @Get('device_dates')
  async dates(@RequestSignal() signal: AbortSignal): Promise<string[]> {
    return this.devices.dates.list({ signal });
  }
}
