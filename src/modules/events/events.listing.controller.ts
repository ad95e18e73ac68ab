import { Controller, Get } from '@nestjs/common';
import { RequestSignal } from '../../lib/http/request-context';
import { EventsService } from './events.service';

@Controller('v1')
export class EventsListingController {
  constructor(private readonly events: EventsService) {}

  @Get('event_entity_ids')
  async entityIds(@RequestSignal() signal: AbortSignal): Promise<string[]> {
    return this.events.entityIds.list({ signal });
  }

  @Get('event_entity_types')
  async entityTypes(@RequestSignal() signal: AbortSignal): Promise<string[]> {
    return this.events.entityTypes.list({ signal });
  }

  @Get('event_log_levels')
  async logLevels(@RequestSignal() signal: AbortSignal): Promise<string[]> {
    return this.events.logLevels.list({ signal });
  }

  @Get('event_dates')
  async dates(@RequestSignal() signal: AbortSignal): Promise<string[]> {
    return this.events.dates.list({ signal });
  }
}
