import { Body, Controller, Get, Post, Query, Res } from '@nestjs/common';
import type { Response } from 'express';
import { EntityController } from '../../lib/entities/entity.controller';
import { RequestSignal, resourceLocation } from '../../lib/http/request-context';
import type { RawQuery } from '../../lib/listing/types';
import type { EventRecord } from './event.definition';
import { EventsService } from './events.service';
import { CreateEventRequestDto } from './dto/CreateEvent.request.dto';

/** Events are written by the audit layer too, so these routes are not audited. */
@Controller('v1/events')
export class EventsController extends EntityController<EventRecord> {
  constructor(private readonly events: EventsService) {
    super(events);
  }

  @Get()
  async list(
    @Query() query: RawQuery,
    @RequestSignal() signal: AbortSignal,
  ): Promise<EventRecord[]> {
    return this.events.events.list(query, { signal });
  }

  @Post()
  async create(
    @Body() dto: CreateEventRequestDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<EventRecord> {
    const event = await this.events.create({
      userId: dto.userId,
      entityId: dto.entityId,
      entityType: dto.entityType,
      logLevel: dto.logLevel,
      message: dto.message,
      uri: dto.uri,
    });
    res.location(resourceLocation('v1/events', event.id));
    return event;
  }
}
