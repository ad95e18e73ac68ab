import { Body, Controller, Get, Headers, Param, Post, Put, Query, Res } from '@nestjs/common';
import type { Response } from 'express';
import { VersionedEntityController } from '../../lib/entities/entity.controller';
import { ParseEntityIdPipe } from '../../lib/http/entity-id.pipe';
import { RequestSignal, resourceLocation } from '../../lib/http/request-context';
import type { EntityId } from '../../lib/ids/entity-id';
import type { RawQuery } from '../../lib/listing/types';
import { Audited } from '../audit/audited.decorator';
import type { Device } from './device.definition';
import { DevicesService } from './devices.service';
import { DeviceInputDto } from './dto/DeviceInput.request.dto';

@Audited('Device')
@Controller('v1/devices')
export class DevicesController extends VersionedEntityController<Device> {
  constructor(private readonly devices: DevicesService) {
    super(devices);
  }

  @Get()
  async list(
    @Query() query: RawQuery,
    @RequestSignal() signal: AbortSignal,
  ): Promise<Device[]> {
    return this.devices.devices.list(query, { signal });
  }

  @Post()
  async create(
    @Body() dto: DeviceInputDto,
    @Headers('user-agent') userAgent: string | undefined,
    @Res({ passthrough: true }) res: Response,
  ): Promise<Device> {
    const device = await this.devices.create({
      userId: dto.userId,
      userAgent: dto.userAgent || userAgent,
    });
    res.location(resourceLocation('v1/devices', device.id));
    return device;
  }

  @Put(':id')
  async update(
    @Param('id', ParseEntityIdPipe) id: EntityId,
    @Body() dto: DeviceInputDto,
  ): Promise<Device> {
    return this.devices.update(id, dto);
  }
}
