import { Body, Controller, Get, Param, Post, Put, Query, Res } from '@nestjs/common';
import type { Response } from 'express';
import { VersionedEntityController } from '../../lib/entities/entity.controller';
import { ParseEntityIdPipe } from '../../lib/http/entity-id.pipe';
import { RequestSignal, resourceLocation } from '../../lib/http/request-context';
import type { EntityId } from '../../lib/ids/entity-id';
import type { RawQuery } from '../../lib/listing/types';
import { Audited } from '../audit/audited.decorator';
import { EmailInputDto } from './dto/EmailInput.request.dto';
import type { Email } from './email.definition';
import { EmailsService } from './emails.service';

@Audited('Email')
@Controller('v1/emails')
export class EmailsController extends VersionedEntityController<Email> {
  constructor(private readonly emails: EmailsService) {
    super(emails);
  }

  @Get()
  async list(
    @Query() query: RawQuery,
    @RequestSignal() signal: AbortSignal,
  ): Promise<Email[]> {
    return this.emails.emails.list(query, { signal });
  }

  @Post()
  async create(
    @Body() dto: EmailInputDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<Email> {
    const email = await this.emails.create(dto);
    res.location(resourceLocation('v1/emails', email.id));
    return email;
  }

  @Put(':id')
  async update(
    @Param('id', ParseEntityIdPipe) id: EntityId,
    @Body() dto: EmailInputDto,
  ): Promise<Email> {
    return this.emails.update(id, dto);
  }
}
