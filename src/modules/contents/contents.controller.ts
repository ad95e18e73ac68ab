import { Body, Controller, Get, Param, Post, Put, Query, Res } from '@nestjs/common';
import type { Response } from 'express';
import { VersionedEntityController } from '../../lib/entities/entity.controller';
import { ParseEntityIdPipe } from '../../lib/http/entity-id.pipe';
import { RequestSignal, resourceLocation } from '../../lib/http/request-context';
import type { EntityId } from '../../lib/ids/entity-id';
import type { RawQuery } from '../../lib/listing/types';
import { Audited } from '../audit/audited.decorator';
import type { Content } from './content.definition';
import { ContentsService } from './contents.service';
import { ContentInputDto } from './dto/ContentInput.request.dto';

@Audited('Content')
@Controller('v1/contents')
export class ContentsController extends VersionedEntityController<Content> {
  constructor(private readonly contents: ContentsService) {
    super(contents);
  }

  /** Newest-first with ?reverse=true; 20 per page unless limit is given. */
  @Get()
  async list(
    @Query() query: RawQuery,
    @RequestSignal() signal: AbortSignal,
  ): Promise<Content[]> {
    return this.contents.contents.list(query, { signal });
  }

  @Post()
  async create(
    @Body() dto: ContentInputDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<Content> {
    const content = await this.contents.create(dto);
    res.location(resourceLocation('v1/contents', content.id));
    return content;
  }

  @Put(':id')
  async update(
    @Param('id', ParseEntityIdPipe) id: EntityId,
    @Body() dto: ContentInputDto,
  ): Promise<Content> {
    return this.contents.update(id, dto);
  }
}
