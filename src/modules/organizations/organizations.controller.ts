import { Body, Controller, Get, Param, Post, Put, Query, Res } from '@nestjs/common';
import type { Response } from 'express';
import { VersionedEntityController } from '../../lib/entities/entity.controller';
import { ParseEntityIdPipe } from '../../lib/http/entity-id.pipe';
import { RequestSignal, resourceLocation } from '../../lib/http/request-context';
import type { EntityId } from '../../lib/ids/entity-id';
import type { RawQuery } from '../../lib/listing/types';
import { Audited } from '../audit/audited.decorator';
import { OrganizationInputDto } from './dto/OrganizationInput.request.dto';
import type { Organization } from './organization.definition';
import { OrganizationsService } from './organizations.service';

@Audited('Organization')
@Controller('v1/organizations')
export class OrganizationsController extends VersionedEntityController<Organization> {
  constructor(private readonly organizations: OrganizationsService) {
    super(organizations);
  }

  @Get()
  async list(
    @Query() query: RawQuery,
    @RequestSignal() signal: AbortSignal,
  ): Promise<Organization[]> {
    return this.organizations.organizations.list(query, { signal });
  }

  @Post()
  async create(
    @Body() dto: OrganizationInputDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<Organization> {
    const org = await this.organizations.create(dto);
    res.location(resourceLocation('v1/organizations', org.id));
    return org;
  }

  @Put(':id')
  async update(
    @Param('id', ParseEntityIdPipe) id: EntityId,
    @Body() dto: OrganizationInputDto,
  ): Promise<Organization> {
    return this.organizations.update(id, dto);
  }
}
