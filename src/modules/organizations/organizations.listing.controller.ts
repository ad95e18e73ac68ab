import { Controller, Get, Query } from '@nestjs/common';
import { RequestSignal } from '../../lib/http/request-context';
import type { RawQuery, TextValue } from '../../lib/listing/types';
import { Audited } from '../audit/audited.decorator';
import { OrganizationsService } from './organizations.service';

@Audited('Organization')
@Controller('v1')
export class OrganizationsListingController {
  constructor(private readonly organizations: OrganizationsService) {}

  @Get('organization_names')
  async names(
    @Query() query: RawQuery,
    @RequestSignal() signal: AbortSignal,
  ): Promise<TextValue[]> {
    return this.organizations.names.list(query, { signal });
  }

  @Get('organization_statuses')
  async statuses(@RequestSignal() signal: AbortSignal): Promise<string[]> {
    return this.organizations.statuses.list({ signal });
  }
}
