import { Controller, Get, Query } from '@nestjs/common';
import { RequestSignal } from '../../lib/http/request-context';
import type { RawQuery, TextValue } from '../../lib/listing/types';
import { Audited } from '../audit/audited.decorator';
import { UsersService } from './users.service';

@Audited('User')
@Controller('v1')
export class UsersListingController {
  constructor(private readonly users: UsersService) {}

  @Get('user_ids')
  async ids(
    @Query() query: RawQuery,
    @RequestSignal() signal: AbortSignal,
  ): Promise<string[]> {
    return this.users.readIdsByEmail(query, { signal });
  }

  @Get('user_names')
  async names(
    @Query() query: RawQuery,
    @RequestSignal() signal: AbortSignal,
  ): Promise<TextValue[]> {
    return this.users.names.list(query, { signal });
  }

  @Get('user_emails')
  async emails(@RequestSignal() signal: AbortSignal): Promise<string[]> {
    return this.users.emails.list({ signal });
  }

  @Get('user_orgs')
  async orgs(@RequestSignal() signal: AbortSignal): Promise<string[]> {
    return this.users.orgs.list({ signal });
  }

  @Get('user_roles')
  async roles(@RequestSignal() signal: AbortSignal): Promise<string[]> {
    return this.users.roles.list({ signal });
  }

  @Get('user_statuses')
  async statuses(@RequestSignal() signal: AbortSignal): Promise<string[]> {
    return this.users.statuses.list({ signal });
  }
}
