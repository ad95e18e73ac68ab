import { Controller, Get, Query } from '@nestjs/common';
import { RequestSignal } from '../../lib/http/request-context';
import type { RawQuery, TextValue } from '../../lib/listing/types';
import { Audited } from '../audit/audited.decorator';
import { EmailsService } from './emails.service';

@Audited('Email')
@Controller('v1')
export class EmailsListingController {
  constructor(private readonly emails: EmailsService) {}

  @Get('email_subjects')
  async subjects(
    @Query() query: RawQuery,
    @RequestSignal() signal: AbortSignal,
  ): Promise<TextValue[]> {
    return this.emails.subjects.list(query, { signal });
  }

  @Get('email_addresses')
  async addresses(@RequestSignal() signal: AbortSignal): Promise<string[]> {
    return this.emails.addresses.list({ signal });
  }

  @Get('email_statuses')
  async statuses(@RequestSignal() signal: AbortSignal): Promise<string[]> {
    return this.emails.statuses.list({ signal });
  }
}
