import { Controller, Get } from '@nestjs/common';
import { RequestSignal } from '../../lib/http/request-context';
import { Audited } from '../audit/audited.decorator';
import { TokensService } from './tokens.service';

@Audited('Token')
@Controller('v1')
export class TokensListingController {
  constructor(private readonly tokens: TokensService) {}

  @Get('token_user_ids')
  async userIds(@RequestSignal() signal: AbortSignal): Promise<string[]> {
    return this.tokens.userIds.list({ signal });
  }
}
