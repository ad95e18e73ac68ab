import { Controller, Get, Query } from '@nestjs/common';
import { RequestSignal } from '../../lib/http/request-context';
import type { RawQuery, TextValue } from '../../lib/listing/types';
import { Audited } from '../audit/audited.decorator';
import { ContentsService } from './contents.service';

@Audited('Content')
@Controller('v1')
export class ContentsListingController {
  constructor(private readonly contents: ContentsService) {}

  /**
   * Titles filtered by type, author, editor or tag (first one supplied
   * wins). Without limit or with sorted=true, every matching title.
   */
  @Get('content_titles')
  async titles(
    @Query() query: RawQuery,
    @RequestSignal() signal: AbortSignal,
  ): Promise<TextValue[]> {
    return this.contents.titles.list(query, { signal });
  }

  @Get('content_types')
  async types(@RequestSignal() signal: AbortSignal): Promise<string[]> {
    return this.contents.types.list({ signal });
  }

  @Get('content_authors')
  async authors(@RequestSignal() signal: AbortSignal): Promise<string[]> {
    return this.contents.authors.list({ signal });
  }

  @Get('content_tags')
  async tags(@RequestSignal() signal: AbortSignal): Promise<string[]> {
    return this.contents.tags.list({ signal });
  }
}
