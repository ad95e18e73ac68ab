import { Body, Controller, Get, Post, Query, Res } from '@nestjs/common';
import type { Response } from 'express';
import { EntityController } from '../../lib/entities/entity.controller';
import { RequestSignal, resourceLocation } from '../../lib/http/request-context';
import type { RawQuery } from '../../lib/listing/types';
import { Audited } from '../audit/audited.decorator';
import { CreateTokenRequestDto } from './dto/CreateToken.request.dto';
import type { Token } from './token.definition';
import { TokensService } from './tokens.service';

@Audited('Token')
@Controller('v1/tokens')
export class TokensController extends EntityController<Token> {
  constructor(private readonly tokens: TokensService) {
    super(tokens);
  }

  @Get()
  async list(
    @Query() query: RawQuery,
    @RequestSignal() signal: AbortSignal,
  ): Promise<Token[]> {
    return this.tokens.tokens.list(query, { signal });
  }

  @Post()
  async create(
    @Body() dto: CreateTokenRequestDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<Token> {
    const token = await this.tokens.create(dto.userId);
    res.location(resourceLocation('v1/tokens', token.id));
    return token;
  }
}
