import { Body, Controller, Get, Param, Post, Put, Query, Res } from '@nestjs/common';
import type { Response } from 'express';
import { VersionedEntityController } from '../../lib/entities/entity.controller';
import { ParseEntityIdPipe } from '../../lib/http/entity-id.pipe';
import { RequestSignal, resourceLocation } from '../../lib/http/request-context';
import type { EntityId } from '../../lib/ids/entity-id';
import type { RawQuery } from '../../lib/listing/types';
import { Audited } from '../audit/audited.decorator';
import { UserInputDto } from './dto/UserInput.request.dto';
import type { User } from './user.definition';
import { UsersService } from './users.service';

@Audited('User')
@Controller('v1/users')
export class UsersController extends VersionedEntityController<User> {
  constructor(private readonly users: UsersService) {
    super(users);
  }

  /** Filters, highest precedence first: email, org, role, status. */
  @Get()
  async list(
    @Query() query: RawQuery,
    @RequestSignal() signal: AbortSignal,
  ): Promise<User[]> {
    return this.users.users.list(query, { signal });
  }

  @Post()
  async create(
    @Body() dto: UserInputDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<User> {
    const user = await this.users.create(dto);
    res.location(resourceLocation('v1/users', user.id));
    return user;
  }

  @Put(':id')
  async update(
    @Param('id', ParseEntityIdPipe) id: EntityId,
    @Body() dto: UserInputDto,
  ): Promise<User> {
    return this.users.update(id, dto);
  }
}
