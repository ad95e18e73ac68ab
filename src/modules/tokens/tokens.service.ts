import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { appConfig } from '../../config/app.config';
import { UnprocessableEntityError } from '../../lib/errors/RequestErrors';
import { EntityService } from '../../lib/entities/entity.service';
import { isEntityId, type EntityId } from '../../lib/ids/entity-id';
import { idFilter } from '../../lib/listing/filters';
import { entityListing, keyListing, type KeyListing, type Listing } from '../../lib/listing/listing';
import { EntityStore } from '../store/store.types';
import { UsersService } from '../users/users.service';
import { tokenTable, type Token } from './token.definition';

const HOUR_MS = 60 * 60 * 1000;

/** Bearer tokens issued to users. The table hides a token once it expires. */
@Injectable()
export class TokensService extends EntityService<Token> {
  readonly tokens: Listing<Token>;
  readonly userIds: KeyListing<Token>;

  private readonly ttlMs: number;

  constructor(
    store: EntityStore,
    private readonly users: UsersService,
    @Inject(appConfig.KEY) cfg: ConfigType<typeof appConfig>,
  ) {
    super(store, tokenTable);
    this.ttlMs = cfg.tokenTtlHours * HOUR_MS;
    this.tokens = entityListing(
      this.table,
      { name: 'tokens', filters: [idFilter('user')], defaultLimit: 100 },
      { concurrency: cfg.fanoutConcurrency },
    );
    this.userIds = keyListing(this.table, 'user');
  }

  async create(userId: EntityId, now = new Date()): Promise<Token> {
    if (!(await this.users.exists(userId))) {
      throw new UnprocessableEntityError(this.entityType, [`User ${userId} not found`]);
    }
    const user = await this.users.read(userId);
    if (user.status === 'DISABLED') {
      throw new UnprocessableEntityError(this.entityType, [`User ${userId} is disabled`]);
    }
    const { id, createdAt } = this.newStamps(now);
    return this.save({
      id,
      createdAt,
      expiresAt: new Date(now.getTime() + this.ttlMs).toISOString(),
      userId,
      email: user.email,
    });
  }

  protected validate(t: Token): string[] {
    const problems: string[] = [];
    if (!isEntityId(t.userId)) problems.push('UserID is missing or invalid');
    if (Number.isNaN(new Date(t.expiresAt).getTime())) problems.push('ExpiresAt is missing');
    return problems;
  }
}
