import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { appConfig } from '../../config/app.config';
import { MissingParameterError, UnprocessableEntityError } from '../../lib/errors/RequestErrors';
import { EntityService, type EntityStamps } from '../../lib/entities/entity.service';
import { isEntityId, type EntityId } from '../../lib/ids/entity-id';
import { selectIndex } from '../../lib/listing/dispatcher';
import { emailFilter, enumFilter, idFilter, keyFilter, isEmailAddress } from '../../lib/listing/filters';
import {
  entityListing,
  keyListing,
  textListing,
  type KeyListing,
  type Listing,
} from '../../lib/listing/listing';
import type { ListingContext, RawQuery, TextValue } from '../../lib/listing/types';
import { EntityStore } from '../store/store.types';
import type { UserInputDto } from './dto/UserInput.request.dto';
import {
  standardizeEmail,
  USER_STATUSES,
  userTable,
  type User,
} from './user.definition';

@Injectable()
export class UsersService extends EntityService<User> {
  readonly users: Listing<User>;
  readonly names: Listing<TextValue>;
  readonly emails: KeyListing<User>;
  readonly orgs: KeyListing<User>;
  readonly roles: KeyListing<User>;
  readonly statuses: KeyListing<User>;

  constructor(
    store: EntityStore,
    @Inject(appConfig.KEY) cfg: ConfigType<typeof appConfig>,
  ) {
    super(store, userTable);
    const filters = [
      emailFilter('email'),
      idFilter('org'),
      keyFilter('role'),
      enumFilter('status', USER_STATUSES),
    ];
    this.users = entityListing(
      this.table,
      { name: 'users', filters, defaultLimit: 100 },
      { concurrency: cfg.fanoutConcurrency },
    );
    this.names = textListing(this.table, { name: 'user_names', filters });
    this.emails = keyListing(this.table, 'email');
    this.orgs = keyListing(this.table, 'org');
    this.roles = keyListing(this.table, 'role');
    this.statuses = keyListing(this.table, 'status');
  }

  async create(input: UserInputDto): Promise<User> {
    const user = this.build(input, this.newStamps(), 'PENDING');
    await this.checkEmailFree(user.email);
    return this.save(user);
  }

  async update(id: EntityId, input: UserInputDto): Promise<User> {
    this.checkBodyId(id, input.id);
    const existing = await this.read(id);
    const user = this.build(input, this.nextStamps(existing), existing.status);
    if (user.email !== existing.email) await this.checkEmailFree(user.email);
    return this.save(user);
  }

  /** Users filed under an email address; normally zero or one. */
  async readByEmail(email: string): Promise<User[]> {
    return this.table.readAllEntities({ index: 'email', key: standardizeEmail(email) });
  }

  /** IDs filed under the required `email` query parameter. */
  async readIdsByEmail(query: RawQuery, ctx?: ListingContext): Promise<EntityId[]> {
    const index = selectIndex([emailFilter('email')], query);
    if (!index) throw new MissingParameterError(['email']);
    return this.table.readAllIds(index, ctx);
  }

  protected validate(u: User): string[] {
    const problems: string[] = [];
    if (!isEmailAddress(u.email)) problems.push('Email is missing or invalid');
    if (u.orgId && !isEntityId(u.orgId)) problems.push('OrgID is invalid');
    if (!USER_STATUSES.includes(u.status)) {
      problems.push(`Status is missing or invalid. Expecting: ${USER_STATUSES.join(', ')}`);
    }
    return problems;
  }

  private async checkEmailFree(email: string): Promise<void> {
    if ((await this.readByEmail(email)).length > 0) {
      throw new UnprocessableEntityError(this.entityType, [`Email ${email} is already in use`]);
    }
  }

  private build(input: UserInputDto, stamps: EntityStamps, fallbackStatus: User['status']): User {
    return {
      ...stamps,
      givenName: input.givenName?.trim() || undefined,
      familyName: input.familyName?.trim() || undefined,
      email: standardizeEmail(input.email),
      roles: [...new Set((input.roles ?? []).map((r) => r.trim()).filter((r) => r))],
      orgId: input.orgId,
      orgName: input.orgName?.trim() || undefined,
      avatarUrl: input.avatarUrl,
      websiteUrl: input.websiteUrl,
      status: input.status ?? fallbackStatus,
    };
  }
}
