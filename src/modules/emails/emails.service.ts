import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { appConfig } from '../../config/app.config';
import { EntityService, type EntityStamps } from '../../lib/entities/entity.service';
import type { EntityId } from '../../lib/ids/entity-id';
import { emailFilter, enumFilter } from '../../lib/listing/filters';
import {
  entityListing,
  keyListing,
  textListing,
  type KeyListing,
  type Listing,
} from '../../lib/listing/listing';
import type { TextValue } from '../../lib/listing/types';
import { EntityStore } from '../store/store.types';
import type { EmailInputDto, IdentityInputDto } from './dto/EmailInput.request.dto';
import {
  EMAIL_STATUSES,
  emailTable,
  isValidIdentity,
  type Email,
  type Identity,
} from './email.definition';

/** Stored messages; delivery happens elsewhere and reports back via status. */
@Injectable()
export class EmailsService extends EntityService<Email> {
  readonly emails: Listing<Email>;
  readonly subjects: Listing<TextValue>;
  readonly addresses: KeyListing<Email>;
  readonly statuses: KeyListing<Email>;

  constructor(
    store: EntityStore,
    @Inject(appConfig.KEY) cfg: ConfigType<typeof appConfig>,
  ) {
    super(store, emailTable);
    const filters = [emailFilter('address'), enumFilter('status', EMAIL_STATUSES)];
    this.emails = entityListing(
      this.table,
      { name: 'emails', filters, defaultLimit: 100 },
      { concurrency: cfg.fanoutConcurrency },
    );
    this.subjects = textListing(this.table, { name: 'email_subjects', filters });
    this.addresses = keyListing(this.table, 'address');
    this.statuses = keyListing(this.table, 'status');
  }

  async create(input: EmailInputDto): Promise<Email> {
    return this.save(this.build(input, this.newStamps(), 'PENDING'));
  }

  async update(id: EntityId, input: EmailInputDto): Promise<Email> {
    this.checkBodyId(id, input.id);
    const existing = await this.read(id);
    return this.save(this.build(input, this.nextStamps(existing), existing.status));
  }

  protected validate(e: Email): string[] {
    const problems: string[] = [];
    if (!isValidIdentity(e.from)) problems.push('From address is missing or invalid');
    if (e.to.length === 0) problems.push('To recipients are missing');
    if (e.to.some((i) => !isValidIdentity(i))) {
      problems.push('To recipient address is missing or invalid');
    }
    if (e.cc.some((i) => !isValidIdentity(i))) {
      problems.push('CC recipient address is missing or invalid');
    }
    if (e.bcc.some((i) => !isValidIdentity(i))) {
      problems.push('BCC recipient address is missing or invalid');
    }
    if (!e.subject) problems.push('Subject is missing');
    if (!e.bodyText) problems.push('Body is missing');
    if (!EMAIL_STATUSES.includes(e.status)) problems.push('Status is missing or invalid');
    return problems;
  }

  private build(input: EmailInputDto, stamps: EntityStamps, fallbackStatus: Email['status']): Email {
    return {
      ...stamps,
      from: toIdentity(input.from),
      to: input.to.map(toIdentity),
      cc: (input.cc ?? []).map(toIdentity),
      bcc: (input.bcc ?? []).map(toIdentity),
      subject: input.subject.trim(),
      bodyText: input.bodyText,
      bodyHtml: input.bodyHtml || undefined,
      eventMessage: input.eventMessage || undefined,
      status: input.status ?? fallbackStatus,
    };
  }
}

function toIdentity(input: IdentityInputDto): Identity {
  return {
    name: input.name?.trim() || undefined,
    address: input.address.trim().toLowerCase(),
  };
}
