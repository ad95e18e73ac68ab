import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { appConfig } from '../../config/app.config';
import { EntityService } from '../../lib/entities/entity.service';
import type { EntityId } from '../../lib/ids/entity-id';
import { enumFilter } from '../../lib/listing/filters';
import {
  entityListing,
  keyListing,
  textListing,
  type KeyListing,
  type Listing,
} from '../../lib/listing/listing';
import type { TextValue } from '../../lib/listing/types';
import { EntityStore } from '../store/store.types';
import type { OrganizationInputDto } from './dto/OrganizationInput.request.dto';
import {
  ORGANIZATION_STATUSES,
  organizationTable,
  type Organization,
} from './organization.definition';

@Injectable()
export class OrganizationsService extends EntityService<Organization> {
  readonly organizations: Listing<Organization>;
  readonly names: Listing<TextValue>;
  readonly statuses: KeyListing<Organization>;

  constructor(
    store: EntityStore,
    @Inject(appConfig.KEY) cfg: ConfigType<typeof appConfig>,
  ) {
    super(store, organizationTable);
    const filters = [enumFilter('status', ORGANIZATION_STATUSES)];
    this.organizations = entityListing(
      this.table,
      { name: 'organizations', filters, defaultLimit: 100 },
      { concurrency: cfg.fanoutConcurrency },
    );
    this.names = textListing(this.table, { name: 'organization_names', filters });
    this.statuses = keyListing(this.table, 'status');
  }

  async create(input: OrganizationInputDto): Promise<Organization> {
    return this.save({
      ...this.newStamps(),
      name: input.name.trim(),
      status: input.status ?? 'PENDING',
    });
  }

  async update(id: EntityId, input: OrganizationInputDto): Promise<Organization> {
    this.checkBodyId(id, input.id);
    const existing = await this.read(id);
    return this.save({
      ...this.nextStamps(existing),
      name: input.name.trim(),
      status: input.status ?? existing.status,
    });
  }

  protected validate(o: Organization): string[] {
    const problems: string[] = [];
    if (!o.name) problems.push('Name is missing');
    if (!ORGANIZATION_STATUSES.includes(o.status)) {
      problems.push(`Status is missing or invalid. Expecting: ${ORGANIZATION_STATUSES.join(', ')}`);
    }
    return problems;
  }
}
