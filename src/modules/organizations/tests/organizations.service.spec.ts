import { loadAppConfig } from '../../../config/app.config';
import { MemoryEntityStore } from '../../store/memory-entity.table';
import { OrganizationsService } from '../organizations.service';

describe('OrganizationsService (unit)', () => {
  let service: OrganizationsService;

  beforeEach(() => {
    service = new OrganizationsService(new MemoryEntityStore(), loadAppConfig({}));
  });

  it('creates pending organizations', async () => {
    const org = await service.create({ name: ' Acme ' });
    expect(org.name).toBe('Acme');
    expect(org.status).toBe('PENDING');
  });

  it('requires a name', async () => {
    await expect(service.create({ name: '  ' })).rejects.toThrow(
      'unprocessable entity: Organization: Name is missing',
    );
  });

  it('lists names by status', async () => {
    const acme = await service.create({ name: 'Acme', status: 'ENABLED' });
    await service.create({ name: 'Bolt' });
    await expect(service.names.list({ status: 'ENABLED' })).resolves.toEqual([
      { id: acme.id, value: 'Acme' },
    ]);
    await expect(service.names.list({ search: 'OL' })).resolves.toHaveLength(1);
    await expect(service.statuses.list()).resolves.toEqual(['ENABLED', 'PENDING']);
  });
});
