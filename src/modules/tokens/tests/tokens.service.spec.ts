import { loadAppConfig } from '../../../config/app.config';
import { NotFoundError } from '../../../lib/errors/RequestErrors';
import { MemoryEntityStore } from '../../store/memory-entity.table';
import { UsersService } from '../../users/users.service';
import { TokensService } from '../tokens.service';

describe('TokensService (unit)', () => {
  let users: UsersService;
  let tokens: TokensService;

  beforeEach(() => {
    const store = new MemoryEntityStore();
    const cfg = loadAppConfig({ TOKEN_TTL_HOURS: '2' });
    users = new UsersService(store, cfg);
    tokens = new TokensService(store, users, cfg);
  });

  it('issues a token that expires after the configured hours', async () => {
    const user = await users.create({ email: 'ann@example.com', status: 'ENABLED' });
    const now = new Date();
    const token = await tokens.create(user.id, now);
    expect(token.userId).toBe(user.id);
    expect(token.email).toBe('ann@example.com');
    expect(token.expiresAt).toBe(new Date(now.getTime() + 2 * 60 * 60 * 1000).toISOString());
    await expect(tokens.read(token.id)).resolves.toEqual(token);
    await expect(tokens.userIds.list()).resolves.toEqual([user.id]);
  });

  it('refuses unknown users', async () => {
    const id = '65a1f0c2e4b0a1b2c3d4e5f6';
    await expect(tokens.create(id)).rejects.toThrow(
      `unprocessable entity: Token: User ${id} not found`,
    );
  });

  it('refuses disabled users', async () => {
    const user = await users.create({ email: 'bo@example.com', status: 'DISABLED' });
    await expect(tokens.create(user.id)).rejects.toThrow(
      `unprocessable entity: Token: User ${user.id} is disabled`,
    );
  });

  it('treats an expired token as missing', async () => {
    const user = await users.create({ email: 'cy@example.com' });
    const token = await tokens.create(user.id, new Date(Date.now() - 3 * 60 * 60 * 1000));
    await expect(tokens.exists(token.id)).resolves.toBe(false);
    await expect(tokens.read(token.id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('leaves expired tokens out of listings', async () => {
    const user = await users.create({ email: 'di@example.com' });
    await tokens.create(user.id, new Date(Date.now() - 3 * 60 * 60 * 1000));
    const live = await tokens.create(user.id);
    await expect(tokens.tokens.list({ user: user.id })).resolves.toEqual([live]);
    await expect(tokens.tokens.list({})).resolves.toEqual([live]);
    await expect(tokens.userIds.list()).resolves.toEqual([user.id]);
  });
});
