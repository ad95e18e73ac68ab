import { APP_DEFAULTS, loadAppConfig } from '../app.config';
import { readBool, readChoice, readPositiveInt } from '../env';

describe('loadAppConfig()', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadAppConfig({})).toEqual(APP_DEFAULTS);
  });

  it('reads overrides', () => {
    const cfg = loadAppConfig({
      PORT: '8080',
      STORE_DRIVER: ' Memory ',
      FANOUT_CONCURRENCY: '4',
      AUDIT_ENABLED: 'off',
    });
    expect(cfg.port).toBe(8080);
    expect(cfg.storeDriver).toBe('memory');
    expect(cfg.fanoutConcurrency).toBe(4);
    expect(cfg.auditEnabled).toBe(false);
  });

  it('falls back on unusable values', () => {
    const cfg = loadAppConfig({
      PORT: '70000',
      STORE_DRIVER: 'postgres',
      FANOUT_CONCURRENCY: '0',
      AUDIT_ENABLED: 'maybe',
      APP_NAME: '   ',
      EVENT_TTL_DAYS: '0',
      TOKEN_TTL_HOURS: '-1',
    });
    expect(cfg.port).toBe(3000);
    expect(cfg.storeDriver).toBe('mongo');
    expect(cfg.fanoutConcurrency).toBe(16);
    expect(cfg.auditEnabled).toBe(true);
    expect(cfg.name).toBe('versioned-entities-api');
    expect(cfg.eventTtlDays).toBe(90);
    expect(cfg.tokenTtlHours).toBe(168);
  });
});

describe('env readers', () => {
  it('parse booleans loosely', () => {
    expect(readBool('YES', false)).toBe(true);
    expect(readBool(undefined, true)).toBe(true);
  });

  it('bound integers', () => {
    expect(readPositiveInt('12', 1, 10)).toBe(1);
    expect(readPositiveInt('-3', 7)).toBe(7);
  });

  it('match choices case-insensitively', () => {
    expect(readChoice('B', ['a', 'b'], 'a')).toBe('b');
  });
});
