import request from 'supertest';
import type { INestApplication } from '@nestjs/common';
import type { Server } from 'http';
import { createTestApp, stringField } from '../helpers/app';

describe('Key and text listings (e2e)', () => {
  let app: INestApplication;
  let httpServer: Server;

  beforeAll(async () => {
    ({ app, httpServer } = await createTestApp({ AUDIT_ENABLED: 'false' }));
  });

  afterAll(async () => {
    await app.close();
  });

  it('falls back to the User-Agent header for devices', async () => {
    const res = await request(httpServer)
      .post('/api/v1/devices')
      .set('User-Agent', 'TestAgent/3.0')
      .send({})
      .expect(201);
    const id = stringField(res.body, 'id');
    expect(res.body).toMatchObject({ userAgent: 'TestAgent/3.0' });

    const agents = await request(httpServer).get('/api/v1/device_agents').expect(200);
    expect(agents.body).toEqual([{ id, value: 'TestAgent/3.0' }]);
    const dates = await request(httpServer).get('/api/v1/device_dates').expect(200);
    expect(dates.body).toEqual([stringField(res.body, 'lastSeenAt').slice(0, 10)]);
  });

  it('labels metrics and lists their tags', async () => {
    await request(httpServer)
      .post('/api/v1/metrics')
      .send({ title: 'Reading time', label: 'Chapter 2', tags: ['speed'], value: 0, units: 'seconds' })
      .expect(201);
    await request(httpServer)
      .post('/api/v1/metrics')
      .send({ title: 'Pages read', tags: ['volume'], value: 12, units: 'pages' })
      .expect(201);

    const labels = await request(httpServer).get('/api/v1/metric_labels').query({ sorted: 'true' }).expect(200);
    expect(labels.body.map((v: unknown) => stringField(v, 'value'))).toEqual(['Chapter 2', 'Pages read']);
    const tags = await request(httpServer).get('/api/v1/metric_tags').expect(200);
    expect(tags.body).toEqual(['speed', 'volume']);
  });

  it('lists organization names and statuses', async () => {
    await request(httpServer).post('/api/v1/organizations').send({ name: 'Acme', status: 'ENABLED' }).expect(201);
    await request(httpServer).post('/api/v1/organizations').send({ name: 'Bolt' }).expect(201);

    const names = await request(httpServer)
      .get('/api/v1/organization_names')
      .query({ search: 'acme bolt', any: 'true' })
      .expect(200);
    expect(names.body.map((v: unknown) => stringField(v, 'value'))).toEqual(['Acme', 'Bolt']);
    const statuses = await request(httpServer).get('/api/v1/organization_statuses').expect(200);
    expect(statuses.body).toEqual(['ENABLED', 'PENDING']);
  });

  it('lists email addresses across recipients', async () => {
    await request(httpServer)
      .post('/api/v1/emails')
      .send({
        from: { address: 'desk@example.com' },
        to: [{ name: 'Ann', address: 'Ann@Example.com' }],
        subject: 'Welcome',
        bodyText: 'Hello',
      })
      .expect(201);
    const addresses = await request(httpServer).get('/api/v1/email_addresses').expect(200);
    expect(addresses.body).toEqual(['ann@example.com', 'desk@example.com']);
  });

  it('lists posted events by level and date', async () => {
    const res = await request(httpServer)
      .post('/api/v1/events')
      .send({ logLevel: 'WARN', message: 'disk nearly full', entityType: 'Host' })
      .expect(201);
    const day = stringField(res.body, 'createdAt').slice(0, 10);

    const levels = await request(httpServer).get('/api/v1/event_log_levels').expect(200);
    expect(levels.body).toEqual(['WARN']);
    const dates = await request(httpServer).get('/api/v1/event_dates').expect(200);
    expect(dates.body).toEqual([day]);
    const byDate = await request(httpServer).get('/api/v1/events').query({ date: day }).expect(200);
    expect(byDate.body).toEqual([res.body]);
  });

  it('summarizes metrics by tag and requires a filter', async () => {
    for (const value of [3, 5]) {
      await request(httpServer)
        .post('/api/v1/metrics')
        .send({ title: 'Quiz score', tags: ['quiz'], value, units: 'points' })
        .expect(201);
    }
    const res = await request(httpServer).get('/api/v1/metric_stats').query({ tag: 'quiz' }).expect(200);
    expect(res.body).toMatchObject({ tag: 'quiz', count: 2, sum: 8, min: 3, max: 5, mean: 4, median: 4, stdDev: 1 });

    const missing = await request(httpServer).get('/api/v1/metric_stats').expect(400);
    expect(missing.body).toMatchObject({
      message: 'bad request: required query parameter: entity, type or tag',
    });
    await request(httpServer).get('/api/v1/metric_stats').query({ tag: 'none' }).expect(404);
  });

  it('counts the devices seen on a day', async () => {
    const device = await request(httpServer)
      .post('/api/v1/devices')
      .send({ userAgent: 'TestAgent/4.0' })
      .expect(201);
    const day = stringField(device.body, 'lastSeenAt').slice(0, 10);

    await request(httpServer).head(`/api/v1/device_counts/${day}`).expect(404);
    const count = await request(httpServer).put(`/api/v1/device_counts/${day}`).expect(200);
    expect(count.body).toMatchObject({
      id: day,
      date: day,
      userAgents: expect.objectContaining({ 'TestAgent/4.0': 1 }),
    });
    await request(httpServer).head(`/api/v1/device_counts/${day}`).expect(204);
    const read = await request(httpServer).get(`/api/v1/device_counts/${day}`).expect(200);
    expect(read.body).toEqual(count.body);
    const all = await request(httpServer).get('/api/v1/device_counts').expect(200);
    expect(all.body).toEqual([count.body]);

    const bad = await request(httpServer).get('/api/v1/device_counts/yesterday').expect(400);
    expect(bad.body).toMatchObject({
      message: 'bad request: invalid parameter, date: yesterday (expecting YYYY-MM-DD)',
    });
  });
});
