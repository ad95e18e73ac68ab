import request from 'supertest';
import type { INestApplication } from '@nestjs/common';
import type { Server } from 'http';
import type { PingResponseDto } from '../../src/modules/health/dto/Ping.response.dto';
import type { AboutResponseDto } from '../../src/modules/health/dto/About.response.dto';
import { createTestApp, isRecord } from '../helpers/app';

function isPingResponseDto(x: unknown): x is PingResponseDto {
  if (!isRecord(x)) return false;
  return (
    x.ok === true &&
    typeof x.timestamp === 'string' &&
    typeof x.epochMs === 'number' &&
    typeof x.uptimeSec === 'number'
  );
}

function isAboutResponseDto(x: unknown): x is AboutResponseDto {
  if (!isRecord(x)) return false;
  return (
    typeof x.name === 'string' &&
    typeof x.env === 'string' &&
    typeof x.version === 'string' &&
    typeof x.node === 'string' &&
    typeof x.storeDriver === 'string' &&
    typeof x.storeStatus === 'string' &&
    typeof x.timestamp === 'string' &&
    typeof x.uptimeSec === 'number'
  );
}

describe('HealthModule (e2e)', () => {
  let app: INestApplication;
  let httpServer: Server;

  beforeAll(async () => {
    ({ app, httpServer } = await createTestApp());
  });

  afterAll(async () => {
    await app.close();
  });

  it('/api/health/ping (GET) returns PingResponseDto', async () => {
    const res = await request(httpServer)
      .get('/api/health/ping')
      .expect(200)
      .expect('Content-Type', /json/);

    const body: unknown = res.body;
    expect(isPingResponseDto(body)).toBe(true);
  });

  it('/api/about (GET) describes the running service', async () => {
    const res = await request(httpServer).get('/api/about').expect(200);

    const body: unknown = res.body;
    expect(isAboutResponseDto(body)).toBe(true);
    if (isAboutResponseDto(body)) {
      expect(body.env).toBe('test');
      expect(body.storeDriver).toBe('memory');
      expect(body.storeStatus).toBe('memory');
      expect(body.node).toBe(process.version);
    }
  });
});
