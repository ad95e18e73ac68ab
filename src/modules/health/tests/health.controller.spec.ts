import { Test, TestingModule } from '@nestjs/testing';
import { ConfigModule } from '@nestjs/config';
import { HealthController } from '../health.controller';
import { HealthService } from '../health.service';
import { PingResponseDto } from '../dto/Ping.response.dto';
import { AboutResponseDto } from '../dto/About.response.dto';
import { appConfig } from '../../../config/app.config';
import { MongodbService } from '../../mongodb/mongodb.service';

describe('HealthController', () => {
  let moduleRef: TestingModule;
  let controller: HealthController;

  beforeAll(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [ConfigModule.forRoot({ load: [appConfig], ignoreEnvFile: true })],
      controllers: [HealthController],
      providers: [
        HealthService,
        { provide: MongodbService, useValue: { ping: jest.fn().mockResolvedValue(true) } },
      ],
    }).compile();

    controller = moduleRef.get<HealthController>(HealthController);
  });

  afterAll(async () => {
    await moduleRef.close();
  });

  it('ping() returns PingResponseDto with ok=true', () => {
    const result: PingResponseDto = controller.ping();

    expect(result).toBeInstanceOf(PingResponseDto);
    expect(result.ok).toBe(true);
    expect(typeof result.epochMs).toBe('number');
  });

  it('about() returns AboutResponseDto with the node version', async () => {
    const result: AboutResponseDto = await controller.about();

    expect(result).toBeInstanceOf(AboutResponseDto);
    expect(result.node).toBe(process.version);
    expect(typeof result.name).toBe('string');
    expect(typeof result.version).toBe('string');
  });
});
