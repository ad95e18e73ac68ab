import { Controller, Get } from '@nestjs/common';
import { HealthService } from './health.service';
import { PingResponseDto } from './dto/Ping.response.dto';
import { AboutResponseDto } from './dto/About.response.dto';

@Controller()
export class HealthController {
  public constructor(private readonly healthService: HealthService) {}

  @Get('health/ping')
  public ping(): PingResponseDto {
    return new PingResponseDto(this.healthService.ping());
  }

  /** Name, environment and version of the running service, and whether its store answers. */
  @Get('about')
  public async about(): Promise<AboutResponseDto> {
    return new AboutResponseDto(await this.healthService.about());
  }
}
