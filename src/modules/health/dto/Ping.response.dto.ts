import type { PingResult } from '../health.service';

/** Liveness answer for GET /api/health/ping. */
export class PingResponseDto implements PingResult {
  public readonly ok = true as const;
  public readonly name: string;
  public readonly timestamp: string;
  public readonly epochMs: number;
  public readonly uptimeSec: number;

  public constructor(result: PingResult) {
    this.name = result.name;
    this.timestamp = result.timestamp;
    this.epochMs = result.epochMs;
    this.uptimeSec = result.uptimeSec;
  }
}
