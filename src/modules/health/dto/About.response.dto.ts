// Response DTO for GET /api/about
import type { StoreStatus } from '../health.service';

export class AboutResponseDto {
  public readonly name: string;
  public readonly env: string;
  public readonly version: string;
  public readonly node: string;
  public readonly storeDriver: string;
  public readonly storeStatus: StoreStatus;
  public readonly timestamp: string; // ISO-8601
  public readonly uptimeSec: number;

  public constructor(args: {
    name: string;
    env: string;
    version: string;
    node: string;
    storeDriver: string;
    storeStatus: StoreStatus;
    timestamp: string;
    uptimeSec: number;
  }) {
    this.name = args.name;
    this.env = args.env;
    this.version = args.version;
    this.node = args.node;
    this.storeDriver = args.storeDriver;
    this.storeStatus = args.storeStatus;
    this.timestamp = args.timestamp;
    this.uptimeSec = args.uptimeSec;
  }
}
