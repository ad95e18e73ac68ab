import { IsOptional, IsString, Matches } from 'class-validator';

export class DeviceInputDto {
  @IsOptional()
  @IsString()
  public readonly id?: string;

  @IsOptional()
  @Matches(/^[0-9a-f]{24}$/, { message: 'userId must be an entity id' })
  public readonly userId?: string;

  /** Falls back to the request's User-Agent header. */
  @IsOptional()
  @IsString()
  public readonly userAgent?: string;
}
