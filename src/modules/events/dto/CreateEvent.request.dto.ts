import { IsIn, IsOptional, IsString, Matches, MinLength } from 'class-validator';
import { LOG_LEVELS, type LogLevel } from '../event.definition';

const ENTITY_ID_RX = /^[0-9a-f]{24}$/;

export class CreateEventRequestDto {
  @IsOptional()
  @Matches(ENTITY_ID_RX, { message: 'userId must be an entity id' })
  public readonly userId?: string;

  @IsOptional()
  @Matches(ENTITY_ID_RX, { message: 'entityId must be an entity id' })
  public readonly entityId?: string;

  @IsOptional()
  @IsString()
  public readonly entityType?: string;

  @IsIn(LOG_LEVELS)
  public readonly logLevel!: LogLevel;

  @IsString()
  @MinLength(1)
  public readonly message!: string;

  @IsOptional()
  @IsString()
  public readonly uri?: string;
}
