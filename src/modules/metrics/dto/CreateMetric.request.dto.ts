import {
  IsArray,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  MinLength,
} from 'class-validator';

export class CreateMetricRequestDto {
  @IsString()
  @MinLength(1)
  public readonly title!: string;

  @IsOptional()
  @IsString()
  public readonly label?: string;

  @IsOptional()
  @Matches(/^[0-9a-f]{24}$/, { message: 'entityId must be an entity id' })
  public readonly entityId?: string;

  @IsOptional()
  @IsString()
  public readonly entityType?: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  public readonly tags?: string[];

  @IsNumber({ allowNaN: false, allowInfinity: false })
  public readonly value!: number;

  @IsString()
  @MinLength(1)
  public readonly units!: string;
}
