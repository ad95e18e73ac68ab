import { Type } from 'class-transformer';
import {
  IsArray,
  IsIn,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { EMAIL_STATUSES, type EmailStatus } from '../email.definition';

export class IdentityInputDto {
  @IsOptional()
  @IsString()
  public readonly name?: string;

  /** Checked as an address by the service, which reports it as a problem. */
  @IsString()
  public readonly address!: string;
}

export class EmailInputDto {
  @IsOptional()
  @IsString()
  public readonly id?: string;

  @ValidateNested()
  @Type(() => IdentityInputDto)
  public readonly from!: IdentityInputDto;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => IdentityInputDto)
  public readonly to!: IdentityInputDto[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => IdentityInputDto)
  public readonly cc?: IdentityInputDto[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => IdentityInputDto)
  public readonly bcc?: IdentityInputDto[];

  @IsString()
  public readonly subject!: string;

  @IsString()
  public readonly bodyText!: string;

  @IsOptional()
  @IsString()
  public readonly bodyHtml?: string;

  @IsOptional()
  @IsString()
  public readonly eventMessage?: string;

  /** Defaults to PENDING on create. */
  @IsOptional()
  @IsIn(EMAIL_STATUSES)
  public readonly status?: EmailStatus;
}
