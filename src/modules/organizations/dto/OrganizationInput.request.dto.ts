import { IsIn, IsOptional, IsString, MinLength } from 'class-validator';
import {
  ORGANIZATION_STATUSES,
  type OrganizationStatus,
} from '../organization.definition';

export class OrganizationInputDto {
  @IsOptional()
  @IsString()
  public readonly id?: string;

  @IsString()
  @MinLength(1)
  public readonly name!: string;

  /** Defaults to PENDING on create. */
  @IsOptional()
  @IsIn(ORGANIZATION_STATUSES)
  public readonly status?: OrganizationStatus;
}
