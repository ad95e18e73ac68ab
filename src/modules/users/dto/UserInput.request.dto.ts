import {
  IsArray,
  IsEmail,
  IsIn,
  IsOptional,
  IsString,
  IsUrl,
  Matches,
} from 'class-validator';
import { USER_STATUSES, type UserStatus } from '../user.definition';

const ENTITY_ID_RX = /^[0-9a-f]{24}$/;

export class UserInputDto {
  @IsOptional()
  @IsString()
  public readonly id?: string;

  @IsOptional()
  @IsString()
  public readonly givenName?: string;

  @IsOptional()
  @IsString()
  public readonly familyName?: string;

  @IsEmail()
  public readonly email!: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  public readonly roles?: string[];

  @IsOptional()
  @Matches(ENTITY_ID_RX, { message: 'orgId must be an entity id' })
  public readonly orgId?: string;

  @IsOptional()
  @IsString()
  public readonly orgName?: string;

  @IsOptional()
  @IsUrl()
  public readonly avatarUrl?: string;

  @IsOptional()
  @IsUrl()
  public readonly websiteUrl?: string;

  /** Defaults to PENDING on create. */
  @IsOptional()
  @IsIn(USER_STATUSES)
  public readonly status?: UserStatus;
}
