import { Type } from 'class-transformer';
import {
  IsArray,
  IsEmail,
  IsIn,
  IsOptional,
  IsString,
  IsUrl,
  Matches,
  ValidateNested,
} from 'class-validator';
import { CONTENT_TYPES, type ContentType } from '../content.definition';

const ENTITY_ID_RX = /^[0-9a-f]{24}$/;

export class AuthorInputDto {
  @IsString()
  public readonly name!: string;

  @IsOptional()
  @IsEmail()
  public readonly email?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  public readonly url?: string;
}

export class ContentBodyInputDto {
  @IsOptional()
  @IsString()
  public readonly title?: string;

  @IsOptional()
  @IsString()
  public readonly subtitle?: string;

  @IsOptional()
  @IsString()
  public readonly text?: string;
}

/** Body of POST /v1/contents and PUT /v1/contents/:id. */
export class ContentInputDto {
  /** Only checked on PUT, where it must match the path. */
  @IsOptional()
  @IsString()
  public readonly id?: string;

  @IsIn(CONTENT_TYPES, { message: `type must be one of ${CONTENT_TYPES.join(', ')}` })
  public readonly type!: ContentType;

  @IsOptional()
  @Matches(ENTITY_ID_RX, { message: 'editorId must be an entity id' })
  public readonly editorId?: string;

  @IsOptional()
  @IsString()
  public readonly editorName?: string;

  @IsOptional()
  @IsString()
  public readonly comment?: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  public readonly tags?: string[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => AuthorInputDto)
  public readonly authors?: AuthorInputDto[];

  @ValidateNested()
  @Type(() => ContentBodyInputDto)
  public readonly body!: ContentBodyInputDto;
}
