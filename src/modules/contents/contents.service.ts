import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { appConfig } from '../../config/app.config';
import { EntityService, type EntityStamps } from '../../lib/entities/entity.service';
import { isEntityId, type EntityId } from '../../lib/ids/entity-id';
import { enumFilter, idFilter, keyFilter } from '../../lib/listing/filters';
import {
  entityListing,
  keyListing,
  textListing,
  type KeyListing,
  type Listing,
} from '../../lib/listing/listing';
import type { TextValue } from '../../lib/listing/types';
import { EntityStore } from '../store/store.types';
import {
  CONTENT_TYPES,
  contentTable,
  countWords,
  type Content,
} from './content.definition';
import type { ContentInputDto } from './dto/ContentInput.request.dto';

@Injectable()
export class ContentsService extends EntityService<Content> {
  readonly contents: Listing<Content>;
  readonly titles: Listing<TextValue>;
  readonly types: KeyListing<Content>;
  readonly authors: KeyListing<Content>;
  readonly tags: KeyListing<Content>;

  constructor(
    store: EntityStore,
    @Inject(appConfig.KEY) cfg: ConfigType<typeof appConfig>,
  ) {
    super(store, contentTable, 20);
    this.contents = entityListing(
      this.table,
      { name: 'contents', filters: [], defaultLimit: 20 },
      { concurrency: cfg.fanoutConcurrency },
    );
    this.titles = textListing(this.table, {
      name: 'content_titles',
      filters: [
        enumFilter('type', CONTENT_TYPES),
        keyFilter('author'),
        idFilter('editor'),
        keyFilter('tag'),
      ],
    });
    this.types = keyListing(this.table, 'type');
    this.authors = keyListing(this.table, 'author');
    this.tags = keyListing(this.table, 'tag');
  }

  async create(input: ContentInputDto): Promise<Content> {
    return this.save(this.build(input, this.newStamps()));
  }

  async update(id: EntityId, input: ContentInputDto): Promise<Content> {
    this.checkBodyId(id, input.id);
    const existing = await this.read(id);
    return this.save(this.build(input, this.nextStamps(existing)));
  }

  protected validate(c: Content): string[] {
    const problems: string[] = [];
    if (!CONTENT_TYPES.includes(c.type)) problems.push('Type is missing or invalid');
    if (c.editorId && !isEntityId(c.editorId)) problems.push('EditorID is invalid');
    for (const author of c.authors) {
      if (!author.name) problems.push('Author Name is missing');
    }
    if (!c.body.title && !c.body.text) problems.push('Content is empty');
    return problems;
  }

  private build(input: ContentInputDto, stamps: EntityStamps): Content {
    const text = input.body.text?.trim() || undefined;
    return {
      ...stamps,
      type: input.type,
      editorId: input.editorId,
      editorName: input.editorName?.trim() || undefined,
      comment: input.comment?.trim() || undefined,
      wordCount: countWords(text),
      tags: [...new Set((input.tags ?? []).map((t) => t.trim()).filter((t) => t))],
      authors: (input.authors ?? []).map((a) => ({
        name: a.name.trim(),
        email: a.email?.trim().toLowerCase() || undefined,
        url: a.url?.trim() || undefined,
      })),
      body: {
        title: input.body.title?.trim() || undefined,
        subtitle: input.body.subtitle?.trim() || undefined,
        text,
      },
    };
  }
}
