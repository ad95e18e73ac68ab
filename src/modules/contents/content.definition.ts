import type { EntityId } from '../../lib/ids/entity-id';
import type { StoredEntity, TableDefinition } from '../store/store.types';

export const CONTENT_TYPES = ['BOOK', 'CHAPTER', 'ARTICLE', 'CATEGORY'] as const;
export type ContentType = (typeof CONTENT_TYPES)[number];

export interface Author {
  name: string;
  email?: string;
  url?: string;
}

export interface ContentBody {
  title?: string;
  subtitle?: string;
  text?: string;
}

export interface Content extends StoredEntity {
  versionId: EntityId;
  updatedAt: string;
  type: ContentType;
  editorId?: EntityId;
  editorName?: string;
  comment?: string;
  wordCount: number;
  tags: string[];
  authors: Author[];
  body: ContentBody;
}

/** "Title: Subtitle (TYPE)", "Title (TYPE)", or "TYPE id" when untitled. */
export function contentTitle(c: Pick<Content, 'id' | 'type' | 'body'>): string {
  const { title, subtitle } = c.body;
  if (title && subtitle) return `${title}: ${subtitle} (${c.type})`;
  if (title) return `${title} (${c.type})`;
  return `${c.type} ${c.id}`;
}

export function countWords(text: string | undefined): number {
  if (!text) return 0;
  return text.split(/\s+/).filter((w) => w.length > 0).length;
}

export const contentTable: TableDefinition<Content> = {
  entityType: 'Content',
  collection: 'contents',
  versioned: true,
  text: contentTitle,
  indexes: [
    { name: 'type', keys: (c) => [c.type] },
    { name: 'author', keys: (c) => c.authors.map((a) => a.name) },
    { name: 'editor', keys: (c) => [c.editorId] },
    { name: 'tag', keys: (c) => c.tags },
  ],
};
