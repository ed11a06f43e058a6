/**
 * Article record produced by extraction and handed to persistence
 */

/** Sentinel for metadata the page does not provide */
export const NOT_FOUND = 'NOT FOUND';

/**
 * How the body text was obtained:
 * - content: paragraph text of the located container
 * - fallback-text: the container's coarse full text after paragraphs came up short
 * - placeholder: a synthesized diagnostic string
 */
export type ExtractionKind = 'content' | 'fallback-text' | 'placeholder';

export interface ArticleRecord {
  readonly id: number;
  readonly url: string;
  readonly title: string;
  readonly authors: readonly string[];
  readonly publishedAt: Date | null;
  readonly topics: readonly string[];
  readonly text: string;
  readonly extraction: ExtractionKind;
  /** Which container strategy produced the text, or "placeholder" */
  readonly method: string;
}

export interface ArticleInit {
  id: number;
  url: string;
  text: string;
  extraction: ExtractionKind;
  method: string;
  title?: string | null;
  authors?: readonly string[];
  publishedAt?: Date | null;
  topics?: readonly string[];
}

/** Serialized metadata written next to the raw text */
export interface ArticleMeta {
  id: number;
  url: string;
  title: string;
  author: string[];
  date: string | null;
  topics: string[];
  extraction: ExtractionKind;
  method: string;
}

/**
 * Build a frozen record, filling absent metadata with sentinels.
 * Ids are 1-based; a non-positive or fractional id is a caller bug and throws.
 */
export function createArticle(init: ArticleInit): ArticleRecord {
  if (!Number.isInteger(init.id) || init.id < 1) {
    throw new RangeError(`Article id must be a positive integer, got ${init.id}`);
  }
  if (!init.text) {
    throw new RangeError(`Article ${init.id} has empty text`);
  }

  const authors = init.authors && init.authors.length > 0 ? init.authors : [NOT_FOUND];

  return Object.freeze({
    id: init.id,
    url: init.url,
    title: init.title || NOT_FOUND,
    authors: Object.freeze([...authors]),
    publishedAt: init.publishedAt ?? null,
    topics: Object.freeze([...(init.topics ?? [])]),
    text: init.text,
    extraction: init.extraction,
    method: init.method,
  });
}

export function toArticleMeta(record: ArticleRecord): ArticleMeta {
  return {
    id: record.id,
    url: record.url,
    title: record.title,
    author: [...record.authors],
    date: record.publishedAt ? record.publishedAt.toISOString() : null,
    topics: [...record.topics],
    extraction: record.extraction,
    method: record.method,
  };
}
