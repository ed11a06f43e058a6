/**
 * Metadata extraction: title, authors, publication date, topics.
 * Each field is extracted on its own; one failing lookup never affects the others.
 */
import { collapseWhitespace, type DomTree } from './dom.js';
import { normalizeDate } from './date.js';
import { NOT_FOUND } from '../article/article.js';
import type { SiteProfile } from '../sites/site-profile.js';
import { logger } from '../logger.js';

export interface ArticleMetadata {
  title: string;
  authors: string[];
  publishedAt: Date | null;
  topics: string[];
}

function guarded<T>(field: string, url: string, fallback: T, extract: () => T): T {
  try {
    return extract();
  } catch (e) {
    logger.debug({ url, field, error: String(e) }, 'Metadata extraction failed');
    return fallback;
  }
}

export function extractTitle(tree: DomTree, profile: SiteProfile): string {
  const el = tree.findFirst(profile.titleSelector);
  return (el && collapseWhitespace(el.text())) || NOT_FOUND;
}

/**
 * Raw date string: the anchor inside the date element, or the element's own
 * text when it has no anchor.
 */
export function extractRawDate(tree: DomTree, profile: SiteProfile): string | null {
  const block = tree.findFirst(profile.dateSelector);
  if (!block) return null;
  const source = block.findFirst('a') ?? block;
  return collapseWhitespace(source.text()) || null;
}

/** Topic labels in document order, blanks and repeats dropped. */
export function extractTopics(tree: DomTree, profile: SiteProfile): string[] {
  const topics = tree
    .findAll(profile.topicSelector)
    .map((el) => collapseWhitespace(el.text()))
    .filter(Boolean);
  return [...new Set(topics)];
}

export function extractMetadata(
  tree: DomTree,
  profile: SiteProfile,
  url: string,
  now: Date = new Date()
): ArticleMetadata {
  return {
    title: guarded('title', url, NOT_FOUND, () => extractTitle(tree, profile)),
    // Authorship is not exposed in a structured form on the target sites
    authors: [NOT_FOUND],
    publishedAt: guarded('date', url, null, () =>
      normalizeDate(extractRawDate(tree, profile), now)
    ),
    topics: guarded('topics', url, [], () => extractTopics(tree, profile)),
  };
}
