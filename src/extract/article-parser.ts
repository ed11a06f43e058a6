/**
 * Turn one article URL into an ArticleRecord.
 *
 * Never rejects for a page-level failure: transport errors, non-2xx responses,
 * missing containers and parser exceptions all end in a placeholder record so a
 * single bad article cannot abort the batch.
 */
import type { CrawlerConfig } from '../config/config.js';
import { createArticle, type ArticleRecord } from '../article/article.js';
import { createFetcher } from '../fetch/pacing.js';
import { describeFetchFailure, isSuccessfulFetch, type PageFetcher } from '../fetch/types.js';
import { getSiteProfile, type SiteProfile } from '../sites/site-profile.js';
import { parseDocument } from './dom.js';
import {
  buildContainerStrategies,
  describeStrategy,
  locateContainer,
} from './container-strategies.js';
import { buildPlaceholderText, gradeText } from './text.js';
import { extractMetadata, type ArticleMetadata } from './metadata.js';
import { logger } from '../logger.js';

export interface ParseArticleOptions {
  /** Shared fetcher for the run; a fresh paced fetcher is built when omitted */
  fetcher?: PageFetcher;
  profile?: SiteProfile;
  /** Anchor for relative dates ("today, 14:30") */
  now?: Date;
}

function placeholderArticle(
  id: number,
  url: string,
  reason: string,
  metadata?: ArticleMetadata
): ArticleRecord {
  return createArticle({
    id,
    url,
    text: buildPlaceholderText(url, reason),
    extraction: 'placeholder',
    method: 'placeholder',
    ...metadata,
  });
}

/**
 * Extract a record from already-fetched HTML. Metadata is taken even when the
 * body falls through to a placeholder.
 */
export function extractArticle(
  html: string,
  url: string,
  id: number,
  profile: SiteProfile,
  now: Date = new Date()
): ArticleRecord {
  const tree = parseDocument(html);
  const metadata = extractMetadata(tree, profile, url, now);

  const located = locateContainer(tree, buildContainerStrategies(profile));
  if (!located) {
    logger.warn({ url, id }, 'No content container found');
    return placeholderArticle(id, url, 'no content container', metadata);
  }

  const { text, extraction } = gradeText(located.container, url);
  const method = extraction === 'placeholder' ? 'placeholder' : describeStrategy(located.strategy);

  logger.debug({ url, id, method, extraction, length: text.length }, 'Article extracted');

  return createArticle({ id, url, text, extraction, method, ...metadata });
}

export async function parseArticle(
  url: string,
  id: number,
  config: CrawlerConfig,
  options: ParseArticleOptions = {}
): Promise<ArticleRecord> {
  try {
    const fetcher = options.fetcher ?? createFetcher(config);
    const profile = options.profile ?? getSiteProfile(url);

    const result = await fetcher(url);
    if (!isSuccessfulFetch(result)) {
      const reason = describeFetchFailure(result);
      logger.warn({ url, id, reason }, 'Article fetch failed, using placeholder text');
      return placeholderArticle(id, url, reason);
    }

    return extractArticle(result.html, url, id, profile, options.now);
  } catch (error) {
    logger.warn({ url, id, error: String(error) }, 'Article extraction failed, using placeholder text');
    return placeholderArticle(id, url, `extraction error: ${String(error)}`);
  }
}
