/**
 * Article URL discovery over the configured seed pages
 */
import type { CrawlerConfig } from '../config/config.js';
import { createFetcher } from '../fetch/pacing.js';
import { describeFetchFailure, isSuccessfulFetch, type PageFetcher } from '../fetch/types.js';
import { parseDocument } from '../extract/dom.js';
import { getSiteProfile, type SiteProfile } from '../sites/site-profile.js';
import { candidateLinks, normalizeUrl } from './link-extractor.js';
import type { DiscoveryOptions, DiscoverySummary } from './types.js';
import { logger } from '../logger.js';

/**
 * State of one discovery run. The seen set and the result list live here and
 * nowhere else, so repeated runs in one process never share state.
 *
 * Strategy:
 * 1. Walk seeds in order; stop before the next request once the target is
 *    reached or the abort signal fires
 * 2. Skip seeds whose fetch fails or whose HTML cannot be processed
 * 3. Take links from the site profile's selector in document order, dropping
 *    denylisted and already-seen URLs without counting them
 */
export class DiscoverySession {
  private readonly urls: string[] = [];
  private readonly seen = new Set<string>();
  private readonly fetcher: PageFetcher;
  private readonly profileFor: (url: string) => SiteProfile;
  private started = false;
  private seedsFetched = 0;
  private seedsSkipped = 0;

  constructor(
    private readonly config: CrawlerConfig,
    private readonly options: DiscoveryOptions = {}
  ) {
    this.fetcher = options.fetcher ?? createFetcher(config);
    this.profileFor = options.profileFor ?? getSiteProfile;
  }

  get target(): number {
    return this.config.totalArticles;
  }

  get size(): number {
    return this.urls.length;
  }

  isComplete(): boolean {
    return this.urls.length >= this.target;
  }

  /**
   * Offer a candidate URL. Returns true when it was added; duplicates,
   * denylisted URLs and anything past the target are dropped.
   */
  offer(url: string, profile: SiteProfile): boolean {
    if (this.isComplete()) return false;
    if (profile.excludeUrlSubstrings.some((fragment) => url.includes(fragment))) {
      logger.debug({ url }, 'Skipping denylisted URL');
      return false;
    }

    const key = normalizeUrl(url);
    if (this.seen.has(key)) return false;

    this.seen.add(key);
    this.urls.push(url);
    return true;
  }

  async run(): Promise<string[]> {
    if (this.started) {
      throw new Error('DiscoverySession.run() may only be called once');
    }
    this.started = true;

    const startTime = Date.now();
    let aborted = false;

    for (const seedUrl of this.config.seedUrls) {
      if (this.isComplete()) break;
      if (this.options.signal?.aborted) {
        aborted = true;
        logger.info({ seedUrl, found: this.size }, 'Discovery aborted');
        break;
      }
      await this.processSeed(seedUrl);
    }

    const summary: DiscoverySummary = {
      seedsTotal: this.config.seedUrls.length,
      seedsFetched: this.seedsFetched,
      seedsSkipped: this.seedsSkipped,
      urlsFound: this.size,
      target: this.target,
      aborted,
      durationMs: Date.now() - startTime,
    };
    logger.info(summary, 'Discovery complete');

    return [...this.urls];
  }

  private async processSeed(seedUrl: string): Promise<void> {
    try {
      const result = await this.fetcher(seedUrl);
      if (!isSuccessfulFetch(result)) {
        this.seedsSkipped++;
        logger.warn({ seedUrl, reason: describeFetchFailure(result) }, 'Seed fetch failed, skipping');
        return;
      }
      this.seedsFetched++;

      const profile = this.profileFor(seedUrl);
      const origin = new URL(seedUrl).origin;
      const tree = parseDocument(result.html);
      const before = this.size;

      for (const url of candidateLinks(tree, profile.linkSelector, origin)) {
        this.offer(url, profile);
        if (this.isComplete()) break;
      }

      logger.debug({ seedUrl, added: this.size - before, total: this.size }, 'Seed processed');
    } catch (error) {
      this.seedsSkipped++;
      logger.warn({ seedUrl, error: String(error) }, 'Seed page could not be processed, skipping');
    }
  }
}

/**
 * Discover up to `config.totalArticles` unique article URLs in first-seen order.
 * Ending with fewer URLs than requested is not an error.
 */
export async function discoverArticleUrls(
  config: CrawlerConfig,
  options: DiscoveryOptions = {}
): Promise<string[]> {
  return new DiscoverySession(config, options).run();
}
