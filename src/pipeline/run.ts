/**
 * One scraping run: validate config, reset the workspace, discover, extract, save
 */
import { loadConfig, resolveConfigPath, type CrawlerConfig } from '../config/config.js';
import { discoverArticleUrls } from '../crawl/discovery.js';
import { parseArticle } from '../extract/article-parser.js';
import { createFetcher } from '../fetch/pacing.js';
import type { PageFetcher } from '../fetch/types.js';
import { FileCorpusWriter, prepareWorkspace, type ArticleSink } from '../storage/corpus-writer.js';
import { runLogger } from '../logger.js';

export interface ScrapeOptions {
  outputDir: string;
  /** Already-validated configuration; loaded from `configPath` when omitted */
  config?: CrawlerConfig;
  configPath?: string;
  sink?: ArticleSink;
  fetcher?: PageFetcher;
  /** Stops discovery before its next request and extraction before its next article */
  signal?: AbortSignal;
  now?: Date;
}

export interface ScrapeSummary {
  outputDir: string;
  discovered: number;
  saved: number;
  placeholders: number;
  aborted: boolean;
  durationMs: number;
}

/**
 * Configuration and workspace errors reject before any request is made.
 * Page-level failures never reject; they show up as placeholder records.
 * Ids are assigned 1..n in discovery order.
 */
export async function runScraper(options: ScrapeOptions): Promise<ScrapeSummary> {
  const startTime = Date.now();
  const { outputDir, signal } = options;
  const log = runLogger(outputDir, startTime);

  const config = options.config ?? loadConfig(resolveConfigPath(options.configPath));
  await prepareWorkspace(outputDir);

  const fetcher = options.fetcher ?? createFetcher(config);
  const sink = options.sink ?? new FileCorpusWriter(outputDir);

  const urls = await discoverArticleUrls(config, { fetcher, signal });

  let saved = 0;
  let placeholders = 0;

  for (const [index, url] of urls.entries()) {
    if (signal?.aborted) break;

    const record = await parseArticle(url, index + 1, config, { fetcher, now: options.now });
    await sink.save(record);

    saved++;
    if (record.extraction === 'placeholder') placeholders++;
    log.info(
      { id: record.id, url, extraction: record.extraction, progress: `${saved}/${urls.length}` },
      'Article processed'
    );
  }

  const summary: ScrapeSummary = {
    outputDir,
    discovered: urls.length,
    saved,
    placeholders,
    aborted: signal?.aborted ?? false,
    durationMs: Date.now() - startTime,
  };
  log.info(summary, 'Scrape complete');
  return summary;
}
