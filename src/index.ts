/**
 * corpus-crawler - configuration-driven news crawler that discovers article URLs
 * from seed pages and extracts a numbered corpus of article records.
 *
 * @module corpus-crawler
 */
export { loadConfig, validateConfig, resolveConfigPath } from './config/config.js';
export {
  ConfigError,
  ConfigFileError,
  SeedUrlError,
  HeaderError,
  NumberOfArticlesError,
  IncorrectNumberOfArticlesError,
  NumberOfArticlesOutOfRangeError,
  EncodingError,
  TimeoutError,
  VerifyError,
} from './config/errors.js';
export { fetchPage, createFetcher, RequestPacer } from './fetch/index.js';
export { discoverArticleUrls, DiscoverySession, resolveArticleLink } from './crawl/index.js';
export { parseArticle, extractArticle, normalizeDate, parseDocument } from './extract/index.js';
export { createArticle, NOT_FOUND } from './article/article.js';
export { getSiteProfile, DEFAULT_PROFILE } from './sites/site-profile.js';
export { FileCorpusWriter, prepareWorkspace, WorkspaceError } from './storage/corpus-writer.js';
export { CorpusRegistry } from './corpus/corpus-registry.js';
export { cleanText, runCleaningPipeline } from './corpus/text-pipeline.js';
export {
  DirectoryNotFoundError,
  NotADirectoryError,
  EmptyDirectoryError,
  InconsistentDatasetError,
} from './corpus/errors.js';
export { runScraper } from './pipeline/run.js';
export type { CrawlerConfig, RawCrawlerConfig } from './config/config.js';
export type { ConfigErrorKind } from './config/errors.js';
export type { FetchResult, PageFetcher, PacerOptions } from './fetch/index.js';
export type { DiscoveryOptions, DiscoverySummary } from './crawl/index.js';
export type { ParseArticleOptions, DomNode, DomTree, ContainerStrategy } from './extract/index.js';
export type { ArticleRecord, ArticleMeta, ExtractionKind } from './article/article.js';
export type { SiteProfile, SiteProfileOverride } from './sites/site-profile.js';
export type { ArticleSink } from './storage/corpus-writer.js';
export type { CorpusArticle } from './corpus/corpus-registry.js';
export type { ScrapeOptions, ScrapeSummary } from './pipeline/run.js';
