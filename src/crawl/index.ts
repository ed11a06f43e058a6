/**
 * Crawl module barrel exports
 */
export { DiscoverySession, discoverArticleUrls } from './discovery.js';
export { resolveArticleLink, normalizeUrl, candidateLinks } from './link-extractor.js';
export type { DiscoveryOptions, DiscoverySummary } from './types.js';
