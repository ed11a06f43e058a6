/**
 * Types for the crawl module
 */
import type { PageFetcher } from '../fetch/types.js';
import type { SiteProfile } from '../sites/site-profile.js';

export interface DiscoveryOptions {
  /** Shared fetcher for the run; a fresh paced fetcher is built when omitted */
  fetcher?: PageFetcher;
  /** Checked before every seed request; an aborted signal ends discovery early */
  signal?: AbortSignal;
  /** Profile lookup per seed URL, defaults to getSiteProfile */
  profileFor?: (url: string) => SiteProfile;
}

export interface DiscoverySummary {
  seedsTotal: number;
  seedsFetched: number;
  seedsSkipped: number;
  urlsFound: number;
  target: number;
  aborted: boolean;
  durationMs: number;
}
