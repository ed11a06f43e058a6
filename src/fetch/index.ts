/**
 * Public API exports for the fetch module
 */
export { fetchPage, decodeBody } from './http-client.js';
export { RequestPacer, createFetcher, MIN_JITTER_MS, MAX_JITTER_MS } from './pacing.js';
export { isSuccessfulFetch, describeFetchFailure } from './types.js';
export type { RequestConfig } from './http-client.js';
export type { PacerOptions, Sleep, RandomSource } from './pacing.js';
export type {
  FetchResult,
  FetchResponse,
  FetchTransportError,
  FetchOutcome,
  PageFetcher,
} from './types.js';
