/**
 * Shared types for the fetch module
 */

export type FetchOutcome = 'success' | 'http_status_error' | 'transport_error';

interface FetchResultBase {
  url: string;
  latencyMs: number;
}

/** A response arrived; `outcome` says whether its status was 2xx. */
export interface FetchResponse extends FetchResultBase {
  outcome: 'success' | 'http_status_error';
  statusCode: number;
  /** Raw body bytes as received */
  body: Buffer;
  /** Body decoded with the configured encoding, not the server-declared charset */
  html: string;
  encoding: string;
}

/** No response: DNS, connection, TLS, timeout or size-limit failure. */
export interface FetchTransportError extends FetchResultBase {
  outcome: 'transport_error';
  statusCode: 0;
  error: string;
}

export type FetchResult = FetchResponse | FetchTransportError;

/** Fetch one URL under the run's configuration. Never rejects. */
export type PageFetcher = (url: string) => Promise<FetchResult>;

export function isSuccessfulFetch(
  result: FetchResult
): result is FetchResponse & { outcome: 'success' } {
  return result.outcome === 'success';
}

/** Short human-readable reason for a failed fetch, used in logs and placeholders. */
export function describeFetchFailure(result: FetchResult): string {
  switch (result.outcome) {
    case 'success':
    case 'http_status_error':
      return `HTTP ${result.statusCode}`;
    case 'transport_error':
      return result.error;
  }
}
