/**
 * Single-shot HTTP GET used by discovery and extraction.
 * Applies the run's headers, timeout and certificate policy, and decodes the
 * body with the configured encoding.
 */
import http from 'node:http';
import https from 'node:https';
import axios from 'axios';
import type { CrawlerConfig } from '../config/config.js';
import type { FetchResult } from './types.js';
import { logger } from '../logger.js';

/** Configuration constants */
const MAX_RESPONSE_SIZE = 10 * 1024 * 1024; // 10MB
const MAX_REDIRECTS = 5;

/** No keep-alive: each request stands alone, and no cookies are carried between them. */
const httpAgent = new http.Agent({ keepAlive: false });
const verifyingAgent = new https.Agent({ keepAlive: false, rejectUnauthorized: true });
const insecureAgent = new https.Agent({ keepAlive: false, rejectUnauthorized: false });

export type RequestConfig = Pick<
  CrawlerConfig,
  'headers' | 'timeout' | 'encoding' | 'shouldVerifyCertificate'
>;

/**
 * Decode raw bytes with an explicit encoding label. Malformed sequences become
 * U+FFFD instead of throwing.
 */
export function decodeBody(body: Buffer, encoding: string): string {
  return new TextDecoder(encoding).decode(body);
}

/** Describe a transport failure as "<code>: <message>" where a code is known. */
function describeTransportError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * GET a URL. Resolves for every outcome: a 2xx response, a non-2xx response,
 * or a transport failure. Retrying is left to callers.
 */
export async function fetchPage(url: string, config: RequestConfig): Promise<FetchResult> {
  const startTime = Date.now();
  const timeoutMs = config.timeout * 1000;

  logger.debug({ url, timeoutMs, verify: config.shouldVerifyCertificate }, 'Making request');

  try {
    const response = await axios.get<ArrayBuffer>(url, {
      headers: { ...config.headers },
      timeout: timeoutMs,
      signal: AbortSignal.timeout(timeoutMs),
      responseType: 'arraybuffer',
      httpAgent,
      httpsAgent: config.shouldVerifyCertificate ? verifyingAgent : insecureAgent,
      maxRedirects: MAX_REDIRECTS,
      maxContentLength: MAX_RESPONSE_SIZE,
      validateStatus: () => true,
    });

    const body = Buffer.from(response.data);
    const html = decodeBody(body, config.encoding);
    const ok = response.status >= 200 && response.status < 300;
    const latencyMs = Date.now() - startTime;

    logger.debug(
      { url, statusCode: response.status, bodyLength: body.length, latencyMs },
      'Request complete'
    );

    return {
      outcome: ok ? 'success' : 'http_status_error',
      url,
      statusCode: response.status,
      body,
      html,
      encoding: config.encoding,
      latencyMs,
    };
  } catch (error) {
    const description = describeTransportError(error);
    logger.warn({ url, error: description }, 'Request failed');
    return {
      outcome: 'transport_error',
      url,
      statusCode: 0,
      error: description,
      latencyMs: Date.now() - startTime,
    };
  }
}
