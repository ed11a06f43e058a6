/**
 * Crawler configuration: loading, defaults and validation
 */
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import {
  CONFIG_DEFAULTS,
  DEFAULT_CONFIG_PATH,
  NUM_ARTICLES_UPPER_LIMIT,
  SEED_URL_PATTERN,
  TIMEOUT_LOWER_LIMIT,
  TIMEOUT_UPPER_LIMIT,
} from './constants.js';
import {
  type ConfigError,
  ConfigFileError,
  EncodingError,
  HeaderError,
  IncorrectNumberOfArticlesError,
  NumberOfArticlesOutOfRangeError,
  SeedUrlError,
  TimeoutError,
  VerifyError,
} from './errors.js';
import { logger } from '../logger.js';

export interface CrawlerConfig {
  readonly seedUrls: readonly string[];
  readonly totalArticles: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly encoding: string;
  /** Seconds */
  readonly timeout: number;
  readonly shouldVerifyCertificate: boolean;
  /** Reserved for a browser-based fetch policy; plain HTTP fetching ignores it. */
  readonly headlessMode: boolean;
}

/** Shape of the JSON document on disk. */
export interface RawCrawlerConfig {
  seed_urls?: unknown;
  total_articles_to_find_and_parse?: unknown;
  headers?: unknown;
  encoding?: unknown;
  timeout?: unknown;
  should_verify_certificate?: unknown;
  headless_mode?: unknown;
}

const NO_LINE_BREAKS = /^[^\r\n]*$/;

function isSupportedEncoding(label: string): boolean {
  try {
    new TextDecoder(label);
    return true;
  } catch {
    return false;
  }
}

// --- Zod field schemas (checked one at a time, in this order) ---

const SeedUrlsSchema = z
  .array(z.string().regex(SEED_URL_PATTERN, 'seed URL must match https?://<host>/'))
  .min(1, 'at least one seed URL is required');

const HeadersSchema = z.record(
  z.string().regex(NO_LINE_BREAKS, 'header name contains a line break'),
  z.string().regex(NO_LINE_BREAKS, 'header value contains a line break')
);

const ArticleCountSchema = z.number().int().min(1);

const EncodingSchema = z
  .string()
  .min(1)
  .refine(isSupportedEncoding, (label) => ({ message: `unknown encoding "${label}"` }));

const TimeoutSchema = z.number().int().gt(TIMEOUT_LOWER_LIMIT).lt(TIMEOUT_UPPER_LIMIT);

const FlagSchema = z.boolean();

function check<T>(
  schema: z.ZodType<T>,
  value: unknown,
  fail: (detail: string) => ConfigError
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw fail(result.error.issues[0]?.message ?? 'invalid value');
  }
  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a raw configuration document. Checks run in a fixed order and the
 * first failing check throws; no defaults are applied here.
 */
export function validateConfig(raw: unknown): CrawlerConfig {
  const doc: RawCrawlerConfig = isRecord(raw) ? raw : {};

  const seedUrls = check(
    SeedUrlsSchema,
    doc.seed_urls,
    (detail) => new SeedUrlError(`Invalid seed_urls: ${detail}`)
  );

  const headers = check(
    HeadersSchema,
    doc.headers,
    (detail) => new HeaderError(`Invalid headers: ${detail}`)
  );

  const totalArticles = check(
    ArticleCountSchema,
    doc.total_articles_to_find_and_parse,
    (detail) =>
      new IncorrectNumberOfArticlesError(
        `total_articles_to_find_and_parse must be a positive integer: ${detail}`
      )
  );
  if (totalArticles > NUM_ARTICLES_UPPER_LIMIT) {
    throw new NumberOfArticlesOutOfRangeError(
      `total_articles_to_find_and_parse must not exceed ${NUM_ARTICLES_UPPER_LIMIT}, got ${totalArticles}`
    );
  }

  const encoding = check(
    EncodingSchema,
    doc.encoding,
    (detail) => new EncodingError(`Invalid encoding: ${detail}`)
  );

  const timeout = check(
    TimeoutSchema,
    doc.timeout,
    (detail) =>
      new TimeoutError(
        `timeout must be an integer between ${TIMEOUT_LOWER_LIMIT} and ${TIMEOUT_UPPER_LIMIT} (exclusive): ${detail}`
      )
  );

  const shouldVerifyCertificate = check(
    FlagSchema,
    doc.should_verify_certificate,
    (detail) => new VerifyError(`should_verify_certificate must be a boolean: ${detail}`)
  );

  const headlessMode = check(
    FlagSchema,
    doc.headless_mode,
    (detail) => new VerifyError(`headless_mode must be a boolean: ${detail}`)
  );

  return Object.freeze({
    seedUrls: Object.freeze([...seedUrls]),
    totalArticles,
    headers: Object.freeze({ ...headers }),
    encoding,
    timeout,
    shouldVerifyCertificate,
    headlessMode,
  });
}

/**
 * Resolve the configuration path: explicit argument, then CRAWLER_CONFIG_PATH,
 * then config/crawler.json under the project root.
 */
export function resolveConfigPath(explicit?: string): string {
  return explicit ?? process.env.CRAWLER_CONFIG_PATH ?? DEFAULT_CONFIG_PATH;
}

/**
 * Read the JSON configuration document, fill absent fields with defaults and validate it.
 */
export function loadConfig(path: string = resolveConfigPath()): CrawlerConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigFileError(`Cannot read configuration at ${path}: ${String(error)}`);
  }

  if (!isRecord(parsed)) {
    throw new ConfigFileError(`Configuration at ${path} must be a JSON object`);
  }

  const config = validateConfig({ ...CONFIG_DEFAULTS, ...parsed });
  logger.debug(
    { path, seeds: config.seedUrls.length, totalArticles: config.totalArticles },
    'Configuration loaded'
  );
  return config;
}
