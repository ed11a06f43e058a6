/**
 * Limits and defaults for crawler configuration
 */
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

export const NUM_ARTICLES_UPPER_LIMIT = 150;
export const TIMEOUT_LOWER_LIMIT = 0;
export const TIMEOUT_UPPER_LIMIT = 60;

/** Seed URLs must carry a scheme and at least one slash after the host. */
export const SEED_URL_PATTERN = /^https?:\/\/.*\//;

export const PROJECT_ROOT = join(dirname(fileURLToPath(import.meta.url)), '..', '..');

export const DEFAULT_CONFIG_PATH = join(PROJECT_ROOT, 'config', 'crawler.json');
export const DEFAULT_SITES_PATH = join(PROJECT_ROOT, 'config', 'sites.json');

/** Output directory used when neither ASSETS_PATH nor --out is given. */
export const DEFAULT_ASSETS_DIR = join('tmp', 'articles');

export const CONFIG_DEFAULTS = {
  seed_urls: [],
  total_articles_to_find_and_parse: 0,
  headers: {},
  encoding: 'utf-8',
  timeout: 30,
  should_verify_certificate: true,
  headless_mode: true,
} as const;
