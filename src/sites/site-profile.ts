/**
 * Site-specific selector profiles for link discovery and article extraction
 *
 * The built-in default targets the WordPress-style news layout the crawler was
 * written for. Per-host overrides are read from config/sites.json (or the file
 * named by SITE_PROFILES_PATH) and merged over the default.
 */
import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';
import { DEFAULT_SITES_PATH } from '../config/constants.js';
import { logger } from '../logger.js';

export interface SiteProfile {
  /** Anchors on a seed page that point at articles, in document order */
  linkSelector: string;
  /** Known article-body containers, most specific first */
  contentSelectors: string[];
  titleSelector: string;
  /** Element whose first anchor holds the publication date */
  dateSelector: string;
  topicSelector: string;
  /** Candidate URLs containing any of these substrings are never collected */
  excludeUrlSubstrings: string[];
}

export const DEFAULT_PROFILE: Readonly<SiteProfile> = Object.freeze({
  linkSelector: 'a.list-item__title, h1.entry-title a',
  contentSelectors: [
    'div.entry-content',
    'div.article__content',
    'div.article-body',
    '[itemprop="articleBody"]',
    'div.post-content',
  ],
  titleSelector: 'div.article__title, h1.entry-title',
  dateSelector: 'div.article__info-date',
  topicSelector: 'a[rel~="tag"]',
  excludeUrlSubstrings: [],
});

// --- Zod validation schema ---

export const SiteProfileOverrideSchema = z.object({
  linkSelector: z.string().min(1).optional(),
  contentSelectors: z.array(z.string().min(1)).optional(),
  titleSelector: z.string().min(1).optional(),
  dateSelector: z.string().min(1).optional(),
  topicSelector: z.string().min(1).optional(),
  excludeUrlSubstrings: z.array(z.string().min(1)).optional(),
});

export type SiteProfileOverride = z.infer<typeof SiteProfileOverrideSchema>;

/**
 * Parse the host → override map of a sites.json document.
 * Invalid entries are logged and skipped so one bad host does not drop the rest.
 */
export function parseSiteProfilesJson(raw: unknown): Record<string, SiteProfileOverride> {
  const profiles: Record<string, SiteProfileOverride> = {};
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return profiles;

  for (const [host, value] of Object.entries(raw)) {
    const result = SiteProfileOverrideSchema.safeParse(value);
    if (result.success) {
      profiles[host.toLowerCase()] = result.data;
    } else {
      logger.warn({ host, error: result.error.message }, 'Skipping invalid site profile');
    }
  }
  return profiles;
}

export function loadSiteProfiles(path: string): Record<string, SiteProfileOverride> {
  if (!existsSync(path)) return {};
  try {
    return parseSiteProfilesJson(JSON.parse(readFileSync(path, 'utf-8')));
  } catch (error) {
    logger.warn({ path, error: String(error) }, 'Site profiles unreadable, using defaults');
    return {};
  }
}

const SITE_PROFILES = loadSiteProfiles(process.env.SITE_PROFILES_PATH ?? DEFAULT_SITES_PATH);

/**
 * Get the profile for a URL: an exact host match first, then parent domains,
 * then the default profile.
 */
export function getSiteProfile(
  url: string,
  overrides: Record<string, SiteProfileOverride> = SITE_PROFILES
): SiteProfile {
  let hostname: string;
  try {
    hostname = new URL(url).hostname.replace(/^www\./, '').replace(/^m\./, '');
  } catch {
    return { ...DEFAULT_PROFILE };
  }

  const parts = hostname.split('.');
  for (let i = 0; i < parts.length - 1; i++) {
    const override = overrides[parts.slice(i).join('.')];
    if (override) {
      return { ...DEFAULT_PROFILE, ...override };
    }
  }

  return { ...DEFAULT_PROFILE };
}
