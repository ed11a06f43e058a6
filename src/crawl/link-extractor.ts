/**
 * Candidate article links from a seed page
 */
import type { DomNode } from '../extract/dom.js';

const ABSOLUTE_HTTP = /^https?:\/\//i;

/**
 * Resolve an href to an absolute article URL.
 * Site-relative paths ("/news/1") are joined to `origin`; absolute http(s) URLs
 * pass through; protocol-relative, page-relative and non-http hrefs yield null.
 * Fragments are stripped.
 */
export function resolveArticleLink(href: string | null | undefined, origin: string): string | null {
  const value = href?.trim();
  if (!value) return null;

  let resolved: URL;
  try {
    if (value.startsWith('/') && !value.startsWith('//')) {
      resolved = new URL(value, origin);
    } else if (ABSOLUTE_HTTP.test(value)) {
      resolved = new URL(value);
    } else {
      return null;
    }
  } catch {
    // Invalid URL, skip
    return null;
  }

  if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return null;
  resolved.hash = '';
  return resolved.href;
}

/**
 * Normalize a URL for deduplication.
 * Strips fragments and removes trailing slashes (except root). Scheme and host
 * are lowercased by URL parsing.
 */
export function normalizeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    parsed.hash = '';

    if (parsed.pathname.length > 1 && parsed.pathname.endsWith('/')) {
      parsed.pathname = parsed.pathname.slice(0, -1);
    }

    return parsed.href;
  } catch {
    return url;
  }
}

/**
 * Yield resolved links for elements matching `selector`, in document order.
 * A matched element that is not itself a link contributes its first a[href].
 * Lazy, so callers can stop as soon as they have enough.
 */
export function* candidateLinks(
  root: DomNode,
  selector: string,
  origin: string
): Generator<string, void, undefined> {
  for (const el of root.findAll(selector)) {
    const href = el.attr('href') ?? el.findFirst('a[href]')?.attr('href');
    const url = resolveArticleLink(href, origin);
    if (url) yield url;
  }
}
