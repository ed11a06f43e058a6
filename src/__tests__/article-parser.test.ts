import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { extractArticle, parseArticle } from '../extract/article-parser.js';
import { extractMetadata, extractRawDate, extractTopics } from '../extract/metadata.js';
import { parseDocument } from '../extract/dom.js';
import { DEFAULT_PROFILE } from '../sites/site-profile.js';
import { NOT_FOUND } from '../article/article.js';
import type { FetchResult } from '../fetch/types.js';
import {
  articlePage,
  fakeFetcher,
  loremText,
  makeConfig,
  makeTransportError,
} from './test-helpers.js';

const ARTICLE_URL = 'https://example.test/news/1';
const NOW = new Date(Date.UTC(2024, 2, 12, 8, 0, 0));
const profile = { ...DEFAULT_PROFILE };

describe('extract/metadata', () => {
  it('reads title, date and topics from the page', () => {
    const tree = parseDocument(
      articlePage({
        title: '  City prepares\n for winter ',
        date: '12 марта 2024, 14:30',
        topics: ['City', 'Winter', 'City'],
        paragraphs: ['Body.'],
      })
    );

    expect(extractMetadata(tree, profile, ARTICLE_URL, NOW)).toEqual({
      title: 'City prepares for winter',
      authors: [NOT_FOUND],
      publishedAt: new Date(Date.UTC(2024, 2, 12, 14, 30)),
      topics: ['City', 'Winter'],
    });
  });

  it('falls back to the date block text when it has no link', () => {
    const tree = parseDocument('<div class="article__info-date"> 05.03.2024 09:15 </div>');
    expect(extractRawDate(tree, profile)).toBe('05.03.2024 09:15');
  });

  it('fills sentinels when the page has no metadata', () => {
    const tree = parseDocument('<p>Nothing here.</p>');
    expect(extractMetadata(tree, profile, ARTICLE_URL, NOW)).toEqual({
      title: NOT_FOUND,
      authors: [NOT_FOUND],
      publishedAt: null,
      topics: [],
    });
  });

  it('leaves the date null when it does not parse', () => {
    const tree = parseDocument(articlePage({ date: 'a while ago' }));
    expect(extractMetadata(tree, profile, ARTICLE_URL, NOW).publishedAt).toBeNull();
  });

  it('drops blank topic labels', () => {
    const tree = parseDocument('<a rel="tag" href="/t/1"> </a><a rel="nofollow tag" href="/t/2">Sport</a>');
    expect(extractTopics(tree, profile)).toEqual(['Sport']);
  });
});

describe('extractArticle', () => {
  it('builds a content record from the profile container', () => {
    const first = loremText(150);
    const second = loremText(100);
    const html = articlePage({
      title: 'City prepares for winter',
      date: '12 марта 2024, 14:30',
      topics: ['City'],
      paragraphs: [first, second],
    });

    const record = extractArticle(html, ARTICLE_URL, 1, profile, NOW);

    expect(record).toEqual({
      id: 1,
      url: ARTICLE_URL,
      title: 'City prepares for winter',
      authors: [NOT_FOUND],
      publishedAt: new Date(Date.UTC(2024, 2, 12, 14, 30)),
      topics: ['City'],
      text: `${first}\n${second}`,
      extraction: 'content',
      method: 'by-class:div.entry-content',
    });
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('returns a placeholder naming the URL for an empty body', () => {
    const record = extractArticle('<html><body></body></html>', ARTICLE_URL, 3, profile, NOW);

    expect(record.id).toBe(3);
    expect(record.extraction).toBe('placeholder');
    expect(record.method).toBe('placeholder');
    expect(record.title).toBe(NOT_FOUND);
    expect(record.text).toBe(
      'No article text could be extracted from https://example.test/news/1. Reason: no content container.'
    );
  });

  it('extracts text from a document that omits the body tag', () => {
    const body = loremText(270);
    const html = `<!DOCTYPE html><html lang="ru"><head><title>Page</title></head><div class="wrap"><p>${body}</p></div></html>`;

    const record = extractArticle(html, ARTICLE_URL, 4, profile, NOW);

    expect(record.extraction).toBe('content');
    expect(record.method).toBe('by-body-fallback');
    expect(record.text).toBe(body);
  });

  it('keeps metadata when the body is too short', () => {
    const html = articlePage({ title: 'Brief', paragraphs: ['Too short.'] });

    const record = extractArticle(html, ARTICLE_URL, 2, profile, NOW);

    expect(record.title).toBe('Brief');
    expect(record.extraction).toBe('placeholder');
    expect(record.text).toContain('extracted text shorter than 50 characters');
    expect(record.text.length).toBeGreaterThanOrEqual(50);
  });
});

describe('parseArticle', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('fetches and extracts through the given fetcher', async () => {
    const body = loremText(250);
    const fetcher = fakeFetcher({
      [ARTICLE_URL]: articlePage({ title: 'Fetched', paragraphs: [body] }),
    });

    const record = await parseArticle(ARTICLE_URL, 4, makeConfig(), {
      fetcher,
      profile,
      now: NOW,
    });

    expect(fetcher).toHaveBeenCalledWith(ARTICLE_URL);
    expect(record).toMatchObject({ id: 4, title: 'Fetched', text: body, extraction: 'content' });
  });

  it('returns a placeholder for a refused connection', async () => {
    const fetcher = fakeFetcher({ [ARTICLE_URL]: makeTransportError(ARTICLE_URL) });

    const record = await parseArticle(ARTICLE_URL, 1, makeConfig(), { fetcher, profile });

    expect(record.extraction).toBe('placeholder');
    expect(record.text).toBe(
      'No article text could be extracted from https://example.test/news/1. Reason: ECONNREFUSED: connect ECONNREFUSED 127.0.0.1:443.'
    );
    expect(record.title).toBe(NOT_FOUND);
  });

  it('returns a placeholder for a non-2xx response', async () => {
    const record = await parseArticle(ARTICLE_URL, 1, makeConfig(), {
      fetcher: fakeFetcher({}),
      profile,
    });

    expect(record.text).toBe(
      'No article text could be extracted from https://example.test/news/1. Reason: HTTP 404.'
    );
  });

  it('returns a placeholder when the fetcher itself throws', async () => {
    const fetcher = vi.fn(async (_url: string): Promise<FetchResult> => {
      throw new Error('boom');
    });

    const record = await parseArticle(ARTICLE_URL, 6, makeConfig(), { fetcher, profile });

    expect(record.id).toBe(6);
    expect(record.text).toBe(
      'No article text could be extracted from https://example.test/news/1. Reason: extraction error: Error: boom.'
    );
  });
});
