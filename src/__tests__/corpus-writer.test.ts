import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { FileCorpusWriter, prepareWorkspace, WorkspaceError } from '../storage/corpus-writer.js';
import { createArticle, NOT_FOUND, toArticleMeta } from '../article/article.js';
import { parseRawTextId, resolveAssetsDir } from '../article/paths.js';
import { CorpusRegistry } from '../corpus/corpus-registry.js';

describe('createArticle', () => {
  it('fills absent metadata with sentinels', () => {
    const record = createArticle({
      id: 1,
      url: 'https://example.test/news/1',
      text: 'Body text.',
      extraction: 'content',
      method: 'by-tag:article',
      title: '',
      authors: [],
    });

    expect(record.title).toBe(NOT_FOUND);
    expect(record.authors).toEqual([NOT_FOUND]);
    expect(record.publishedAt).toBeNull();
    expect(record.topics).toEqual([]);
  });

  it.each([0, -1, 1.5])('rejects id %s', (id) => {
    expect(() =>
      createArticle({ id, url: 'u', text: 'Body.', extraction: 'content', method: 'm' })
    ).toThrow(RangeError);
  });

  it('rejects empty text', () => {
    expect(() =>
      createArticle({ id: 1, url: 'u', text: '', extraction: 'content', method: 'm' })
    ).toThrow('Article 1 has empty text');
  });

  it('serializes the date as ISO 8601 in metadata', () => {
    const record = createArticle({
      id: 2,
      url: 'https://example.test/news/2',
      text: 'Body.',
      extraction: 'fallback-text',
      method: 'by-body-fallback',
      title: 'Title',
      publishedAt: new Date(Date.UTC(2024, 2, 12, 14, 30)),
      topics: ['City'],
    });

    expect(toArticleMeta(record)).toEqual({
      id: 2,
      url: 'https://example.test/news/2',
      title: 'Title',
      author: [NOT_FOUND],
      date: '2024-03-12T14:30:00.000Z',
      topics: ['City'],
      extraction: 'fallback-text',
      method: 'by-body-fallback',
    });
  });
});

describe('article/paths', () => {
  const originalEnv = { ...process.env };

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('parses ids only from raw text file names', () => {
    expect(parseRawTextId('12_raw.txt')).toBe(12);
    expect(parseRawTextId('12_meta.json')).toBeNull();
    expect(parseRawTextId('x_raw.txt')).toBeNull();
  });

  it('resolves the output directory from the argument, then ASSETS_PATH', () => {
    process.env.ASSETS_PATH = '/env/articles';
    expect(resolveAssetsDir('/explicit', 'fallback')).toBe('/explicit');
    expect(resolveAssetsDir(undefined, 'fallback')).toBe('/env/articles');
    delete process.env.ASSETS_PATH;
    expect(resolveAssetsDir(undefined, 'fallback')).toBe(path.resolve('fallback'));
  });
});

describe('FileCorpusWriter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(tmpdir(), 'corpus-crawler-writer-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes raw text and metadata that the registry can open', async () => {
    const writer = new FileCorpusWriter(dir);
    const record = createArticle({
      id: 1,
      url: 'https://example.test/news/1',
      text: 'Первая строка.\nSecond line.',
      extraction: 'content',
      method: 'by-class:div.entry-content',
      title: 'Заголовок',
    });

    await writer.save(record);

    const registry = await CorpusRegistry.open(dir);
    expect(await registry.readRawText(1)).toBe('Первая строка.\nSecond line.');

    const meta: unknown = JSON.parse(await fs.readFile(path.join(dir, '1_meta.json'), 'utf-8'));
    expect(meta).toEqual(toArticleMeta(record));
  });

  it('prepareWorkspace empties an existing directory', async () => {
    await fs.writeFile(path.join(dir, '9_raw.txt'), 'stale', 'utf-8');

    await prepareWorkspace(dir);

    expect(await fs.readdir(dir)).toEqual([]);
  });

  it('prepareWorkspace creates missing parents', async () => {
    const nested = path.join(dir, 'a', 'b');
    await prepareWorkspace(nested);
    expect((await fs.stat(nested)).isDirectory()).toBe(true);
  });

  it('prepareWorkspace wraps filesystem failures in a WorkspaceError', async () => {
    const file = path.join(dir, 'occupied');
    await fs.writeFile(file, 'not a directory', 'utf-8');
    const target = path.join(file, 'articles');

    const error: unknown = await prepareWorkspace(target).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WorkspaceError);
    expect(error).toMatchObject({ directory: target });
    if (error instanceof WorkspaceError) {
      expect(error.message.startsWith(`Cannot prepare output directory ${target}: `)).toBe(true);
    }
  });
});
