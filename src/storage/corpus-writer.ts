/**
 * Persistence of article records to a corpus directory
 */
import fs from 'node:fs/promises';
import path from 'node:path';
import { toArticleMeta, type ArticleRecord } from '../article/article.js';
import { metaFileName, rawTextFileName } from '../article/paths.js';
import { logger } from '../logger.js';

/** Where extracted records go. Called once per record, placeholders included. */
export interface ArticleSink {
  save(record: ArticleRecord): Promise<void>;
}

export class FileCorpusWriter implements ArticleSink {
  constructor(readonly directory: string) {}

  async save(record: ArticleRecord): Promise<void> {
    const rawPath = path.join(this.directory, rawTextFileName(record.id));
    const metaPath = path.join(this.directory, metaFileName(record.id));

    await fs.writeFile(rawPath, record.text, 'utf-8');
    await fs.writeFile(metaPath, JSON.stringify(toArticleMeta(record), null, 2), 'utf-8');

    logger.debug({ id: record.id, rawPath }, 'Article saved');
  }
}

/** The output directory could not be reset before a run */
export class WorkspaceError extends Error {
  constructor(
    readonly directory: string,
    cause: unknown
  ) {
    super(
      `Cannot prepare output directory ${directory}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = 'WorkspaceError';
  }
}

/**
 * Remove the output directory if present and recreate it empty.
 * Runs are never incremental.
 */
export async function prepareWorkspace(directory: string): Promise<void> {
  try {
    await fs.rm(directory, { recursive: true, force: true });
    await fs.mkdir(directory, { recursive: true });
  } catch (e) {
    throw new WorkspaceError(directory, e);
  }
  logger.debug({ directory }, 'Workspace prepared');
}
