/**
 * Validation and index of an on-disk corpus directory.
 *
 * A corpus is valid when it holds at least one <id>_raw.txt file, none of them
 * empty, and the ids form the dense run 1..n that the crawler assigns.
 */
import fs from 'node:fs/promises';
import path from 'node:path';
import { parseRawTextId } from '../article/paths.js';
import {
  DirectoryNotFoundError,
  EmptyDirectoryError,
  InconsistentDatasetError,
  NotADirectoryError,
} from './errors.js';
import { logger } from '../logger.js';

export interface CorpusArticle {
  readonly id: number;
  /** Not recorded in raw files; filled by readers that load metadata */
  readonly url: string | null;
  readonly rawTextPath: string;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

async function assertDirectory(directory: string): Promise<void> {
  try {
    const stats = await fs.stat(directory);
    if (!stats.isDirectory()) throw new NotADirectoryError(directory);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new DirectoryNotFoundError(directory);
    }
    throw error;
  }
}

export class CorpusRegistry {
  private constructor(
    readonly directory: string,
    readonly articles: ReadonlyMap<number, CorpusArticle>
  ) {}

  /**
   * Validate `directory` and index its articles.
   * Throws DirectoryNotFoundError, NotADirectoryError, EmptyDirectoryError or
   * InconsistentDatasetError.
   */
  static async open(directory: string): Promise<CorpusRegistry> {
    await assertDirectory(directory);

    const entries = await fs.readdir(directory, { withFileTypes: true });
    const rawFiles = entries.flatMap((entry) => {
      const id = entry.isFile() ? parseRawTextId(entry.name) : null;
      return id === null ? [] : [{ id, name: entry.name, filePath: path.join(directory, entry.name) }];
    });

    if (rawFiles.length === 0) {
      throw new EmptyDirectoryError(directory);
    }

    for (const file of rawFiles) {
      const { size } = await fs.stat(file.filePath);
      if (size === 0) {
        throw new InconsistentDatasetError(`Empty file: ${file.name}`);
      }
    }

    const ids = rawFiles.map((file) => file.id).sort((a, b) => a - b);
    const dense = ids.every((id, index) => id === index + 1);
    if (!dense) {
      throw new InconsistentDatasetError(
        `Article ids are not the sequence 1..${ids.length}: [${ids.join(', ')}]`
      );
    }

    const articles = new Map<number, CorpusArticle>();
    for (const file of rawFiles) {
      articles.set(file.id, { id: file.id, url: null, rawTextPath: file.filePath });
    }

    logger.debug({ directory, articles: articles.size }, 'Corpus opened');
    return new CorpusRegistry(directory, articles);
  }

  get size(): number {
    return this.articles.size;
  }

  /** Ids in ascending order */
  ids(): number[] {
    return [...this.articles.keys()].sort((a, b) => a - b);
  }

  async readRawText(id: number): Promise<string> {
    const article = this.articles.get(id);
    if (!article) {
      throw new RangeError(`No article with id ${id} in ${this.directory}`);
    }
    return fs.readFile(article.rawTextPath, 'utf-8');
  }
}
