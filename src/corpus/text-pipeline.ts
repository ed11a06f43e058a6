/**
 * Text cleaning over a validated corpus: writes <id>_cleaned.txt next to each raw text
 */
import fs from 'node:fs/promises';
import path from 'node:path';
import { cleanedTextFileName } from '../article/paths.js';
import type { CorpusRegistry } from './corpus-registry.js';
import { logger } from '../logger.js';

const NON_WORD = /[^\p{L}\p{M}\p{N}_\s]/gu;

/** Strip punctuation and symbols, lower-case, collapse whitespace. */
export function cleanText(raw: string): string {
  return raw.replace(NON_WORD, '').toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Clean every article in the registry. Articles whose text cleans down to
 * nothing are skipped. Returns the number of files written.
 */
export async function runCleaningPipeline(registry: CorpusRegistry): Promise<number> {
  let written = 0;

  for (const id of registry.ids()) {
    const cleaned = cleanText(await registry.readRawText(id));
    if (!cleaned) {
      logger.warn({ id }, 'Article has no words after cleaning, skipping');
      continue;
    }
    await fs.writeFile(path.join(registry.directory, cleanedTextFileName(id)), cleaned, 'utf-8');
    written++;
  }

  logger.info({ directory: registry.directory, written, total: registry.size }, 'Cleaning complete');
  return written;
}
