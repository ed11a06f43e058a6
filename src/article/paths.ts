/**
 * File naming inside a corpus directory: <id>_raw.txt, <id>_meta.json, <id>_cleaned.txt
 */
import path from 'node:path';

export const RAW_TEXT_PATTERN = /^(\d+)_raw\.txt$/;

export function rawTextFileName(id: number): string {
  return `${id}_raw.txt`;
}

export function metaFileName(id: number): string {
  return `${id}_meta.json`;
}

export function cleanedTextFileName(id: number): string {
  return `${id}_cleaned.txt`;
}

/** Article id encoded in a raw-text file name, or null for any other file. */
export function parseRawTextId(fileName: string): number | null {
  const match = RAW_TEXT_PATTERN.exec(fileName);
  return match ? Number(match[1]) : null;
}

/** Output directory: explicit argument, then ASSETS_PATH, then the default. */
export function resolveAssetsDir(explicit: string | undefined, fallback: string): string {
  return path.resolve(explicit ?? process.env.ASSETS_PATH ?? fallback);
}
