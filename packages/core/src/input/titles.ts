/**
 * Title list reader
 *
 * Reads the plain-text list of page titles, one per line.
 */

import { readFile } from 'node:fs/promises';
import { InputFileMissingError } from '../errors.js';

/**
 * Split text into trimmed, non-empty lines, keeping file order
 */
export function parseTitleList(text: string): string[] {
  const titles: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const title = line.trim();
    if (title) {
      titles.push(title);
    }
  }
  return titles;
}

/**
 * Read a title list from a UTF-8 file
 *
 * @throws InputFileMissingError when the file does not exist
 */
export async function readTitleList(path: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new InputFileMissingError(path);
    }
    throw error;
  }
  return parseTitleList(text);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
