import fs from 'node:fs/promises';
import path from 'node:path';

import { err, ok, type Result } from 'neverthrow';

import type { FileSourceError } from '../../common/types/errors.js';

export const readTextFile = async (filePath: string): Promise<Result<string, FileSourceError>> => {
  try {
    return ok(await fs.readFile(filePath, 'utf8'));
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      return err({ type: 'NotFound', message: `File not found at ${filePath}` });
    }

    return err({
      type: 'ReadError',
      message: `Failed to read ${filePath}: ${(error as Error).message}`,
    });
  }
};

/**
 * Writes a JSON document (two-space indent, trailing newline), creating parent
 * directories as needed.
 */
export const writeJsonFile = async (filePath: string, value: unknown): Promise<void> => {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, 'utf8');
};

export const writeTextFile = async (filePath: string, contents: string): Promise<void> => {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, contents, 'utf8');
};

/**
 * Reads a JSON document. A missing file is `ok(null)`; unreadable or malformed files
 * are errors.
 */
export const readJsonFile = async (
  filePath: string
): Promise<Result<unknown, FileSourceError | { type: 'ParseError'; message: string }>> => {
  const text = await readTextFile(filePath);
  if (text.isErr()) {
    return text.error.type === 'NotFound' ? ok(null) : err(text.error);
  }

  try {
    const parsed: unknown = JSON.parse(text.value);
    return ok(parsed);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse JSON at ${filePath}: ${(error as Error).message}`,
    });
  }
};
