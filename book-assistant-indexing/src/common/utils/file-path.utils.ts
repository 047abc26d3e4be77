/**
 * Utility functions for output file paths
 * Existing files are never overwritten: `name.ext`, then `name_1.ext`,
 * `name_2.ext`, ... until a free name is found.
 */

import { access, writeFile } from 'fs/promises';
import { join, parse } from 'path';

function candidatePath(filePath: string, attempt: number): string {
  if (attempt === 0) {
    return filePath;
  }
  const { dir, name, ext } = parse(filePath);
  return join(dir, `${name}_${attempt}${ext}`);
}

function isAlreadyExistsError(error: unknown): boolean {
  return (
    error instanceof Error && 'code' in error && error.code === 'EEXIST'
  );
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * First path in the suffix sequence that does not exist yet
 */
export async function resolveAvailablePath(filePath: string): Promise<string> {
  let attempt = 0;
  while (await pathExists(candidatePath(filePath, attempt))) {
    attempt++;
  }
  return candidatePath(filePath, attempt);
}

/**
 * Write to the first free path in the suffix sequence
 * Uses exclusive create so concurrent writers never share a name.
 *
 * @returns The path actually written
 */
export async function writeFileWithoutOverwrite(
  filePath: string,
  data: string,
): Promise<string> {
  for (let attempt = 0; ; attempt++) {
    const candidate = candidatePath(filePath, attempt);
    try {
      await writeFile(candidate, data, { encoding: 'utf-8', flag: 'wx' });
      return candidate;
    } catch (error) {
      if (!isAlreadyExistsError(error)) {
        throw error;
      }
    }
  }
}

/**
 * File-system safe form of a book or chapter title
 * Example: "Alice's Adventures: Vol. 1" → "Alice_s_Adventures_Vol_1"
 */
export function toSafeFileName(value: string): string {
  const safe = value
    .replace(/[^\p{L}\p{N}\s_-]/gu, '_')
    .trim()
    .replace(/[\s_]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return safe.length > 0 ? safe.slice(0, 120) : 'untitled';
}
