/**
 * Finds files in a single directory by exact name or by `stem.*` wildcard.
 */

import { readdirSync, statSync, type Dirent } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

/** Suffix that makes a query match any extension */
export const WILDCARD_EXTENSION = '.*';

/**
 * Directory scan boundary used by ResourceLoader.
 * Every query gets an entry; the paths are in the order candidates should be tried.
 */
export interface DirectoryScanner {
  scan(directory: string, queries: readonly string[]): Map<string, string[]>;
}

export function isWildcardQuery(query: string): boolean {
  return query.endsWith(WILDCARD_EXTENSION);
}

/**
 * Expands a leading `~` to the current user's home directory.
 */
export function expandHome(directory: string): string {
  if (directory === '~') {
    return homedir();
  }
  if (directory.startsWith('~/')) {
    return join(homedir(), directory.slice(2));
  }
  return directory;
}

function matchesQuery(fileName: string, query: string): boolean {
  if (isWildcardQuery(query)) {
    const stem = query.slice(0, -WILDCARD_EXTENSION.length);
    return fileName.startsWith(`${stem}.`);
  }
  return fileName === query;
}

const UNREADABLE_DIRECTORY_CODES = new Set(['ENOENT', 'ENOTDIR', 'EACCES', 'EPERM']);

function isUnreadableDirectory(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    UNREADABLE_DIRECTORY_CODES.has(error.code)
  );
}

function isFileEntry(directory: string, entry: Dirent): boolean {
  if (entry.isFile()) {
    return true;
  }
  if (!entry.isSymbolicLink()) {
    return false;
  }
  try {
    const target = statSync(join(directory, entry.name), { throwIfNoEntry: false });
    return target?.isFile() ?? false;
  } catch (error) {
    // A link cycle resolves to nothing, like a dangling link
    if (error instanceof Error && 'code' in error && error.code === 'ELOOP') {
      return false;
    }
    throw error;
  }
}

/**
 * Scans `directory` for each query. Matches come back in lexical file-name
 * order; a directory that does not exist or cannot be read matches nothing.
 */
export function scanFiles(directory: string, ...queries: string[]): Map<string, string[]> {
  const root = expandHome(directory);
  const matches = new Map<string, string[]>(queries.map((query) => [query, []]));

  let entries: Dirent[];
  try {
    entries = readdirSync(root, { withFileTypes: true });
  } catch (error) {
    if (isUnreadableDirectory(error)) {
      return matches;
    }
    throw error;
  }

  const fileNames = entries
    .filter((entry) => isFileEntry(root, entry))
    .map((entry) => entry.name)
    .sort();

  for (const [query, paths] of matches) {
    for (const fileName of fileNames) {
      if (matchesQuery(fileName, query)) {
        paths.push(join(root, fileName));
      }
    }
  }

  return matches;
}

/**
 * DirectoryScanner backed by scanFiles.
 */
export const fileScanner: DirectoryScanner = {
  scan: (directory, queries) => scanFiles(directory, ...queries),
};
