import { readdir, realpath, stat } from 'node:fs/promises';
import type { Dirent, Stats } from 'node:fs';
import { join, resolve } from 'node:path';
import { NotADirectoryError, NotFoundError, PathError, errorCode } from '../errors.js';

export interface ScanOptions {
  recursive?: boolean;
  /**
   * Called for an entry below the root that cannot be read. The entry is
   * skipped and the walk continues.
   */
  onUnreadable?: (path: string, error: unknown) => void;
}

const MANIFEST_EXTENSIONS = ['.yaml', '.yml'];

export function isManifestFileName(name: string): boolean {
  return MANIFEST_EXTENSIONS.some((ext) => name.endsWith(ext));
}

function byCodePoint(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/**
 * Stat through symlinks. Broken links resolve to null.
 */
async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch (err) {
    const code = errorCode(err);
    if (code === 'ENOENT' || code === 'ELOOP') return null;
    throw err;
  }
}

/**
 * Find manifest files under a directory.
 *
 * Entries are visited depth-first in code-point order of their names, so the
 * yielded paths are in lexicographic order of their path segments. Symlinked
 * directories are followed in recursive mode; each real directory is walked
 * at most once, which also breaks link cycles.
 */
export async function* scanManifests(
  root: string,
  options: ScanOptions = {},
): AsyncGenerator<string, void, undefined> {
  const rootPath = resolve(root);

  let rootStats: Stats;
  try {
    rootStats = await stat(rootPath);
  } catch (err) {
    const code = errorCode(err);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      throw new NotFoundError(rootPath, { cause: err });
    }
    throw new PathError(`Cannot access input directory: ${rootPath}`, rootPath, { cause: err });
  }
  if (!rootStats.isDirectory()) {
    throw new NotADirectoryError(rootPath);
  }

  let rootReal: string;
  let entries: Dirent[];
  try {
    rootReal = await realpath(rootPath);
    entries = await readdir(rootPath, { withFileTypes: true });
  } catch (err) {
    throw new PathError(`Cannot read input directory: ${rootPath}`, rootPath, { cause: err });
  }

  const walker: Walker = {
    recursive: options.recursive ?? false,
    visited: new Set([rootReal]),
    onUnreadable: options.onUnreadable,
  };
  yield* walk(rootPath, entries, walker);
}

interface Walker {
  recursive: boolean;
  visited: Set<string>;
  onUnreadable?: (path: string, error: unknown) => void;
}

async function* walk(
  dir: string,
  entries: Dirent[],
  walker: Walker,
): AsyncGenerator<string, void, undefined> {
  entries.sort((a, b) => byCodePoint(a.name, b.name));

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    let isFile = entry.isFile();
    let isDirectory = entry.isDirectory();
    if (entry.isSymbolicLink()) {
      let target: Stats | null;
      try {
        target = await statOrNull(fullPath);
      } catch (err) {
        walker.onUnreadable?.(fullPath, err);
        continue;
      }
      if (!target) continue;
      isFile = target.isFile();
      isDirectory = target.isDirectory();
    }

    if (isFile) {
      if (isManifestFileName(entry.name)) yield fullPath;
      continue;
    }

    if (!isDirectory || !walker.recursive) continue;

    let real: string;
    let children: Dirent[];
    try {
      real = await realpath(fullPath);
      if (walker.visited.has(real)) continue;
      children = await readdir(fullPath, { withFileTypes: true });
    } catch (err) {
      walker.onUnreadable?.(fullPath, err);
      continue;
    }
    walker.visited.add(real);
    yield* walk(fullPath, children, walker);
  }
}

/**
 * Drain the scanner into an array.
 */
export async function collectManifests(
  root: string,
  options: ScanOptions = {},
): Promise<string[]> {
  const files: string[] = [];
  for await (const file of scanManifests(root, options)) {
    files.push(file);
  }
  return files;
}
