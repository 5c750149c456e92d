/**
 * Filesystem helpers shared by the collector, the matrix cells and the packager.
 *
 * @module @libforge/core/utils/fs
 */

import { readdir, stat } from 'node:fs/promises';
import { join, relative, sep } from 'node:path';

/**
 * True when `path` exists and is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * File found by a recursive walk
 */
export interface WalkedFile {
  /** Absolute path */
  path: string;
  /** Path relative to the walk root, always with `/` separators */
  relativePath: string;
  name: string;
}

/**
 * Recursively list regular files under `root`, sorted by relative path
 */
export async function walkFiles(root: string): Promise<WalkedFile[]> {
  const files: WalkedFile[] = [];

  async function visit(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        await visit(path);
      } else if (entry.isFile()) {
        files.push({
          path,
          relativePath: relative(root, path).split(sep).join('/'),
          name: entry.name,
        });
      }
    }
  }

  await visit(root);
  return files.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));
}
