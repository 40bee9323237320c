import fs from 'fs/promises';
import * as path from 'path';
import type { Dirent } from 'fs';

/**
 * Sum the sizes of all regular files below `root`.
 *
 * Directories and symlinks contribute nothing. An entry that vanishes or
 * cannot be read while walking counts as zero; only a failure to read `root`
 * itself rejects.
 */
export async function getDirectoryUsedBytes(root: string): Promise<bigint> {
  const entries = await fs.readdir(root, { withFileTypes: true });
  return sumEntries(root, entries);
}

async function sumEntries(dir: string, entries: Dirent[]): Promise<bigint> {
  let total = 0n;

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);

    if (entry.isDirectory()) {
      total += await walkDirectory(entryPath);
    } else if (entry.isFile()) {
      total += await fileSize(entryPath);
    }
  }

  return total;
}

async function walkDirectory(dir: string): Promise<bigint> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch {
    return 0n;
  }
  return sumEntries(dir, entries);
}

async function fileSize(filePath: string): Promise<bigint> {
  try {
    const stats = await fs.lstat(filePath, { bigint: true });
    return stats.isFile() ? stats.size : 0n;
  } catch {
    return 0n;
  }
}
