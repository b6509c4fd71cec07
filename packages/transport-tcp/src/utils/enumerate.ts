/**
 * Directory Enumeration
 *
 * Read-only walk producing the file list a directory transfer streams.
 * Depth-first, names sorted inside each directory, regular files only.
 */

import * as path from 'node:path';
import type { TransferFileSystem } from '@filewire/core';

export interface EnumeratedFile {
  /** `/`-joined path relative to the enumerated root */
  relativePath: string;
  /** Path handed to the filesystem when the file is opened */
  sourcePath: string;
  size: number;
}

export interface DirectoryListing {
  entries: EnumeratedFile[];
  totalFiles: number;
  totalSize: number;
}

export async function enumerateDirectory(
  fs: TransferFileSystem,
  root: string,
): Promise<DirectoryListing> {
  const entries: EnumeratedFile[] = [];
  await walk(fs, root, '', entries);

  return {
    entries,
    totalFiles: entries.length,
    totalSize: entries.reduce((sum, entry) => sum + entry.size, 0),
  };
}

async function walk(
  fs: TransferFileSystem,
  root: string,
  relativeDir: string,
  out: EnumeratedFile[],
): Promise<void> {
  const dirPath = relativeDir ? path.join(root, relativeDir) : root;
  const names = (await fs.readdir(dirPath))
    .map((entry) => entry.name)
    .filter((name) => name !== '.' && name !== '..')
    .sort();

  for (const name of names) {
    const relativePath = relativeDir ? `${relativeDir}/${name}` : name;
    const sourcePath = path.join(root, relativePath);
    const stats = await fs.stat(sourcePath);

    if (stats.isDirectory) {
      await walk(fs, root, relativePath, out);
    } else if (stats.isFile) {
      out.push({ relativePath, sourcePath, size: stats.size });
    }
  }
}
