import { access, lstat, readdir, rm } from 'fs/promises';
import type { Dirent } from 'fs';
import { join } from 'path';
import type { FileItem } from '../types.js';

export async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

// Unlike `exists`, a dangling symlink still counts as present
export async function pathExists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch {
    return false;
  }
}

export async function readEntries(dirPath: string): Promise<Dirent[]> {
  try {
    return await readdir(dirPath, { withFileTypes: true });
  } catch {
    return [];
  }
}

/**
 * Sums the sizes of every non-directory entry below `dirPath`.
 * Unreadable subtrees and entries that vanish mid-walk contribute 0.
 */
export async function getDirectorySize(dirPath: string): Promise<number> {
  let size = 0;

  for (const entry of await readEntries(dirPath)) {
    const fullPath = join(dirPath, entry.name);
    if (entry.isDirectory()) {
      size += await getDirectorySize(fullPath);
      continue;
    }
    try {
      size += (await lstat(fullPath)).size;
    } catch {
      // Vanished or inaccessible
    }
  }

  return size;
}

export async function getSize(path: string): Promise<number> {
  try {
    const stats = await lstat(path);
    return stats.isDirectory() ? await getDirectorySize(path) : stats.size;
  } catch {
    return 0;
  }
}

/**
 * Lists the immediate children of `dirPath`, largest first.
 * Rejects when the directory itself cannot be read.
 */
export async function listDirectory(dirPath: string): Promise<FileItem[]> {
  const entries = await readdir(dirPath, { withFileTypes: true });
  const items: FileItem[] = [];

  for (const entry of entries) {
    const fullPath = join(dirPath, entry.name);
    try {
      const stats = await lstat(fullPath);
      const isDirectory = stats.isDirectory();
      items.push({
        path: fullPath,
        name: entry.name,
        size: isDirectory ? await getDirectorySize(fullPath) : stats.size,
        isDirectory,
      });
    } catch {
      // Entry disappeared between readdir and lstat
    }
  }

  return sortBySize(items);
}

export function sortBySize(items: readonly FileItem[]): FileItem[] {
  return [...items].sort((a, b) => b.size - a.size || a.name.localeCompare(b.name));
}

export async function removeItem(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}
