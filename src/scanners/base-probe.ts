import { lstat } from 'fs/promises';
import { basename, join } from 'path';
import type { CategoryProbe, FileItem, ProbeId, ScanResult, ScannerOptions } from '../types.js';
import { exists, getSize, readEntries } from '../utils/index.js';

export interface ProbeLocation {
  path: string;
  /** List the children of `path` as separate items instead of taking it whole. */
  expand?: boolean;
  label?: string;
  prefix?: string;
  directoriesOnly?: boolean;
  exclude?: readonly string[];
}

export abstract class BaseProbe implements CategoryProbe {
  abstract readonly id: ProbeId;
  abstract readonly category: string;
  abstract scan(options: ScannerOptions): Promise<ScanResult>;

  protected createResult(items: FileItem[]): ScanResult {
    return {
      category: this.category,
      items,
      total: items.reduce((sum, item) => sum + item.size, 0),
    };
  }

  protected announce(options: ScannerOptions, items: readonly FileItem[]): void {
    for (const item of items) {
      options.progress?.offer({ category: this.category, path: item.path, size: item.size });
    }
  }

  protected async collectLocation(location: ProbeLocation, minSize = 0): Promise<FileItem[]> {
    if (!(await exists(location.path))) return [];

    if (!location.expand) {
      const size = await getSize(location.path);
      if (size <= minSize) return [];
      return [{
        path: location.path,
        name: location.label ?? `${location.prefix ?? ''}${basename(location.path)}`,
        size,
        isDirectory: true,
      }];
    }

    const items: FileItem[] = [];
    const excluded = new Set(location.exclude ?? []);

    for (const entry of await readEntries(location.path)) {
      if (excluded.has(entry.name)) continue;
      if (location.directoriesOnly && !entry.isDirectory()) continue;

      const fullPath = join(location.path, entry.name);
      try {
        const stats = await lstat(fullPath);
        const size = await getSize(fullPath);
        if (size <= minSize) continue;
        items.push({
          path: fullPath,
          name: `${location.prefix ?? ''}${entry.name}`,
          size,
          isDirectory: stats.isDirectory(),
        });
      } catch {
        // Ignore entries we cannot stat
      }
    }

    return items;
  }
}
