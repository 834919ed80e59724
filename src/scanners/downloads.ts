import { lstat } from 'fs/promises';
import { join } from 'path';
import { BaseProbe } from './base-probe.js';
import type { FileItem, ProbeId, ScanResult, ScannerOptions } from '../types.js';
import { exists, getSize, readEntries } from '../utils/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const DEFAULT_DAYS_OLD = 30;

export class DownloadsProbe extends BaseProbe {
  readonly id: ProbeId = 'old-downloads';
  readonly category = 'Old Downloads';

  constructor(private readonly now: () => number = Date.now) {
    super();
  }

  async scan(options: ScannerOptions): Promise<ScanResult> {
    const downloadsDir = join(options.homeDir, 'Downloads');
    if (!(await exists(downloadsDir))) {
      return this.createResult([]);
    }

    const daysOld = options.downloadsDaysOld ?? DEFAULT_DAYS_OLD;
    const now = this.now();
    const cutoff = now - daysOld * DAY_MS;
    const items: FileItem[] = [];

    for (const entry of await readEntries(downloadsDir)) {
      const fullPath = join(downloadsDir, entry.name);
      try {
        const stats = await lstat(fullPath);
        if (stats.mtimeMs >= cutoff) continue;

        items.push({
          path: fullPath,
          name: entry.name,
          size: await getSize(fullPath),
          isDirectory: stats.isDirectory(),
          ageDays: Math.floor((now - stats.mtimeMs) / DAY_MS),
        });
      } catch {
        // Ignore entries we cannot stat
      }
    }

    this.announce(options, items);
    return this.createResult(items);
  }
}
