import { lstat } from 'fs/promises';
import { join } from 'path';
import { BaseProbe } from './base-probe.js';
import type { FileItem, ProbeId, ScanResult, ScannerOptions } from '../types.js';
import { readEntries } from '../utils/index.js';

export class LogFilesProbe extends BaseProbe {
  readonly id: ProbeId = 'log-files';
  readonly category = 'Log Files';

  constructor(private readonly roots: (options: ScannerOptions) => string[]) {
    super();
  }

  async scan(options: ScannerOptions): Promise<ScanResult> {
    const items: FileItem[] = [];
    for (const root of this.roots(options)) {
      await this.collectLogs(root, items);
    }
    this.announce(options, items);
    return this.createResult(items);
  }

  private async collectLogs(dir: string, items: FileItem[]): Promise<void> {
    for (const entry of await readEntries(dir)) {
      const fullPath = join(dir, entry.name);

      if (entry.isDirectory()) {
        await this.collectLogs(fullPath, items);
        continue;
      }
      if (!entry.name.includes('.log')) continue;

      try {
        const stats = await lstat(fullPath);
        items.push({ path: fullPath, name: entry.name, size: stats.size, isDirectory: false });
      } catch {
        // Rotated away mid-scan
      }
    }
  }
}
