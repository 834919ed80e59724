import type { CategoryProbe, ScanResult, ScannerOptions, Snapshot } from '../types.js';
import { createLogger, errorMessage } from '../utils/index.js';

const log = createLogger('Scanner');

export interface ScanFilters {
  ignoredPaths?: readonly string[];
  ignoredFolders?: readonly string[];
  ignoredCategories?: readonly string[];
}

export interface RunScanOptions extends ScannerOptions {
  filters?: ScanFilters;
  onProbeComplete?: (probe: CategoryProbe, result: ScanResult) => void;
}

/**
 * Collects finished probe results. Each probe contributes exactly once,
 * and the snapshot is only built after every probe has reported.
 */
export class ScanAccumulator {
  private readonly results = new Map<string, ScanResult>();

  constructor(private readonly filters: ScanFilters = {}) {}

  add(result: ScanResult): void {
    if (this.filters.ignoredCategories?.includes(result.category)) return;

    const items = result.items.filter((item) => !this.isIgnored(item.path));
    const total = items.reduce((sum, item) => sum + item.size, 0);
    if (total === 0) return;

    this.results.set(result.category, { category: result.category, items, total });
  }

  toSnapshot(): Snapshot {
    const results = new Map(this.results);
    let grandTotal = 0;
    for (const result of results.values()) {
      grandTotal += result.total;
    }
    return { results, grandTotal };
  }

  private isIgnored(path: string): boolean {
    if (this.filters.ignoredPaths?.includes(path)) return true;
    return (this.filters.ignoredFolders ?? []).some(
      (folder) => path === folder || path.startsWith(folder.endsWith('/') ? folder : `${folder}/`)
    );
  }
}

/**
 * Launches every probe at once and waits for all of them. There is no
 * partial result: a slow deep walk simply delays completion.
 */
export async function runScan(probes: readonly CategoryProbe[], options: RunScanOptions): Promise<Snapshot> {
  const accumulator = new ScanAccumulator(options.filters);
  const start = Date.now();

  await Promise.all(
    probes.map(async (probe) => {
      let result: ScanResult;
      try {
        result = await probe.scan(options);
      } catch (error) {
        // Probes are not supposed to reject; treat a rejection as "found nothing"
        log(`${probe.category} failed: ${errorMessage(error)}`);
        result = { category: probe.category, items: [], total: 0 };
      }
      accumulator.add(result);
      options.onProbeComplete?.(probe, result);
    })
  );

  const snapshot = accumulator.toSnapshot();
  log(`Scan of ${probes.length} probes finished in ${Date.now() - start}ms: ${snapshot.results.size} categories, ${snapshot.grandTotal} bytes`);
  return snapshot;
}
