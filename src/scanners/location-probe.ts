import { BaseProbe, type ProbeLocation } from './base-probe.js';
import type { FileItem, ProbeId, ScanResult, ScannerOptions } from '../types.js';

export interface LocationProbeDefinition {
  id: ProbeId;
  category: string;
  locations: (options: ScannerOptions) => ProbeLocation[];
  minSize?: (options: ScannerOptions) => number;
}

/**
 * Looks only at a fixed set of well-known locations, such as cache roots
 * whose children are each reported, or package caches reported whole.
 */
export class LocationProbe extends BaseProbe {
  readonly id: ProbeId;
  readonly category: string;

  constructor(private readonly definition: LocationProbeDefinition) {
    super();
    this.id = definition.id;
    this.category = definition.category;
  }

  async scan(options: ScannerOptions): Promise<ScanResult> {
    const minSize = this.definition.minSize?.(options) ?? 0;
    const items: FileItem[] = [];

    for (const location of this.definition.locations(options)) {
      const found = await this.collectLocation(location, minSize);
      this.announce(options, found);
      items.push(...found);
    }

    return this.createResult(items);
  }
}
