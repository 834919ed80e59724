import type { ProgressChannel } from './utils/progress.js';
import type { Logger } from './utils/logger.js';

export type ProbeId =
  | 'cache-files'
  | 'log-files'
  | 'trash'
  | 'old-downloads'
  | 'xcode-files'
  | 'homebrew-cache'
  | 'node-modules'
  | 'python-artifacts'
  | 'rust-artifacts'
  | 'build-artifacts'
  | 'package-manager-caches'
  | 'go-artifacts'
  | 'jvm-artifacts'
  | 'ruby-artifacts'
  | 'docker-artifacts'
  | 'ide-caches'
  | 'cocoapods';

export type ScanProfile = 'full' | 'dev' | 'quick';

export interface FileItem {
  readonly path: string;
  readonly name: string;
  readonly size: number;
  readonly isDirectory: boolean;
  readonly ageDays?: number;
}

export interface ScanResult {
  category: string;
  items: FileItem[];
  total: number;
}

export interface Snapshot {
  results: Map<string, ScanResult>;
  grandTotal: number;
}

export interface ScanProgress {
  category: string;
  path: string;
  size: number;
}

export interface ScannerOptions {
  homeDir: string;
  env?: NodeJS.ProcessEnv;
  downloadsDaysOld?: number;
  dockerMinSize?: number;
  skipPatterns?: string[];
  progress?: ProgressChannel<ScanProgress>;
  logger?: Logger;
}

/**
 * An independent scan routine producing one category's findings.
 * `scan` must resolve even when every location it touches is unreadable.
 */
export interface CategoryProbe {
  readonly id: ProbeId;
  readonly category: string;
  scan(options: ScannerOptions): Promise<ScanResult>;
}

export interface DeleteSuccess {
  ok: true;
  path: string;
  freed: number;
}

export interface DeleteFailure {
  ok: false;
  path: string;
  error: string;
}

export type DeleteOutcome = DeleteSuccess | DeleteFailure;

export interface BatchDeleteResult {
  freed: number;
  deletedPaths: string[];
}

export interface DiskUsageRow {
  filesystem: string;
  size: string;
  used: string;
  avail: string;
  capacity: string;
  mountedOn: string;
}

export interface DiskSpace {
  diskPath: string;
  free: number;
  size: number;
}
