import type { CategoryProbe, ProbeId, ScanProfile } from '../types.js';
import {
  cacheFilesProbe,
  logFilesProbe,
  trashProbe,
  downloadsProbe,
  xcodeProbe,
  homebrewProbe,
  nodeModulesProbe,
  pythonProbe,
  rustProbe,
  buildArtifactsProbe,
  packageManagerCachesProbe,
  goProbe,
  jvmProbe,
  rubyProbe,
  dockerProbe,
  ideCachesProbe,
  cocoaPodsProbe,
} from './catalog.js';

export const ALL_PROBES: Record<ProbeId, CategoryProbe> = {
  'cache-files': cacheFilesProbe,
  'log-files': logFilesProbe,
  'trash': trashProbe,
  'old-downloads': downloadsProbe,
  'xcode-files': xcodeProbe,
  'homebrew-cache': homebrewProbe,
  'node-modules': nodeModulesProbe,
  'python-artifacts': pythonProbe,
  'rust-artifacts': rustProbe,
  'build-artifacts': buildArtifactsProbe,
  'package-manager-caches': packageManagerCachesProbe,
  'go-artifacts': goProbe,
  'jvm-artifacts': jvmProbe,
  'ruby-artifacts': rubyProbe,
  'docker-artifacts': dockerProbe,
  'ide-caches': ideCachesProbe,
  'cocoapods': cocoaPodsProbe,
};

export const SCAN_PROFILES: Record<ScanProfile, readonly ProbeId[]> = {
  full: ['cache-files', 'log-files', 'trash', 'old-downloads', 'xcode-files', 'homebrew-cache', 'node-modules'],
  dev: [
    'node-modules',
    'python-artifacts',
    'rust-artifacts',
    'build-artifacts',
    'package-manager-caches',
    'go-artifacts',
    'jvm-artifacts',
    'ruby-artifacts',
    'docker-artifacts',
    'ide-caches',
    'xcode-files',
    'homebrew-cache',
    'cocoapods',
  ],
  quick: ['cache-files', 'log-files', 'trash', 'homebrew-cache'],
};

export function getProbe(id: ProbeId): CategoryProbe {
  return ALL_PROBES[id];
}

export function getProfileProbes(profile: ScanProfile): CategoryProbe[] {
  return SCAN_PROFILES[profile].map((id) => getProbe(id));
}

export { runScan, ScanAccumulator, type RunScanOptions, type ScanFilters } from './orchestrator.js';
export { BaseProbe, type ProbeLocation } from './base-probe.js';
export { LocationProbe } from './location-probe.js';
export { ProjectArtifactProbe, shouldSkipDir, isProjectDirectory } from './project-artifacts.js';
export { LogFilesProbe } from './log-files.js';
export { DownloadsProbe } from './downloads.js';
