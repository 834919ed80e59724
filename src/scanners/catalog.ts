import { join } from 'path';
import type { ScannerOptions } from '../types.js';
import { LocationProbe } from './location-probe.js';
import { ProjectArtifactProbe, hasSibling, isProjectDirectory } from './project-artifacts.js';
import { LogFilesProbe } from './log-files.js';
import { DownloadsProbe } from './downloads.js';
import { SIZE_THRESHOLDS } from '../utils/index.js';

const library = (o: ScannerOptions, ...parts: string[]) => join(o.homeDir, 'Library', ...parts);

export const cacheFilesProbe = new LocationProbe({
  id: 'cache-files',
  category: 'Cache Files',
  locations: (o) => [
    // Homebrew's cache has a category of its own
    { path: library(o, 'Caches'), expand: true, exclude: ['Homebrew'] },
    { path: '/Library/Caches', expand: true },
    { path: join(o.homeDir, '.cache'), expand: true },
  ],
});

export const logFilesProbe = new LogFilesProbe((o) => [
  library(o, 'Logs'),
  '/Library/Logs',
  '/var/log',
]);

export const trashProbe = new LocationProbe({
  id: 'trash',
  category: 'Trash',
  locations: (o) => [
    { path: join(o.homeDir, '.Trash'), expand: true },
    { path: join(o.homeDir, '.local', 'share', 'Trash', 'files'), expand: true },
  ],
});

export const downloadsProbe = new DownloadsProbe();

export const xcodeProbe = new LocationProbe({
  id: 'xcode-files',
  category: 'Xcode Files',
  locations: (o) => [
    { path: library(o, 'Developer', 'Xcode', 'DerivedData'), expand: true, prefix: 'Xcode: ' },
    { path: library(o, 'Developer', 'Xcode', 'Archives'), expand: true, prefix: 'Xcode: ' },
    { path: library(o, 'Developer', 'CoreSimulator', 'Devices'), expand: true, prefix: 'Xcode: ' },
  ],
});

export const homebrewProbe = new LocationProbe({
  id: 'homebrew-cache',
  category: 'Homebrew Cache',
  locations: (o) => [{ path: library(o, 'Caches', 'Homebrew'), expand: true, prefix: 'Brew: ' }],
});

export const nodeModulesProbe = new ProjectArtifactProbe({
  id: 'node-modules',
  category: 'Node Modules',
  glyph: '📦',
  names: ['node_modules'],
});

export const pythonProbe = new ProjectArtifactProbe({
  id: 'python-artifacts',
  category: 'Python Artifacts',
  glyph: '🐍',
  names: ['__pycache__', 'venv', '.venv', 'env', '.env', 'virtualenv', '.pytest_cache', '.tox', '.mypy_cache'],
  showDirName: true,
  locations: (o) => [
    { path: join(o.homeDir, '.cache', 'pip'), label: 'Python: pip cache' },
    { path: library(o, 'Caches', 'pip'), label: 'Python: pip cache (Library)' },
    { path: join(o.homeDir, '.conda', 'pkgs'), label: 'Python: pkgs cache' },
  ],
});

export const rustProbe = new ProjectArtifactProbe({
  id: 'rust-artifacts',
  category: 'Rust Artifacts',
  glyph: '🦀',
  names: ['target'],
  guard: hasSibling('Cargo.toml'),
  locations: (o) => [{
    path: join(o.env?.CARGO_HOME || join(o.homeDir, '.cargo'), 'registry', 'cache'),
    label: '🦀 Cargo registry cache',
  }],
});

export const buildArtifactsProbe = new ProjectArtifactProbe({
  id: 'build-artifacts',
  category: 'Build Artifacts',
  glyph: '🔨',
  names: ['dist', 'build', 'out', '.next', '.nuxt', '.output', 'coverage', '.nyc_output', '.parcel-cache', 'tmp', 'temp'],
  guard: isProjectDirectory,
  showDirName: true,
});

export const packageManagerCachesProbe = new LocationProbe({
  id: 'package-manager-caches',
  category: 'NPM/Yarn/PNPM Caches',
  locations: (o) => [
    { path: join(o.homeDir, '.npm'), label: 'NPM cache' },
    { path: library(o, 'Caches', 'npm'), label: 'NPM cache (Library)' },
    { path: join(o.homeDir, '.yarn', 'cache'), label: 'Yarn cache' },
    { path: library(o, 'Caches', 'Yarn'), label: 'Yarn cache (Library)' },
    { path: join(o.homeDir, '.pnpm-store'), label: 'PNPM store' },
  ],
});

export const goProbe = new LocationProbe({
  id: 'go-artifacts',
  category: 'Go Artifacts',
  locations: (o) => [
    { path: join(o.env?.GOPATH || join(o.homeDir, 'go'), 'pkg', 'mod'), prefix: 'Go: ' },
    { path: join(o.homeDir, '.cache', 'go-build'), prefix: 'Go: ' },
    { path: library(o, 'Caches', 'go-build'), prefix: 'Go: ' },
  ],
});

export const jvmProbe = new LocationProbe({
  id: 'jvm-artifacts',
  category: 'Java/JVM Artifacts',
  locations: (o) => [
    { path: join(o.homeDir, '.m2', 'repository'), label: 'Maven: .m2 repository' },
    { path: join(o.homeDir, '.gradle', 'caches'), label: 'Gradle: caches' },
  ],
});

export const rubyProbe = new LocationProbe({
  id: 'ruby-artifacts',
  category: 'Ruby Artifacts',
  locations: (o) => [
    { path: o.env?.GEM_HOME || join(o.homeDir, '.gem'), label: 'Ruby: Gem cache' },
    { path: join(o.homeDir, '.bundle', 'cache'), label: 'Ruby: Bundler cache' },
  ],
});

export const dockerProbe = new LocationProbe({
  id: 'docker-artifacts',
  category: 'Docker Artifacts',
  locations: (o) => [
    { path: library(o, 'Containers', 'com.docker.docker', 'Data'), label: 'Docker: Desktop Data' },
  ],
  minSize: (o) => o.dockerMinSize ?? SIZE_THRESHOLDS.DOCKER_MIN,
});

export const ideCachesProbe = new LocationProbe({
  id: 'ide-caches',
  category: 'IDE Caches',
  locations: (o) => [
    { path: library(o, 'Application Support', 'Code', 'Cache'), prefix: 'VS Code: ' },
    { path: library(o, 'Application Support', 'Code', 'CachedData'), prefix: 'VS Code: ' },
    { path: join(o.homeDir, '.vscode', 'extensions'), prefix: 'VS Code: ' },
    { path: library(o, 'Caches', 'JetBrains'), expand: true, directoriesOnly: true, prefix: 'JetBrains: ' },
    { path: library(o, 'Application Support', 'JetBrains'), expand: true, directoriesOnly: true, prefix: 'JetBrains: ' },
  ],
});

export const cocoaPodsProbe = new LocationProbe({
  id: 'cocoapods',
  category: 'CocoaPods',
  locations: (o) => [{ path: library(o, 'Caches', 'CocoaPods'), label: 'CocoaPods cache' }],
});
