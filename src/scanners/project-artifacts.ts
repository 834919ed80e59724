import { join, relative, resolve, sep } from 'path';
import { BaseProbe, type ProbeLocation } from './base-probe.js';
import type { FileItem, ProbeId, ScanResult, ScannerOptions } from '../types.js';
import { DEFAULT_SKIP_PATTERNS, exists, getDirectorySize, readEntries } from '../utils/index.js';

// Project indicators - files that mark a directory as a project root
const PROJECT_INDICATORS = [
  'package.json',
  'Cargo.toml',
  'pom.xml',
  'build.gradle',
  'Makefile',
  'CMakeLists.txt',
];

// Never descended into by any walk; node_modules is reported by its own probe
const PRUNED_DIRS = new Set(['node_modules', '.git']);

// Tool caches that location probes report whole, relative to home
const SHARED_CACHE_DIRS = [
  '.npm',
  '.yarn',
  '.pnpm-store',
  '.cargo',
  join('go', 'pkg'),
  '.gradle',
  '.m2',
  join('.vscode', 'extensions'),
  '.conda',
  '.cache',
  '.gem',
  '.bundle',
];

/**
 * Absolute directories a deep walk must not enter: the shared tool caches
 * (including their environment overrides) and the probe's own locations.
 */
export function walkExclusions(options: ScannerOptions, own: readonly ProbeLocation[] = []): Set<string> {
  const paths = SHARED_CACHE_DIRS.map((dir) => join(options.homeDir, dir));
  const env = options.env ?? {};
  if (env.CARGO_HOME) paths.push(env.CARGO_HOME);
  if (env.GOPATH) paths.push(join(env.GOPATH, 'pkg'));
  if (env.GEM_HOME) paths.push(env.GEM_HOME);
  paths.push(...own.map((location) => location.path));
  return new Set(paths.map((path) => resolve(path)));
}

export async function isProjectDirectory(dir: string): Promise<boolean> {
  for (const indicator of PROJECT_INDICATORS) {
    if (await exists(join(dir, indicator))) {
      return true;
    }
  }
  return false;
}

export function hasSibling(fileName: string): (parentDir: string) => Promise<boolean> {
  return (parentDir) => exists(join(parentDir, fileName));
}

/**
 * Whether a deep walk should stay out of `fullPath`. Patterns are matched
 * against the path relative to the home directory, wrapped in separators,
 * with an exception for Library folders under Documents or Desktop.
 */
export function shouldSkipDir(homeDir: string, fullPath: string, patterns: readonly string[]): boolean {
  const rel = relative(homeDir, fullPath).split(sep).join('/');
  const candidate = `/${rel}/`;

  for (const pattern of patterns) {
    if (!candidate.includes(pattern)) continue;
    if (pattern === '/Library/' && (candidate.includes('/Documents/') || candidate.includes('/Desktop/'))) {
      continue;
    }
    return true;
  }
  return false;
}

export interface ProjectArtifactDefinition {
  id: ProbeId;
  category: string;
  glyph: string;
  names: readonly string[];
  /** Extra check on the directory holding a match, e.g. "has Cargo.toml". */
  guard?: (parentDir: string) => Promise<boolean>;
  /** Append the matched directory name to the label. */
  showDirName?: boolean;
  locations?: (options: ScannerOptions) => ProbeLocation[];
}

/**
 * Walks the whole home tree looking for ecosystem directories by name.
 * A match is measured and reported but never descended into.
 */
export class ProjectArtifactProbe extends BaseProbe {
  readonly id: ProbeId;
  readonly category: string;
  private readonly names: Set<string>;

  constructor(private readonly definition: ProjectArtifactDefinition) {
    super();
    this.id = definition.id;
    this.category = definition.category;
    this.names = new Set(definition.names);
  }

  async scan(options: ScannerOptions): Promise<ScanResult> {
    const items: FileItem[] = [];
    const start = Date.now();

    const locations = this.definition.locations?.(options) ?? [];
    for (const location of locations) {
      const found = await this.collectLocation(location);
      this.announce(options, found);
      items.push(...found);
    }

    await this.findArtifacts(options.homeDir, options, walkExclusions(options, locations), items);

    options.logger?.(`${this.category}: ${items.length} found in ${Date.now() - start}ms`);
    return this.createResult(items);
  }

  private async findArtifacts(
    dir: string,
    options: ScannerOptions,
    excluded: ReadonlySet<string>,
    items: FileItem[]
  ): Promise<void> {
    const skipPatterns = options.skipPatterns ?? DEFAULT_SKIP_PATTERNS;

    for (const entry of await readEntries(dir)) {
      if (!entry.isDirectory()) continue;

      const fullPath = join(dir, entry.name);
      if (excluded.has(resolve(fullPath)) || shouldSkipDir(options.homeDir, fullPath, skipPatterns)) continue;

      if (this.names.has(entry.name) && (!this.definition.guard || (await this.definition.guard(dir)))) {
        const size = await getDirectorySize(fullPath);
        if (size > 0) {
          items.push({
            path: fullPath,
            name: this.label(options.homeDir, dir, entry.name),
            size,
            isDirectory: true,
          });
          options.progress?.offer({ category: this.category, path: fullPath, size });
        }
        // Don't descend into artifact directories
        continue;
      }

      if (PRUNED_DIRS.has(entry.name)) continue;
      await this.findArtifacts(fullPath, options, excluded, items);
    }
  }

  private label(homeDir: string, projectDir: string, dirName: string): string {
    const projectPath = relative(homeDir, projectDir) || '~';
    return this.definition.showDirName
      ? `${this.definition.glyph} ${projectPath} (${dirName})`
      : `${this.definition.glyph} ${projectPath}`;
  }
}
