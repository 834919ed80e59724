import { readFile, access } from 'fs/promises';
import { join } from 'path';
import { homedir } from 'os';
import { SIZE_THRESHOLDS } from './size.js';

export function getConfigPaths(home: string = homedir()): string[] {
  return [
    join(home, '.homesweeprc'),
    join(home, '.config', 'homesweep', 'config.json'),
  ];
}

export interface Config {
  downloadsDaysOld: number;
  dockerMinSize: number;
  ignoredPaths: string[];        // Ignored files
  ignoredFolders: string[];      // Ignored folders (entire directory trees)
  ignoredCategories: string[];   // Ignored category names (skip entire category)
  skipPatterns: string[];        // Path fragments the deep walks never enter
  confirmDeletion: boolean;
  logFile?: string;
}

export const DEFAULT_SKIP_PATTERNS = [
  '/Library/',
  '/System/',
  '/.Trash/',
  '/Applications/',
  '/System/Library/',
  '/usr/',
  '/bin/',
  '/sbin/',
];

const DEFAULT_CONFIG: Config = {
  downloadsDaysOld: 30,
  dockerMinSize: SIZE_THRESHOLDS.DOCKER_MIN,
  ignoredPaths: [],
  ignoredFolders: [],
  ignoredCategories: [],
  skipPatterns: DEFAULT_SKIP_PATTERNS,
  confirmDeletion: true,
};

let cachedConfig: Config | null = null;

export function clearConfigCache(): void {
  cachedConfig = null;
}

export function getDefaultConfig(): Config {
  return {
    ...DEFAULT_CONFIG,
    ignoredPaths: [],
    ignoredFolders: [],
    ignoredCategories: [],
    skipPatterns: [...DEFAULT_SKIP_PATTERNS],
  };
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isNonNegativeNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

/**
 * Picks the recognised, well-typed fields out of a parsed config file.
 * Anything else is dropped field by field so one typo does not discard the file.
 */
export function parseConfig(raw: unknown): Partial<Config> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return {};
  }

  const source = new Map(Object.entries(raw));
  const parsed: Partial<Config> = {};

  const downloadsDaysOld = source.get('downloadsDaysOld');
  if (isNonNegativeNumber(downloadsDaysOld)) parsed.downloadsDaysOld = downloadsDaysOld;

  const dockerMinSize = source.get('dockerMinSize');
  if (isNonNegativeNumber(dockerMinSize)) parsed.dockerMinSize = dockerMinSize;

  const ignoredPaths = source.get('ignoredPaths');
  if (isStringArray(ignoredPaths)) parsed.ignoredPaths = ignoredPaths;

  const ignoredFolders = source.get('ignoredFolders');
  if (isStringArray(ignoredFolders)) parsed.ignoredFolders = ignoredFolders;

  const ignoredCategories = source.get('ignoredCategories');
  if (isStringArray(ignoredCategories)) parsed.ignoredCategories = ignoredCategories;

  const skipPatterns = source.get('skipPatterns');
  if (isStringArray(skipPatterns)) parsed.skipPatterns = skipPatterns;

  const confirmDeletion = source.get('confirmDeletion');
  if (typeof confirmDeletion === 'boolean') parsed.confirmDeletion = confirmDeletion;

  const logFile = source.get('logFile');
  if (typeof logFile === 'string' && logFile.length > 0) parsed.logFile = logFile;

  return parsed;
}

export async function loadConfig(configPath?: string): Promise<Config> {
  if (cachedConfig && !configPath) {
    return cachedConfig;
  }

  const paths = configPath ? [configPath] : getConfigPaths();

  for (const path of paths) {
    try {
      await access(path);
      const content = await readFile(path, 'utf-8');
      const config: Config = { ...getDefaultConfig(), ...parseConfig(JSON.parse(content)) };
      if (!configPath) cachedConfig = config;
      return config;
    } catch {
      continue;
    }
  }

  const config = getDefaultConfig();
  if (!configPath) cachedConfig = config;
  return config;
}
