import chalk from 'chalk';
import confirm from '@inquirer/confirm';
import { getProfileProbes, runScan } from '../scanners/index.js';
import {
  createFileSink,
  createLogger,
  deleteMarked,
  deleteOne,
  formatSize,
  getDiskSpace,
  getDiskUsageReport,
  listDirectory,
  loadConfig,
  resetLogSink,
  setLogSink,
  type Config,
} from '../utils/index.js';
import { InteractiveSession, type SessionServices } from '../ui/session.js';
import { TerminalRenderer } from '../ui/renderer.js';
import { TerminalInput } from '../ui/terminal.js';

export type Confirmer = (message: string) => Promise<boolean>;

export function createServices(homeDir: string, config: Config, confirmer: Confirmer): SessionServices {
  const logger = createLogger('Scanner');

  return {
    scan: (profile, progress) =>
      runScan(getProfileProbes(profile), {
        homeDir,
        env: process.env,
        downloadsDaysOld: config.downloadsDaysOld,
        dockerMinSize: config.dockerMinSize,
        skipPatterns: config.skipPatterns,
        progress,
        logger,
        filters: {
          ignoredPaths: config.ignoredPaths,
          ignoredFolders: config.ignoredFolders,
          ignoredCategories: config.ignoredCategories,
        },
      }),
    listDirectory: (path) => listDirectory(path),
    deleteOne: (item) => deleteOne(item),
    deleteMarked: (paths, listing) => deleteMarked(paths, listing),
    diskUsage: () => getDiskUsageReport(),
    diskSpace: () => getDiskSpace(homeDir),
    confirm: confirmer,
  };
}

/**
 * Runs the full-screen session until the user quits. Returns the number
 * of bytes freed along the way.
 */
export async function interactiveCommand(homeDir: string): Promise<number> {
  const config = await loadConfig();
  // The screen belongs to the session from here on
  setLogSink(createFileSink(config.logFile));

  const renderer = new TerminalRenderer();
  const input = new TerminalInput((action) => session.post({ type: 'key', action }));

  const confirmer: Confirmer = async (message) => {
    input.suspend();
    try {
      return await confirm({ message, default: false });
    } finally {
      input.resume();
    }
  };

  const session = new InteractiveSession(createServices(homeDir, config, confirmer), renderer, {
    confirmDeletion: config.confirmDeletion,
  });

  const onResize = () => {
    session.post({ type: 'resize', width: process.stdout.columns, height: process.stdout.rows });
  };
  process.stdout.on('resize', onResize);

  input.start();
  onResize();
  try {
    await session.run();
  } finally {
    process.stdout.off('resize', onResize);
    input.stop();
    renderer.close();
    resetLogSink();
  }

  const freed = session.machine.model.freedTotal;
  if (freed > 0) {
    console.log(chalk.bold(`Freed: ${chalk.green(formatSize(freed))}`));
  }
  return freed;
}
