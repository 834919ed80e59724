#!/usr/bin/env node
import chalk from 'chalk';
import { homedir } from 'os';
import { interactiveCommand } from './commands/interactive.js';
import { errorMessage } from './utils/index.js';

function resolveHomeDir(): string | null {
  try {
    return homedir() || null;
  } catch {
    // os.homedir throws when the user has no passwd entry
    return null;
  }
}

async function main(): Promise<number> {
  const homeDir = resolveHomeDir();
  if (!homeDir) {
    console.error(chalk.red('Error: could not determine your home directory'));
    return 1;
  }

  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    console.error(chalk.red('Error: homesweep needs an interactive terminal'));
    return 1;
  }

  await interactiveCommand(homeDir);
  return 0;
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    process.exit(1);
  }
);
