import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { DiskUsageRow, FileItem } from '../types.js';
import { formatSize } from '../utils/index.js';
import type { SessionView } from './session.js';
import { viewportRows, type ViewState } from './state-machine.js';

const CLEAR_SCREEN = '\x1b[2J\x1b[H';
const NAME_WIDTH = 40;

const HELP: Record<ViewState['state'], string> = {
  menu: '↑/↓ navigate • enter select • q quit',
  scanning: 'q quit',
  results: '↑/↓ navigate • enter open • c clean category • esc menu • q quit',
  detail: '↑/↓ move • enter open • space mark • A all • N none • D delete marked • c delete • ⌫ back • esc menu • q quit',
  cleaning: 'esc menu • q quit',
  diskUsageReport: '↑/↓ scroll • esc/q back',
};

export function truncate(text: string, width: number): string {
  if (width <= 0) return '';
  if (text.length <= width) return text;
  if (width === 1) return '…';
  return `${text.slice(0, width - 1)}…`;
}

/** First index of a window of `size` rows that keeps `cursor` visible, roughly centred. */
export function viewportStart(cursor: number, count: number, size: number): number {
  if (count <= size) return 0;
  const start = cursor - Math.floor(size / 2);
  return Math.max(0, Math.min(count - size, start));
}

function rule(view: ViewState): string {
  return chalk.dim('─'.repeat(Math.max(10, Math.min(view.width, 60))));
}

function header(view: ViewState): string[] {
  const lines = [chalk.bold.cyan('🧹 HomeSweep')];
  if (view.diskSpace) {
    lines.push(chalk.dim(`${formatSize(view.diskSpace.free)} free of ${formatSize(view.diskSpace.size)} on ${view.diskSpace.diskPath}`));
  }
  lines.push(rule(view));
  return lines;
}

function menuLines(view: ViewState): string[] {
  return view.menu.map((label, index) =>
    index === view.menuIndex ? chalk.cyan(`❯ ${label}`) : `  ${label}`
  );
}

function scanningLines(view: ViewState): string[] {
  const { found, size, recent } = view.scanStats;
  const lines = [
    chalk.bold(`Scanning (${view.scanProfile ?? 'full'})`),
    `Found ${chalk.yellow(String(found))} items, ${chalk.green(formatSize(size))}`,
    '',
  ];
  for (const path of recent) {
    lines.push(chalk.dim(`  ${truncate(path, Math.max(10, view.width - 4))}`));
  }
  return lines;
}

function resultsLines(view: ViewState): string[] {
  if (view.categories.length === 0) {
    return [chalk.green('✓ Nothing to clean!'), '', chalk.cyan('❯ Back to Menu')];
  }

  const lines = [chalk.bold(`Found ${chalk.green(formatSize(view.grandTotal))} that can be cleaned:`), ''];
  view.categories.forEach((result, index) => {
    const row = `${result.category.padEnd(28)} ${chalk.yellow(formatSize(result.total).padStart(10))} ${chalk.dim(`(${result.items.length} items)`)}`;
    lines.push(index === view.resultsIndex ? `${chalk.cyan('❯')} ${row}` : `  ${row}`);
  });
  lines.push(chalk.bold(`  ${'TOTAL'.padEnd(28)} ${formatSize(view.grandTotal).padStart(10)}`));
  const back = '← Back to Menu';
  lines.push(view.resultsIndex === view.categories.length ? chalk.cyan(`❯ ${back}`) : `  ${back}`);
  return lines;
}

function itemRow(item: FileItem, selected: boolean, marked: boolean): string {
  const box = marked ? chalk.green('[x]') : '[ ]';
  const icon = item.isDirectory ? '📁' : '📄';
  const age = item.ageDays !== undefined ? chalk.dim(` ${item.ageDays}d old`) : '';
  const name = truncate(item.name, NAME_WIDTH).padEnd(NAME_WIDTH);
  const row = `${box} ${icon} ${name} ${chalk.yellow(formatSize(item.size).padStart(10))}${age}`;
  return selected ? `${chalk.cyan('❯')} ${row}` : `  ${row}`;
}

function detailLines(view: ViewState): string[] {
  const lines = [chalk.bold(view.breadcrumb.join(' › ')), ''];

  if (view.loading) {
    lines.push(chalk.dim('Loading…'));
  } else if (view.listing.length === 0) {
    lines.push(chalk.dim('(empty)'));
  } else {
    const size = viewportRows(view.height);
    const start = viewportStart(view.cursor, view.listing.length, size);
    view.listing.slice(start, start + size).forEach((item, offset) => {
      const index = start + offset;
      lines.push(itemRow(item, index === view.cursor, view.marked.has(item.path)));
    });
    if (view.listing.length > size) {
      lines.push(chalk.dim(`  ${view.cursor + 1}/${view.listing.length}`));
    }
  }

  lines.push('');
  if (view.marked.size > 0) {
    const count = view.marked.size;
    lines.push(`Marked: ${chalk.yellow(String(count))} item${count === 1 ? '' : 's'}, ${chalk.green(formatSize(view.markedSize))}`);
  }
  return lines;
}

function cleaningLines(view: ViewState): string[] {
  return [chalk.bold('Cleaning'), chalk.dim(view.cleaningLabel ?? '')];
}

function usageRow(row: DiskUsageRow): string {
  return [
    truncate(row.filesystem, 24).padEnd(24),
    row.size.padStart(6),
    row.used.padStart(6),
    row.avail.padStart(6),
    row.capacity.padStart(5),
    row.mountedOn,
  ].join(' ');
}

function reportLines(view: ViewState): string[] {
  const lines = [chalk.bold('📊 Disk Usage Report'), ''];
  if (view.diskUsageLoading) {
    lines.push(chalk.dim('Reading disk usage…'));
    return lines;
  }

  lines.push(chalk.dim(['Filesystem'.padEnd(24), 'Size'.padStart(6), 'Used'.padStart(6), 'Avail'.padStart(6), 'Use%'.padStart(5), 'Mounted on'].join(' ')));
  const size = viewportRows(view.height);
  const start = viewportStart(view.reportIndex, view.diskUsage.length, size);
  view.diskUsage.slice(start, start + size).forEach((row, offset) => {
    const text = usageRow(row);
    lines.push(start + offset === view.reportIndex ? chalk.cyan(text) : text);
  });
  return lines;
}

function body(view: ViewState): string[] {
  switch (view.state) {
    case 'menu':
      return menuLines(view);
    case 'scanning':
      return scanningLines(view);
    case 'results':
      return resultsLines(view);
    case 'detail':
      return detailLines(view);
    case 'cleaning':
      return cleaningLines(view);
    case 'diskUsageReport':
      return reportLines(view);
  }
}

function footer(view: ViewState): string[] {
  const lines: string[] = [];
  if (view.freedTotal > 0) {
    lines.push(chalk.bold(`Freed: ${chalk.green(formatSize(view.freedTotal))}`));
  }
  if (view.notice) {
    lines.push(view.notice.kind === 'success' ? chalk.green(view.notice.text) : chalk.yellow(view.notice.text));
  }
  if (view.error) {
    lines.push(chalk.red(`✗ ${view.error}`));
  }
  lines.push(rule(view), chalk.dim(HELP[view.state]));
  return lines;
}

/** Pure: the whole screen for one view, without trailing newline. */
export function renderFrame(view: ViewState): string {
  return [...header(view), '', ...body(view), '', ...footer(view)].join('\n');
}

export function spinnerText(view: ViewState): string | null {
  if (view.state === 'scanning') {
    return `Scanning… ${view.scanStats.found} items found`;
  }
  if (view.state === 'cleaning') {
    return `Deleting ${view.cleaningLabel ?? ''}…`;
  }
  return null;
}

/**
 * Redraws the full screen on every frame and keeps an ora spinner running
 * while a scan or deletion is in flight.
 */
export class TerminalRenderer implements SessionView {
  private spinner: Ora | null = null;

  constructor(private readonly output: NodeJS.WritableStream = process.stdout) {}

  render(view: ViewState): void {
    // The confirmation prompt is drawn below the last frame
    if (view.awaitingConfirmation) return;

    this.spinner?.clear();
    this.output.write(`${CLEAR_SCREEN}${renderFrame(view)}\n`);

    const text = spinnerText(view);
    if (text === null) {
      this.stopSpinner();
    } else if (this.spinner) {
      this.spinner.text = text;
    } else {
      this.spinner = ora({ text, stream: this.output, discardStdin: false }).start();
    }
  }

  close(): void {
    this.stopSpinner();
    this.output.write(CLEAR_SCREEN);
  }

  private stopSpinner(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}
