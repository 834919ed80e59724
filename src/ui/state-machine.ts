import { basename } from 'path';
import type {
  DiskSpace,
  DiskUsageRow,
  FileItem,
  ScanProfile,
  ScanProgress,
  ScanResult,
  Snapshot,
} from '../types.js';
import { formatSize } from '../utils/index.js';
import { ResultModel } from './model.js';

export type AppState = 'menu' | 'scanning' | 'results' | 'detail' | 'cleaning' | 'diskUsageReport';

export type Action =
  | 'up'
  | 'down'
  | 'pageUp'
  | 'pageDown'
  | 'select'
  | 'cancel'
  | 'back'
  | 'toggleMark'
  | 'markAll'
  | 'clearMarks'
  | 'deleteMarked'
  | 'deleteSelected'
  | 'quit';

type MenuCommand =
  | { kind: 'scan'; profile: ScanProfile }
  | { kind: 'diskUsage' }
  | { kind: 'exit' };

export interface MenuEntry {
  label: string;
  command: MenuCommand;
}

export const MENU: readonly MenuEntry[] = [
  { label: '🔍 Full System Scan', command: { kind: 'scan', profile: 'full' } },
  { label: '💻 Dev Scan (Development caches & artifacts)', command: { kind: 'scan', profile: 'dev' } },
  { label: '🚀 Quick Clean (Safe files only)', command: { kind: 'scan', profile: 'quick' } },
  { label: '📊 Disk Usage Report', command: { kind: 'diskUsage' } },
  { label: '❌ Exit', command: { kind: 'exit' } },
];

export type DeletionOrigin = 'detail' | 'results';

export interface SingleDeletion {
  kind: 'one';
  category: string;
  origin: DeletionOrigin;
  item: FileItem;
  listing: FileItem[];
}

export interface BatchDeletion {
  kind: 'marked';
  category: string;
  origin: DeletionOrigin;
  paths: string[];
  listing: FileItem[];
}

export type DeletionRequest = SingleDeletion | BatchDeletion;

export type ExploreMode = 'push' | 'relist';

export type Effect =
  | { type: 'scan'; profile: ScanProfile }
  | { type: 'explore'; category: string; path: string; mode: ExploreMode }
  | { type: 'confirm'; message: string }
  | { type: 'deleteOne'; request: SingleDeletion }
  | { type: 'deleteMarked'; request: BatchDeletion }
  | { type: 'diskUsage' }
  | { type: 'diskSpace' }
  | { type: 'quit' };

export type AppEvent =
  | { type: 'key'; action: Action }
  | { type: 'resize'; width: number; height: number }
  | { type: 'scan-progress'; updates: ScanProgress[] }
  | { type: 'scan-complete'; snapshot: Snapshot }
  | { type: 'scan-failed'; error: string }
  | { type: 'explore-complete'; category: string; path: string; mode: ExploreMode; items: FileItem[] }
  | { type: 'explore-failed'; category: string; path: string; mode: ExploreMode; error: string }
  | { type: 'confirm-result'; accepted: boolean }
  | { type: 'deletion-complete'; request: DeletionRequest; freed: number; deletedPaths: string[] }
  | { type: 'deletion-failed'; request: DeletionRequest; error: string }
  | { type: 'disk-usage-complete'; rows: DiskUsageRow[] }
  | { type: 'disk-usage-failed'; error: string }
  | { type: 'disk-space'; space: DiskSpace }
  | { type: 'error'; message: string };

export interface Notice {
  kind: 'success' | 'info';
  text: string;
}

export interface ScanStats {
  found: number;
  size: number;
  recent: string[];
}

export interface ViewState {
  state: AppState;
  menu: readonly string[];
  menuIndex: number;
  resultsIndex: number;
  reportIndex: number;
  categories: ScanResult[];
  grandTotal: number;
  freedTotal: number;
  activeCategory: string | null;
  breadcrumb: readonly string[];
  listing: readonly FileItem[];
  cursor: number;
  marked: ReadonlySet<string>;
  markedSize: number;
  loading: boolean;
  scanProfile: ScanProfile | null;
  scanStats: ScanStats;
  diskUsage: readonly DiskUsageRow[];
  diskUsageLoading: boolean;
  diskSpace: DiskSpace | null;
  notice: Notice | null;
  error: string | null;
  awaitingConfirmation: boolean;
  cleaningLabel: string | null;
  width: number;
  height: number;
}

export interface StateMachineOptions {
  confirmDeletion?: boolean;
}

const RECENT_PATHS = 10;
const VIEWPORT_CHROME = 15;
const MIN_VIEWPORT = 5;

/** Number of list rows that fit on a terminal `height` lines tall. */
export function viewportRows(height: number): number {
  return Math.max(MIN_VIEWPORT, height - VIEWPORT_CHROME);
}

function countItems(count: number): string {
  return `${count} item${count === 1 ? '' : 's'}`;
}

function describeRequest(request: DeletionRequest): string {
  if (request.kind === 'one') {
    return `${request.item.name} (${formatSize(request.item.size)})`;
  }
  const size = request.listing
    .filter((item) => request.paths.includes(item.path))
    .reduce((sum, item) => sum + item.size, 0);
  return `${countItems(request.paths.length)} (${formatSize(size)})`;
}

/**
 * Owns the UI state tag and decides what each event does to it.
 *
 * `dispatch` never performs I/O: anything slow is returned as an
 * `Effect` for the session to run, and its outcome comes back as an event.
 */
export class StateMachine {
  state: AppState = 'menu';
  readonly model = new ResultModel();
  menuIndex = 0;
  resultsIndex = 0;
  reportIndex = 0;
  notice: Notice | null = null;
  error: string | null = null;
  scanProfile: ScanProfile | null = null;
  scanStats: ScanStats = { found: 0, size: 0, recent: [] };
  scanInFlight = false;
  diskUsage: DiskUsageRow[] = [];
  diskUsageLoading = false;
  diskSpace: DiskSpace | null = null;
  pendingDeletion: DeletionRequest | null = null;
  activeDeletion: DeletionRequest | null = null;
  width = 80;
  height = 24;

  private readonly confirmDeletion: boolean;

  constructor(options: StateMachineOptions = {}) {
    this.confirmDeletion = options.confirmDeletion ?? true;
  }

  get pageSize(): number {
    return viewportRows(this.height);
  }

  dispatch(event: AppEvent): Effect[] {
    switch (event.type) {
      case 'key':
        return this.onKey(event.action);
      case 'resize':
        this.width = event.width;
        this.height = event.height;
        return [];
      case 'scan-progress':
        this.onScanProgress(event.updates);
        return [];
      case 'scan-complete':
        return this.onScanComplete(event.snapshot);
      case 'scan-failed':
        this.scanInFlight = false;
        this.error = `Scan failed: ${event.error}`;
        if (this.state === 'scanning') this.toMenu();
        return [];
      case 'explore-complete':
        this.onExploreComplete(event.category, event.path, event.mode, event.items);
        return [];
      case 'explore-failed':
        this.onExploreFailed(event.category, event.path, event.mode, event.error);
        return [];
      case 'confirm-result':
        return this.onConfirmResult(event.accepted);
      case 'deletion-complete':
        return this.onDeletionComplete(event.request, event.freed, event.deletedPaths);
      case 'deletion-failed':
        return this.onDeletionFailed(event.request, event.error);
      case 'disk-usage-complete':
        this.diskUsage = event.rows;
        this.diskUsageLoading = false;
        this.reportIndex = 0;
        return [];
      case 'disk-usage-failed':
        this.diskUsageLoading = false;
        this.error = `Disk usage report failed: ${event.error}`;
        if (this.state === 'diskUsageReport') this.toMenu();
        return [];
      case 'disk-space':
        this.diskSpace = event.space;
        return [];
      case 'error':
        this.error = event.message;
        return [];
    }
  }

  view(): ViewState {
    const model = this.model;
    return {
      state: this.state,
      menu: MENU.map((entry) => entry.label),
      menuIndex: this.menuIndex,
      resultsIndex: this.resultsIndex,
      reportIndex: this.reportIndex,
      categories: model.categories(),
      grandTotal: model.grandTotal,
      freedTotal: model.freedTotal,
      activeCategory: model.activeCategory,
      breadcrumb: [...model.breadcrumb],
      listing: [...model.listing],
      cursor: model.cursor,
      marked: new Set(model.marked),
      markedSize: model.markedSize(),
      loading: model.loading,
      scanProfile: this.scanProfile,
      scanStats: { ...this.scanStats, recent: [...this.scanStats.recent] },
      diskUsage: [...this.diskUsage],
      diskUsageLoading: this.diskUsageLoading,
      diskSpace: this.diskSpace,
      notice: this.notice,
      error: this.error,
      awaitingConfirmation: this.pendingDeletion !== null,
      cleaningLabel: this.activeDeletion ? describeRequest(this.activeDeletion) : null,
      width: this.width,
      height: this.height,
    };
  }

  private onKey(action: Action): Effect[] {
    // A confirmation prompt owns the terminal until it answers
    if (this.pendingDeletion) {
      return action === 'quit' ? [{ type: 'quit' }] : [];
    }
    this.error = null;

    switch (this.state) {
      case 'menu':
        return this.onMenuKey(action);
      case 'scanning':
        return action === 'quit' ? [{ type: 'quit' }] : [];
      case 'results':
        return this.onResultsKey(action);
      case 'detail':
        return this.onDetailKey(action);
      case 'cleaning':
        if (action === 'quit') return [{ type: 'quit' }];
        if (action === 'cancel') this.toMenu();
        return [];
      case 'diskUsageReport':
        return this.onReportKey(action);
    }
  }

  private onMenuKey(action: Action): Effect[] {
    switch (action) {
      case 'up':
        this.menuIndex = Math.max(0, this.menuIndex - 1);
        return [];
      case 'down':
        this.menuIndex = Math.min(MENU.length - 1, this.menuIndex + 1);
        return [];
      case 'quit':
        return [{ type: 'quit' }];
      case 'select':
        return this.runMenuCommand(MENU[this.menuIndex].command);
      default:
        return [];
    }
  }

  private runMenuCommand(command: MenuCommand): Effect[] {
    switch (command.kind) {
      case 'exit':
        return [{ type: 'quit' }];
      case 'diskUsage':
        this.state = 'diskUsageReport';
        this.diskUsage = [];
        this.diskUsageLoading = true;
        this.reportIndex = 0;
        return [{ type: 'diskUsage' }];
      case 'scan':
        if (this.scanInFlight || this.activeDeletion) {
          this.notice = { kind: 'info', text: 'Wait for the running operation to finish first' };
          return [];
        }
        this.state = 'scanning';
        this.scanInFlight = true;
        this.scanProfile = command.profile;
        this.scanStats = { found: 0, size: 0, recent: [] };
        this.notice = null;
        return [{ type: 'scan', profile: command.profile }];
    }
  }

  private onResultsKey(action: Action): Effect[] {
    const categories = this.model.categories();

    switch (action) {
      case 'up':
        this.resultsIndex = Math.max(0, this.resultsIndex - 1);
        return [];
      case 'down':
        // The row after the last category is "Back to Menu"
        this.resultsIndex = Math.min(categories.length, this.resultsIndex + 1);
        return [];
      case 'select': {
        const selected = categories[this.resultsIndex];
        if (!selected) {
          this.toMenu();
          return [];
        }
        if (this.model.enterCategory(selected.category)) {
          this.state = 'detail';
        }
        return [];
      }
      case 'deleteSelected': {
        const selected = categories[this.resultsIndex];
        if (!selected || selected.items.length === 0) return [];
        return this.requestDeletion({
          kind: 'marked',
          category: selected.category,
          origin: 'results',
          paths: selected.items.map((item) => item.path),
          listing: [...selected.items],
        });
      }
      case 'cancel':
        this.toMenu();
        return [];
      case 'quit':
        return [{ type: 'quit' }];
      default:
        return [];
    }
  }

  private onDetailKey(action: Action): Effect[] {
    const model = this.model;
    const category = model.activeCategory;

    switch (action) {
      case 'up':
        model.moveCursor(-1);
        return [];
      case 'down':
        model.moveCursor(1);
        return [];
      case 'pageUp':
        model.moveCursor(-this.pageSize);
        return [];
      case 'pageDown':
        model.moveCursor(this.pageSize);
        return [];
      case 'select': {
        const path = model.beginExplore(model.selectedItem);
        if (!path || !category) return [];
        return [{ type: 'explore', category, path, mode: 'push' }];
      }
      case 'back': {
        if (model.loading) return [];
        if (model.depth <= 1) {
          this.toResults();
          return [];
        }
        const result = model.goUp();
        if (result.kind === 'relist' && category) {
          return [{ type: 'explore', category, path: result.path, mode: 'relist' }];
        }
        return [];
      }
      case 'toggleMark': {
        const item = model.selectedItem;
        if (item) model.toggleMark(item.path);
        return [];
      }
      case 'markAll':
        model.markAll();
        return [];
      case 'clearMarks':
        model.clearMarks();
        return [];
      case 'deleteMarked':
        if (!category || model.marked.size === 0 || model.loading) return [];
        return this.requestDeletion({
          kind: 'marked',
          category,
          origin: 'detail',
          paths: [...model.marked],
          listing: [...model.listing],
        });
      case 'deleteSelected': {
        const item = model.selectedItem;
        if (!category || !item || model.loading) return [];
        return this.requestDeletion({ kind: 'one', category, origin: 'detail', item, listing: [...model.listing] });
      }
      case 'cancel':
        model.leaveCategory();
        this.toMenu();
        return [];
      case 'quit':
        return [{ type: 'quit' }];
    }
  }

  private onReportKey(action: Action): Effect[] {
    switch (action) {
      case 'up':
        this.reportIndex = Math.max(0, this.reportIndex - 1);
        return [];
      case 'down':
        this.reportIndex = Math.max(0, Math.min(this.diskUsage.length - 1, this.reportIndex + 1));
        return [];
      case 'pageUp':
        this.reportIndex = Math.max(0, this.reportIndex - this.pageSize);
        return [];
      case 'pageDown':
        this.reportIndex = Math.max(0, Math.min(this.diskUsage.length - 1, this.reportIndex + this.pageSize));
        return [];
      // Quit only dismisses the report
      case 'cancel':
      case 'quit':
        this.toMenu();
        return [];
      default:
        return [];
    }
  }

  private requestDeletion(request: DeletionRequest): Effect[] {
    if (this.activeDeletion || this.scanInFlight) {
      this.notice = { kind: 'info', text: 'Wait for the running operation to finish first' };
      return [];
    }
    if (this.confirmDeletion) {
      this.pendingDeletion = request;
      const scope = request.origin === 'results' ? `everything in ${request.category}: ` : '';
      return [{ type: 'confirm', message: `Permanently delete ${scope}${describeRequest(request)}?` }];
    }
    return this.startDeletion(request);
  }

  private startDeletion(request: DeletionRequest): Effect[] {
    this.activeDeletion = request;
    this.state = 'cleaning';
    this.notice = null;
    return request.kind === 'one'
      ? [{ type: 'deleteOne', request }]
      : [{ type: 'deleteMarked', request }];
  }

  private onConfirmResult(accepted: boolean): Effect[] {
    const request = this.pendingDeletion;
    this.pendingDeletion = null;
    if (!request) return [];

    if (!accepted) {
      this.notice = { kind: 'info', text: 'Deletion cancelled' };
      return [];
    }
    return this.startDeletion(request);
  }

  private onScanProgress(updates: readonly ScanProgress[]): void {
    if (this.state !== 'scanning') return;
    for (const update of updates) {
      this.scanStats.found++;
      this.scanStats.size += update.size;
      this.scanStats.recent.push(update.path);
    }
    this.scanStats.recent = this.scanStats.recent.slice(-RECENT_PATHS);
  }

  private onScanComplete(snapshot: Snapshot): Effect[] {
    this.scanInFlight = false;
    this.model.load(snapshot);
    this.resultsIndex = 0;
    if (this.state === 'scanning') {
      this.state = 'results';
    }
    return [{ type: 'diskSpace' }];
  }

  private onExploreComplete(category: string, path: string, mode: ExploreMode, items: FileItem[]): void {
    if (mode === 'push') {
      this.model.completeExplore(category, path, items);
    } else {
      this.model.completeRelist(category, path, items);
    }
  }

  private onExploreFailed(category: string, path: string, mode: ExploreMode, error: string): void {
    this.error = `Cannot open ${path}: ${error}`;
    this.model.cancelLoading();
    // The breadcrumb already moved up; fall back to the category root
    if (mode === 'relist' && this.model.activeCategory === category) {
      this.model.enterCategory(category);
    }
  }

  private onDeletionComplete(request: DeletionRequest, freed: number, deletedPaths: string[]): Effect[] {
    this.activeDeletion = null;
    this.model.applyDeletion(request.category, freed, deletedPaths, request.listing);

    this.notice = {
      kind: 'success',
      text: request.kind === 'one'
        ? `✅ Deleted ${basename(request.item.path)} (${formatSize(freed)})`
        : `✅ Deleted ${countItems(deletedPaths.length)} (${formatSize(freed)})`,
    };

    if (this.state === 'cleaning') {
      this.state = request.origin === 'detail' && this.model.activeCategory === request.category ? 'detail' : 'results';
    }
    return [{ type: 'diskSpace' }];
  }

  private onDeletionFailed(request: DeletionRequest, error: string): Effect[] {
    this.activeDeletion = null;
    const target = request.kind === 'one' ? request.item.path : request.category;
    this.error = `Failed to delete ${target}: ${error}`;
    if (this.state === 'cleaning') {
      this.state = request.origin === 'detail' && this.model.activeCategory === request.category ? 'detail' : 'results';
    }
    return [];
  }

  private toMenu(): void {
    this.state = 'menu';
    this.menuIndex = 0;
  }

  private toResults(): void {
    this.model.leaveCategory();
    this.state = 'results';
  }
}
