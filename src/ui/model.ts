import { basename, sep } from 'path';
import type { FileItem, ScanResult, Snapshot } from '../types.js';
import { sortBySize } from '../utils/index.js';

export type GoUpResult =
  | { kind: 'rejected' }
  | { kind: 'root' }
  | { kind: 'relist'; path: string };

function isInside(parent: string, child: string): boolean {
  const prefix = parent.endsWith(sep) ? parent : `${parent}${sep}`;
  return child.startsWith(prefix);
}

function sumSizes(items: readonly FileItem[]): number {
  return items.reduce((sum, item) => sum + item.size, 0);
}

/**
 * The current scan snapshot plus "where the user is" inside it: the open
 * category, the listing at the current breadcrumb depth and the marked paths.
 *
 * Marks are cleared whenever the listing is replaced (entering a category,
 * exploring, going up), so a selection never refers to items off screen.
 */
export class ResultModel {
  snapshot: Snapshot | null = null;
  activeCategory: string | null = null;
  listing: FileItem[] = [];
  breadcrumb: string[] = [];
  readonly marked = new Set<string>();
  cursor = 0;
  loading = false;
  freedTotal = 0;

  // Absolute paths of explored directories, one per breadcrumb segment after the first
  private directories: string[] = [];

  /** Takes a working copy; deletions never modify the scan's own snapshot. */
  load(snapshot: Snapshot): void {
    this.snapshot = {
      results: new Map(
        [...snapshot.results].map(([name, result]) => [name, { ...result, items: [...result.items] }])
      ),
      grandTotal: snapshot.grandTotal,
    };
    this.leaveCategory();
  }

  get grandTotal(): number {
    return this.snapshot?.grandTotal ?? 0;
  }

  categories(): ScanResult[] {
    if (!this.snapshot) return [];
    return [...this.snapshot.results.values()].sort((a, b) => a.category.localeCompare(b.category));
  }

  category(name: string): ScanResult | undefined {
    return this.snapshot?.results.get(name);
  }

  get currentDirectory(): string | null {
    return this.directories.length > 0 ? this.directories[this.directories.length - 1] : null;
  }

  get depth(): number {
    return this.breadcrumb.length;
  }

  get selectedItem(): FileItem | undefined {
    return this.listing[this.cursor];
  }

  enterCategory(name: string): boolean {
    const result = this.category(name);
    if (!result) return false;

    this.activeCategory = name;
    this.listing = [...result.items];
    this.breadcrumb = [name];
    this.directories = [];
    this.loading = false;
    this.resetView();
    return true;
  }

  leaveCategory(): void {
    this.activeCategory = null;
    this.listing = [];
    this.breadcrumb = [];
    this.directories = [];
    this.loading = false;
    this.resetView();
  }

  /** Validates an exploration request and marks the model as loading. */
  beginExplore(item: FileItem | undefined): string | null {
    if (!item || !item.isDirectory || this.loading || !this.activeCategory) return null;
    if (!this.listing.some((candidate) => candidate.path === item.path)) return null;
    this.loading = true;
    return item.path;
  }

  completeExplore(category: string, path: string, children: readonly FileItem[]): boolean {
    this.loading = false;
    if (this.activeCategory !== category) return false;

    this.listing = sortBySize(children);
    this.breadcrumb = [...this.breadcrumb, basename(path)];
    this.directories = [...this.directories, path];
    this.resetView();
    return true;
  }

  goUp(): GoUpResult {
    if (this.breadcrumb.length <= 1 || this.loading) return { kind: 'rejected' };

    this.breadcrumb = this.breadcrumb.slice(0, -1);
    this.directories = this.directories.slice(0, -1);

    if (this.breadcrumb.length === 1) {
      this.listing = [...(this.category(this.breadcrumb[0])?.items ?? [])];
      this.resetView();
      return { kind: 'root' };
    }

    this.loading = true;
    return { kind: 'relist', path: this.directories[this.directories.length - 1] };
  }

  completeRelist(category: string, path: string, children: readonly FileItem[]): boolean {
    this.loading = false;
    if (this.activeCategory !== category || this.currentDirectory !== path) return false;

    this.listing = sortBySize(children);
    this.resetView();
    return true;
  }

  cancelLoading(): void {
    this.loading = false;
  }

  toggleMark(path: string): boolean {
    if (!this.listing.some((item) => item.path === path)) return false;
    if (this.marked.has(path)) {
      this.marked.delete(path);
    } else {
      this.marked.add(path);
    }
    return true;
  }

  markAll(): void {
    for (const item of this.listing) {
      this.marked.add(item.path);
    }
  }

  clearMarks(): void {
    this.marked.clear();
  }

  markedItems(): FileItem[] {
    return this.listing.filter((item) => this.marked.has(item.path));
  }

  markedSize(): number {
    return sumSizes(this.markedItems());
  }

  moveCursor(delta: number): void {
    this.cursor = this.clamp(this.cursor + delta);
  }

  /**
   * Drops deleted paths, and anything scanned below them, from every
   * category and the listing, then recomputes totals from what remains.
   * Sizes of deleted items come from `origin` and `categoryName`'s items,
   * so this also works after the user navigated away while it ran.
   */
  applyDeletion(
    categoryName: string,
    freedBytes: number,
    deletedPaths: readonly string[],
    origin: readonly FileItem[] = this.listing
  ): void {
    this.freedTotal += Math.max(0, freedBytes);
    if (deletedPaths.length === 0) return;

    const isGone = (path: string) => deletedPaths.some((deleted) => path === deleted || isInside(deleted, path));

    if (this.snapshot) {
      const requested = this.category(categoryName)?.items ?? [];
      const sizeOf = new Map([...requested, ...origin].map((item) => [item.path, item.size]));
      for (const result of this.snapshot.results.values()) {
        const nestedSizes = this.nestedDeletedSizes(result, deletedPaths, sizeOf);
        result.items = result.items
          .filter((item) => !isGone(item.path))
          .map((item) => {
            const shrink = nestedSizes.get(item.path);
            return shrink ? { ...item, size: Math.max(0, item.size - shrink) } : item;
          });
        result.total = sumSizes(result.items);
      }
      this.snapshot.grandTotal = [...this.snapshot.results.values()].reduce((sum, r) => sum + r.total, 0);
    }

    for (const path of [...this.marked]) {
      if (isGone(path)) this.marked.delete(path);
    }
    this.listing = this.listing.filter((item) => !isGone(item.path));
    this.cursor = this.clamp(this.cursor);
  }

  // Sizes of deleted paths that live below a root item, keyed by that root item's path
  private nestedDeletedSizes(
    result: ScanResult,
    deletedPaths: readonly string[],
    sizeOf: ReadonlyMap<string, number>
  ): Map<string, number> {
    const shrink = new Map<string, number>();

    for (const path of deletedPaths) {
      const size = sizeOf.get(path);
      if (size === undefined) continue;
      const root = result.items.find((item) => isInside(item.path, path));
      if (root) {
        shrink.set(root.path, (shrink.get(root.path) ?? 0) + size);
      }
    }
    return shrink;
  }

  private resetView(): void {
    this.marked.clear();
    this.cursor = 0;
  }

  private clamp(index: number): number {
    if (this.listing.length === 0) return 0;
    return Math.max(0, Math.min(this.listing.length - 1, index));
  }
}
