import type { EntrySource, ScanOptions } from '#features/scanner';

import {
  buildTree,
  describeSort,
  sortChildren,
  type DiskNode,
  type SortMode
} from '#features/disk-tree';
import { logger } from '#lib/logger';

export const PAGE_SIZE = 10;

export interface NavigatorOptions {
  scanOptions: ScanOptions;
  entrySource: EntrySource;
  /**
   * After a refresh, add the size change of the rescanned directory to every
   * directory on the history stack. Off by default: ancestors keep the sizes
   * of the last full scan.
   */
  propagateRefreshToAncestors?: boolean;
}

export interface NavigatorSnapshot {
  path: string;
  size: number;
  errorCount: number;
  children: readonly DiskNode[];
  itemCount: number;
  selection: number | null;
  sortMode: SortMode;
  sortAscending: boolean;
  statusMessage: string | null;
  /** Number of ancestors on the history stack. */
  depth: number;
}

/**
 * Browsing state over a scanned tree: the directory being shown, the way back
 * up, the selected row and the active sort.
 */
export class Navigator {
  private current: DiskNode;
  private readonly history: DiskNode[] = [];
  private selection: number | null = null;
  private sortMode: SortMode = 'size';
  private sortAscending = false;
  private statusMessage: string | null = null;
  private pendingRefresh: Promise<void> | null = null;

  constructor(
    readonly root: DiskNode,
    private readonly options: NavigatorOptions
  ) {
    this.current = root;
    this.applySort();
    this.resetSelection();
  }

  get currentNode(): DiskNode {
    return this.current;
  }

  get isRefreshing(): boolean {
    return this.pendingRefresh !== null;
  }

  selectedNode(): DiskNode | undefined {
    return this.selection === null ? undefined : this.current.children[this.selection];
  }

  snapshot(): NavigatorSnapshot {
    return {
      path: this.current.path,
      size: this.current.size,
      errorCount: this.current.errorCount,
      children: this.current.children,
      itemCount: this.current.children.length,
      selection: this.selection,
      sortMode: this.sortMode,
      sortAscending: this.sortAscending,
      statusMessage: this.statusMessage,
      depth: this.history.length
    };
  }

  clearStatus(): void {
    this.statusMessage = null;
  }

  next(): void {
    const count = this.current.children.length;
    if (count === 0) return;
    this.selection = this.selection === null || this.selection >= count - 1 ? 0 : this.selection + 1;
  }

  previous(): void {
    const count = this.current.children.length;
    if (count === 0) return;
    if (this.selection === null) {
      this.selection = 0;
      return;
    }
    this.selection = this.selection === 0 ? count - 1 : this.selection - 1;
  }

  pageDown(): void {
    const count = this.current.children.length;
    if (count === 0) return;
    this.selection = this.selection === null ? 0 : Math.min(this.selection + PAGE_SIZE, count - 1);
  }

  pageUp(): void {
    const count = this.current.children.length;
    if (count === 0) return;
    this.selection = this.selection === null ? 0 : Math.max(this.selection - PAGE_SIZE, 0);
  }

  goToFirst(): void {
    if (this.current.children.length === 0) return;
    this.selection = 0;
  }

  goToLast(): void {
    const count = this.current.children.length;
    if (count === 0) return;
    this.selection = count - 1;
  }

  enter(): void {
    const selected = this.selectedNode();
    if (!selected?.isDirectory) return;

    this.history.push(this.current);
    this.current = selected;
    this.applySort();
    this.resetSelection();
  }

  goUp(): void {
    const parent = this.history.pop();
    if (!parent) return;

    this.current = parent;
    this.applySort();
    this.resetSelection();
  }

  toggleSortBySize(): void {
    this.toggleSort('size');
  }

  toggleSortByModifiedTime(): void {
    this.toggleSort('mtime');
  }

  toggleSortByItemCount(): void {
    this.toggleSort('count');
  }

  toggleSort(mode: SortMode): void {
    if (this.sortMode === mode) {
      this.sortAscending = !this.sortAscending;
    } else {
      this.sortMode = mode;
      this.sortAscending = false;
    }
    this.applySort();
    this.statusMessage = describeSort(this.sortMode, this.sortAscending);
  }

  /**
   * Rescans the current directory and swaps in its new children, size and
   * error count. The node object itself is kept, so ancestors still point at it.
   * Concurrent calls share the scan already in flight.
   */
  refresh(): Promise<void> {
    if (this.pendingRefresh) return this.pendingRefresh;

    this.pendingRefresh = this.rescan(this.current).finally(() => {
      this.pendingRefresh = null;
    });
    return this.pendingRefresh;
  }

  private async rescan(target: DiskNode): Promise<void> {
    this.statusMessage = 'Rescanning...';

    let rebuilt: DiskNode;
    try {
      rebuilt = await buildTree(target.path, this.options.scanOptions, this.options.entrySource);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Refresh of ${target.path} failed:`, error);
      this.statusMessage = `Refresh failed: ${message}`;
      return;
    }

    const delta = rebuilt.size - target.size;
    target.children = rebuilt.children;
    target.size = rebuilt.size;
    target.errorCount = rebuilt.errorCount;

    if (this.options.propagateRefreshToAncestors === true) {
      for (const ancestor of this.history) {
        ancestor.size += delta;
      }
    }

    this.applySort();
    this.resetSelection();
    this.statusMessage = 'Refresh complete!';
  }

  private applySort(): void {
    sortChildren(this.current, this.sortMode, this.sortAscending);
  }

  private resetSelection(): void {
    this.selection = this.current.children.length > 0 ? 0 : null;
  }
}
