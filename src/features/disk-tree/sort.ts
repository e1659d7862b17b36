import { childCount, type DiskNode } from './disk-node';

export type SortMode = 'size' | 'mtime' | 'count';

function compareNumbers(a: number, b: number): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// A missing timestamp sorts as the oldest possible one.
function compareTimes(a: Date | undefined, b: Date | undefined): number {
  if (a === undefined) return b === undefined ? 0 : -1;
  if (b === undefined) return 1;
  return compareNumbers(a.getTime(), b.getTime());
}

/** Natural (ascending) comparison of two nodes for a sort mode. */
export function compareNodes(a: DiskNode, b: DiskNode, mode: SortMode): number {
  switch (mode) {
    case 'size':
      return compareNumbers(a.size, b.size);
    case 'mtime':
      return compareTimes(a.modifiedTime, b.modifiedTime);
    case 'count':
      return compareNumbers(childCount(a), childCount(b));
  }
}

/**
 * Reorders `node.children` in place.
 * Equal keys keep their current relative order.
 */
export function sortChildren(node: DiskNode, mode: SortMode, ascending: boolean): void {
  node.children.sort((a, b) => {
    const cmp = compareNodes(a, b, mode);
    return ascending ? cmp : -cmp;
  });
}

export function describeSort(mode: SortMode, ascending: boolean): string {
  return `Sort: ${mode} ${ascending ? 'asc' : 'desc'}`;
}
