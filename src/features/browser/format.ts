import type { DiskNode } from '#features/disk-tree';

const BINARY_UNITS = ['KiB', 'MiB', 'GiB', 'TiB', 'PiB', 'EiB', 'ZiB', 'YiB'] as const;

const PARTIAL_BLOCKS = ['▏', '▎', '▍', '▌', '▋', '▊', '▉'] as const;
const FULL_BLOCK = '█';

export const BAR_WIDTH = 10;

/** `512 B`, `1.5 KiB`, `3.0 GiB`. */
export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;

  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < BINARY_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${BINARY_UNITS[unit] ?? 'YiB'}`;
}

export function percentOf(size: number, total: number): number {
  return total > 0 ? (size / total) * 100 : 0;
}

/** A bar of full blocks with one trailing eighth-block for the remainder. */
export function renderBar(percent: number, width: number): string {
  const fraction = (percent / 100) * width;
  const fullBlocks = Math.floor(fraction);
  const partial = Math.round((fraction - fullBlocks) * 8);

  let bar = FULL_BLOCK.repeat(Math.min(fullBlocks, width));
  if (fullBlocks < width && partial > 0) {
    bar += PARTIAL_BLOCKS[Math.min(partial - 1, PARTIAL_BLOCKS.length - 1)] ?? '';
  }
  return bar;
}

export interface EntryRow {
  size: string;
  percent: string;
  bar: string;
  name: string;
}

/** Column texts for one listing row, already padded to their widths. */
export function formatEntryRow(node: DiskNode, parentSize: number): EntryRow {
  const percent = percentOf(node.size, parentSize);
  return {
    size: formatSize(node.size).padStart(10),
    percent: `${percent.toFixed(1).padStart(5)}%`,
    bar: renderBar(percent, BAR_WIDTH).padEnd(BAR_WIDTH),
    name: `${node.isDirectory ? '/' : ' '}${node.name}`
  };
}

export const COLUMN_SEPARATOR = ' | ';

export function entryRowText(row: EntryRow): string {
  return [row.size, row.percent, row.bar, row.name].join(COLUMN_SEPARATOR);
}
