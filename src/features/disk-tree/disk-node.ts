import { basename } from 'node:path';

export interface DiskNode {
  name: string;
  path: string;
  /** File byte length, or the sum of every file below a directory. */
  size: number;
  isDirectory: boolean;
  children: DiskNode[];
  /** Entries that could not be read during this node's own scan. */
  errorCount: number;
  modifiedTime?: Date;
}

export interface DiskNodeInit {
  path: string;
  isDirectory: boolean;
  size?: number;
  modifiedTime?: Date;
}

/** Display name for a path: its last component, or '' for a filesystem root. */
function nodeName(path: string): string {
  return basename(path);
}

export function createDiskNode({ path, isDirectory, size = 0, modifiedTime }: DiskNodeInit): DiskNode {
  return {
    name: nodeName(path),
    path,
    size,
    isDirectory,
    children: [],
    errorCount: 0,
    modifiedTime
  };
}

export function childCount(node: DiskNode): number {
  return node.children.length;
}
