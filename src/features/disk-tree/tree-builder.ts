import type { EntrySource, ScanOptions } from '#features/scanner';

import { logger } from '#lib/logger';
import { dirname, sep } from 'node:path';

import { createDiskNode, type DiskNode } from './disk-node';

export interface ScannedEntry {
  path: string;
  size: number;
  isDirectory: boolean;
  modifiedTime?: Date;
}

export function pathDepth(path: string): number {
  return path.split(sep).filter((part) => part.length > 0).length;
}

// Entries whose device cannot be determined on either side are kept.
function isOnOtherDevice(rootDevice: number | undefined, device: number | undefined): boolean {
  return rootDevice !== undefined && device !== undefined && rootDevice !== device;
}

/**
 * Links flat entries under `root` and aggregates directory sizes bottom-up.
 * The result does not depend on the order of `entries`.
 */
export function assembleTree(
  root: DiskNode,
  entries: readonly ScannedEntry[],
  errorCount: number
): DiskNode {
  // Parents are strictly shallower than their children, so they always exist first.
  const byDepth = entries
    .map((entry) => ({ entry, depth: pathDepth(entry.path) }))
    .sort((a, b) => a.depth - b.depth)
    .map(({ entry }) => entry);

  const nodes = new Map<string, DiskNode>([[root.path, root]]);
  const parents = new Map<DiskNode, DiskNode>();
  const created: DiskNode[] = [];

  for (const entry of byDepth) {
    const node = createDiskNode({ ...entry, size: entry.isDirectory ? 0 : entry.size });
    nodes.set(entry.path, node);
    created.push(node);

    const parent = nodes.get(dirname(entry.path));
    if (!parent?.isDirectory) continue;

    parent.children.push(node);
    parents.set(node, parent);
    if (!entry.isDirectory) {
      parent.size += entry.size;
    }
  }

  // Deepest first: every directory is final before it is added to its parent.
  for (let i = created.length - 1; i >= 0; i--) {
    const node = created[i];
    if (!node?.isDirectory) continue;

    const parent = parents.get(node);
    if (parent) {
      parent.size += node.size;
    }
  }

  root.errorCount = errorCount;
  return root;
}

/**
 * Scans `rootPath` through `source` and returns the fully aggregated tree.
 * Unreadable entries are counted on the root rather than failing the scan.
 */
export async function buildTree(
  rootPath: string,
  options: ScanOptions,
  source: EntrySource
): Promise<DiskNode> {
  const rootInfo = await source.statRoot(rootPath);
  let rootDevice: number | undefined;
  let rootModified: Date | undefined;
  if (rootInfo.status === 'ok') {
    rootDevice = rootInfo.data.device;
    rootModified = rootInfo.data.modifiedTime;
  } else {
    logger.warn(`Could not read metadata for ${rootPath}: ${rootInfo.error.message}`);
  }

  const results = await source.walk(rootPath, options);

  const entries: ScannedEntry[] = [];
  let errorCount = 0;

  for (const result of results) {
    if (result.status === 'error') {
      errorCount++;
      logger.debug(`Could not access ${result.error.path}: ${result.error.message}`);
      continue;
    }

    const entry = result.data;
    if (entry.path === rootPath) continue;
    if (options.oneFileSystem && isOnOtherDevice(rootDevice, entry.device)) continue;

    entries.push({
      path: entry.path,
      size: entry.isDirectory ? 0 : entry.size,
      isDirectory: entry.isDirectory,
      modifiedTime: entry.modifiedTime
    });
  }

  if (errorCount > 0) {
    logger.warn(`${errorCount} entries under ${rootPath} could not be read`);
  }

  const root = createDiskNode({ path: rootPath, isDirectory: true, modifiedTime: rootModified });
  return assembleTree(root, entries, errorCount);
}
