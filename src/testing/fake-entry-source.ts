import type { ScanOptions, WalkEntry, WalkResult } from '#features/scanner';

import { join } from 'node:path';

export const TEST_ROOT = join('/', 'scan', 'root');

export function okEntry(entry: WalkEntry): WalkResult {
  return { status: 'ok', data: entry };
}

export function fileEntry(path: string, size: number, modifiedTime?: Date): WalkResult {
  return okEntry({ path, size, isDirectory: false, modifiedTime });
}

export function dirEntry(path: string, modifiedTime?: Date): WalkResult {
  return okEntry({ path, size: 0, isDirectory: true, modifiedTime });
}

export function errorEntry(path: string, message = 'permission denied'): WalkResult {
  return { status: 'error', error: { path, code: 'EACCES', message } };
}

/**
 * Expands `{ 'a.txt': 10, 'sub/b.bin': 100 }` into walk results under `rootPath`,
 * including an entry for every intermediate directory.
 */
export function describeTree(rootPath: string, files: Record<string, number>): WalkResult[] {
  const directories = new Set<string>();
  const results: WalkResult[] = [];

  for (const [relativePath, size] of Object.entries(files)) {
    const parts = relativePath.split('/');
    for (let i = 1; i < parts.length; i++) {
      directories.add(join(rootPath, ...parts.slice(0, i)));
    }
    results.push(fileEntry(join(rootPath, ...parts), size));
  }

  for (const directory of directories) {
    results.push(dirEntry(directory));
  }

  return results;
}

export function createFakeEntrySource() {
  const walkCalls: Array<{ rootPath: string; options: ScanOptions }> = [];

  return {
    trees: new Map<string, WalkResult[]>(),
    roots: new Map<string, WalkResult>(),
    walkCalls,

    setTree(rootPath: string, results: WalkResult[]): void {
      this.trees.set(rootPath, results);
    },

    async walk(rootPath: string, options: ScanOptions): Promise<WalkResult[]> {
      this.walkCalls.push({ rootPath, options });
      return this.trees.get(rootPath) ?? [];
    },

    async statRoot(rootPath: string): Promise<WalkResult> {
      const configured = this.roots.get(rootPath);
      if (configured) return configured;
      return dirEntry(rootPath);
    }
  };
}

export type FakeEntrySource = ReturnType<typeof createFakeEntrySource>;
