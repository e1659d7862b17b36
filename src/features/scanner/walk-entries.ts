import type { Stats } from 'node:fs';

import { logger } from '#lib/logger';
import { lstat, readdir, stat } from 'node:fs/promises';
import { availableParallelism } from 'node:os';
import { join } from 'node:path';

import type { EntrySource, ScanOptions, WalkError, WalkResult } from './scanner-types';

import { createConcurrencyLimiter, runDirectoryQueue, type ConcurrencyLimiter } from './concurrency-limiter';

export interface WalkLimits {
  /** Concurrent filesystem calls (readdir/stat). */
  maxFsConcurrency: number;
  /** Directories being processed at once. */
  maxDirectoryConcurrency: number;
}

export function defaultWalkLimits(): WalkLimits {
  const cpus = availableParallelism();
  return {
    maxFsConcurrency: Math.max(16, cpus * 8),
    maxDirectoryConcurrency: Math.max(1, cpus)
  };
}

export function toWalkError(path: string, error: unknown): WalkError {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return { path, code, message: error.message };
  }
  return { path, message: String(error) };
}

function identityOf(stats: Stats): string {
  return `${stats.dev}:${stats.ino}`;
}

interface QueuedDirectory {
  path: string;
  /** Identities of this directory and everything above it. */
  ancestors: ReadonlySet<string>;
}

interface WalkContext {
  options: ScanOptions;
  runLimited: ConcurrencyLimiter;
  readMetadata: (path: string) => Promise<Stats>;
  queue: QueuedDirectory[];
  results: WalkResult[];
  rootDevice: number | undefined;
}

async function processDirectory(ctx: WalkContext, directory: QueuedDirectory): Promise<void> {
  let names: string[];
  try {
    names = await ctx.runLimited(() => readdir(directory.path));
  } catch (error) {
    ctx.results.push({ status: 'error', error: toWalkError(directory.path, error) });
    return;
  }

  await Promise.all(
    names.map(async (name) => processEntry(ctx, join(directory.path, name), directory.ancestors))
  );
}

// Without link following, a link's own device is the one it lives on, not the one it points to.
async function deviceOf(ctx: WalkContext, entryPath: string, stats: Stats): Promise<number> {
  if (!ctx.options.oneFileSystem || ctx.options.followLinks || !stats.isSymbolicLink()) {
    return stats.dev;
  }
  try {
    return (await ctx.runLimited(() => stat(entryPath))).dev;
  } catch (error) {
    logger.debug(`Could not resolve link ${entryPath}: ${toWalkError(entryPath, error).message}`);
    return stats.dev;
  }
}

async function processEntry(
  ctx: WalkContext,
  entryPath: string,
  ancestors: ReadonlySet<string>
): Promise<void> {
  let stats: Stats;
  try {
    stats = await ctx.runLimited(() => ctx.readMetadata(entryPath));
  } catch (error) {
    ctx.results.push({ status: 'error', error: toWalkError(entryPath, error) });
    return;
  }

  const isDirectory = stats.isDirectory();
  ctx.results.push({
    status: 'ok',
    data: {
      path: entryPath,
      size: stats.isFile() ? stats.size : 0,
      isDirectory,
      modifiedTime: stats.mtime,
      device: await deviceOf(ctx, entryPath, stats)
    }
  });

  if (!isDirectory) return;
  if (ctx.options.oneFileSystem && ctx.rootDevice !== undefined && stats.dev !== ctx.rootDevice) return;

  // A linked directory that leads back to one of its own ancestors would never end.
  const identity = identityOf(stats);
  if (ancestors.has(identity)) {
    logger.debug(`Skipping ${entryPath}: it links back to one of its ancestors`);
    return;
  }
  ctx.queue.push({ path: entryPath, ancestors: new Set([...ancestors, identity]) });
}

/**
 * Walks the subtree under `rootPath` and returns one result per descendant.
 * Failures are reported as error results; the walk itself does not reject for them.
 */
export async function walkEntries(
  rootPath: string,
  options: ScanOptions,
  limits: WalkLimits = defaultWalkLimits()
): Promise<WalkResult[]> {
  const results: WalkResult[] = [];
  let root: QueuedDirectory;
  let rootDevice: number | undefined;

  try {
    const rootStats = await stat(rootPath);
    root = { path: rootPath, ancestors: new Set([identityOf(rootStats)]) };
    rootDevice = rootStats.dev;
  } catch (error) {
    results.push({ status: 'error', error: toWalkError(rootPath, error) });
    return results;
  }

  const ctx: WalkContext = {
    options,
    runLimited: createConcurrencyLimiter(limits.maxFsConcurrency),
    readMetadata: async (path) => (options.followLinks ? stat(path) : lstat(path)),
    queue: [root],
    results,
    rootDevice
  };

  await runDirectoryQueue({
    queue: ctx.queue,
    maxDirectoryConcurrency: limits.maxDirectoryConcurrency,
    runOneDirectory: async (directory) => processDirectory(ctx, directory)
  });

  return results;
}

async function statRoot(rootPath: string): Promise<WalkResult> {
  try {
    const stats = await stat(rootPath);
    return {
      status: 'ok',
      data: {
        path: rootPath,
        size: 0,
        isDirectory: stats.isDirectory(),
        modifiedTime: stats.mtime,
        device: stats.dev
      }
    };
  } catch (error) {
    return { status: 'error', error: toWalkError(rootPath, error) };
  }
}

export function createFsEntrySource(limits?: WalkLimits): EntrySource {
  return {
    walk: (rootPath, options) => walkEntries(rootPath, options, limits),
    statRoot
  };
}
