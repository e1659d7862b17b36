import { buildTree } from '#features/disk-tree';
import { findNode } from '#testing/tree-inspection';
import { mkdir, mkdtemp, rm, stat, symlink, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { WalkEntry, WalkResult } from './scanner-types';

import { createFsEntrySource, toWalkError, walkEntries } from './walk-entries';

const limits = { maxFsConcurrency: 4, maxDirectoryConcurrency: 2 };
const noLinks = { followLinks: false, oneFileSystem: false };
const withLinks = { followLinks: true, oneFileSystem: false };

let base: string;
let root: string;

beforeEach(async () => {
  base = await mkdtemp(join(tmpdir(), 'dusk-walk-'));
  root = join(base, 'root');
  await mkdir(join(root, 'sub'), { recursive: true });
  await writeFile(join(root, 'a.txt'), 'x'.repeat(10));
  await writeFile(join(root, 'sub', 'b.bin'), Buffer.alloc(100));
});

afterEach(async () => {
  await rm(base, { recursive: true, force: true });
});

function okEntries(results: WalkResult[]): Map<string, WalkEntry> {
  const entries = new Map<string, WalkEntry>();
  for (const result of results) {
    if (result.status === 'ok') entries.set(result.data.path, result.data);
  }
  return entries;
}

function errorPaths(results: WalkResult[]): string[] {
  return results.flatMap((result) => (result.status === 'error' ? [result.error.path] : []));
}

describe('walkEntries', () => {
  it('reports every descendant with file sizes', async () => {
    const entries = okEntries(await walkEntries(root, noLinks, limits));

    expect([...entries.keys()].sort()).toEqual(
      [join(root, 'a.txt'), join(root, 'sub'), join(root, 'sub', 'b.bin')].sort()
    );
    expect(entries.get(join(root, 'a.txt'))?.size).toBe(10);
    expect(entries.get(join(root, 'sub', 'b.bin'))?.size).toBe(100);
    expect(entries.get(join(root, 'sub'))?.isDirectory).toBe(true);
    expect(entries.get(join(root, 'sub'))?.size).toBe(0);
    expect(entries.get(join(root, 'a.txt'))?.modifiedTime).toBeInstanceOf(Date);
    expect(typeof entries.get(join(root, 'a.txt'))?.device).toBe('number');
  });

  it('does not descend into linked directories unless asked to', async () => {
    await mkdir(join(base, 'outside'));
    await writeFile(join(base, 'outside', 'x.bin'), Buffer.alloc(7));
    await symlink(join(base, 'outside'), join(root, 'link'));

    const plain = okEntries(await walkEntries(root, noLinks, limits));
    expect(plain.get(join(root, 'link'))?.isDirectory).toBe(false);
    expect(plain.get(join(root, 'link'))?.size).toBe(0);
    expect(plain.has(join(root, 'link', 'x.bin'))).toBe(false);

    const followed = okEntries(await walkEntries(root, withLinks, limits));
    expect(followed.get(join(root, 'link'))?.isDirectory).toBe(true);
    expect(followed.get(join(root, 'link', 'x.bin'))?.size).toBe(7);
  });

  it('reports a dangling link as an error when following links', async () => {
    await symlink(join(base, 'nowhere'), join(root, 'dangling'));

    const results = await walkEntries(root, withLinks, limits);

    expect(errorPaths(results)).toEqual([join(root, 'dangling')]);
    const failure = results.find((result) => result.status === 'error');
    expect(failure?.status === 'error' ? failure.error.code : undefined).toBe('ENOENT');
  });

  it('stops at links that lead back up the tree', async () => {
    await symlink(root, join(root, 'sub', 'back'));

    const entries = okEntries(await walkEntries(root, withLinks, limits));

    expect(entries.get(join(root, 'sub', 'back'))?.isDirectory).toBe(true);
    expect(entries.has(join(root, 'sub', 'back', 'a.txt'))).toBe(false);
  });

  it('descends into a directory and a link to it alike', async () => {
    await mkdir(join(root, 'zreal'));
    await writeFile(join(root, 'zreal', 'f.bin'), Buffer.alloc(100));
    await symlink(join(root, 'zreal'), join(root, 'alink'));

    const entries = okEntries(await walkEntries(root, withLinks, limits));

    expect(entries.get(join(root, 'zreal', 'f.bin'))?.size).toBe(100);
    expect(entries.get(join(root, 'alink', 'f.bin'))?.size).toBe(100);
  });

  it.runIf(process.platform === 'linux')(
    'reports the device a link points to when staying on one filesystem',
    async () => {
      await symlink('/proc', join(root, 'elsewhere'));
      const procDevice = (await stat('/proc')).dev;

      const entries = okEntries(
        await walkEntries(root, { followLinks: false, oneFileSystem: true }, limits)
      );

      expect(entries.get(join(root, 'elsewhere'))?.device).toBe(procDevice);
      expect(entries.get(join(root, 'elsewhere'))?.isDirectory).toBe(false);
    }
  );

  it('returns a single error when the root cannot be read', async () => {
    const missing = join(base, 'missing');

    const results = await walkEntries(missing, noLinks, limits);

    expect(results).toHaveLength(1);
    expect(errorPaths(results)).toEqual([missing]);
  });
});

describe('createFsEntrySource', () => {
  it('reads root metadata', async () => {
    const result = await createFsEntrySource(limits).statRoot(root);

    expect(result.status).toBe('ok');
    expect(result.status === 'ok' ? result.data.isDirectory : false).toBe(true);
  });

  it('reports a missing root as an error', async () => {
    const result = await createFsEntrySource(limits).statRoot(join(base, 'missing'));

    expect(result.status === 'error' ? result.error.code : undefined).toBe('ENOENT');
  });

  it('counts a directory in full when a sibling links to it', async () => {
    await mkdir(join(root, 'zreal'));
    await writeFile(join(root, 'zreal', 'f.bin'), Buffer.alloc(100));
    await symlink(join(root, 'zreal'), join(root, 'alink'));

    const tree = await buildTree(root, withLinks, createFsEntrySource(limits));

    expect(findNode(tree, join(root, 'zreal'))?.size).toBe(100);
    expect(findNode(tree, join(root, 'alink'))?.size).toBe(100);
  });

  it.runIf(process.platform === 'linux')(
    'drops links to another filesystem with oneFileSystem',
    async () => {
      await symlink('/proc', join(root, 'elsewhere'));

      const tree = await buildTree(
        root,
        { followLinks: false, oneFileSystem: true },
        createFsEntrySource(limits)
      );

      expect(findNode(tree, join(root, 'elsewhere'))).toBeUndefined();
      expect(tree.size).toBe(110);
    }
  );

  it('feeds buildTree with a real directory', async () => {
    const tree = await buildTree(root, noLinks, createFsEntrySource(limits));

    expect(tree.size).toBe(110);
    expect(findNode(tree, join(root, 'sub'))?.size).toBe(100);
    expect(tree.errorCount).toBe(0);
  });
});

describe('toWalkError', () => {
  it('keeps the error code when there is one', () => {
    const error = Object.assign(new Error('denied'), { code: 'EACCES' });

    expect(toWalkError('/p', error)).toEqual({ path: '/p', code: 'EACCES', message: 'denied' });
  });

  it('stringifies values that are not errors', () => {
    expect(toWalkError('/p', 'odd')).toEqual({ path: '/p', message: 'odd' });
  });
});
