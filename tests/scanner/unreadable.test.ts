import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { mkdtemp, mkdir, writeFile, rm, realpath } from 'node:fs/promises';
import { collectManifests } from '../../src/scanner/scan.js';
import { PathError, errorCode } from '../../src/errors.js';

const locked = vi.hoisted(() => new Set<string>());

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    readdir: async (path: string, options: { withFileTypes: true }) => {
      if (locked.has(path)) {
        throw Object.assign(new Error(`EACCES: permission denied, scandir '${path}'`), {
          code: 'EACCES',
        });
      }
      return actual.readdir(path, options);
    },
  };
});

let root: string;

beforeEach(async () => {
  root = await realpath(await mkdtemp(join(tmpdir(), 'argocd-scan-locked-')));
  await writeFile(join(root, 'good.yaml'), 'kind: Application\n', 'utf-8');
  await mkdir(join(root, 'locked'));
  await writeFile(join(root, 'locked', 'hidden.yaml'), 'kind: Application\n', 'utf-8');
  await mkdir(join(root, 'zeta'));
  await writeFile(join(root, 'zeta', 'last.yaml'), 'kind: Application\n', 'utf-8');
});

afterEach(async () => {
  locked.clear();
  await rm(root, { recursive: true, force: true });
});

describe('scanManifests with unreadable directories', () => {
  it('skips an unreadable subdirectory and keeps walking', async () => {
    locked.add(join(root, 'locked'));
    const unreadable: Array<[string, string | undefined]> = [];

    const files = await collectManifests(root, {
      recursive: true,
      onUnreadable: (path, err) => unreadable.push([path, errorCode(err)]),
    });

    expect(files).toEqual([join(root, 'good.yaml'), join(root, 'zeta', 'last.yaml')]);
    expect(unreadable).toEqual([[join(root, 'locked'), 'EACCES']]);
  });

  it('fails with PathError when the root itself cannot be read', async () => {
    locked.add(root);

    await expect(collectManifests(root)).rejects.toBeInstanceOf(PathError);
  });
});
