import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { mkdtemp, mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { writeOutput } from '../../src/output/index.js';
import { sanitizeFilename } from '../../src/output/per-application.js';
import { writeFileAtomic } from '../../src/utils/atomic-write.js';
import { entriesToJson } from '../../src/utils/json.js';
import { WriteError } from '../../src/errors.js';
import type { MigratedEntry } from '../../src/types/argocd.js';

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await mkdtemp(join(tmpdir(), 'argocd-output-'));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(tmpDir, { recursive: true, force: true });
});

function entry(name: string): MigratedEntry {
  return {
    metadata: { name },
    project: 'default',
    source: {
      repoURL: 'https://git.example.com/apps.git',
      revision: 'HEAD',
      manifestPath: name,
      directory: { recurse: true },
    },
    destination: { namespace: 'default' },
    enableSyncPolicy: false,
  };
}

describe('entriesToJson', () => {
  it('uses two-space indentation and a trailing newline', () => {
    expect(entriesToJson([])).toBe('[]\n');
    expect(entriesToJson(entry('a')).startsWith('{\n  "metadata": {\n    "name": "a"\n  },')).toBe(
      true,
    );
  });
});

describe('writeOutput', () => {
  it('writes one aggregate array file', async () => {
    const outputDir = join(tmpDir, 'out');
    const files = await writeOutput([entry('a'), entry('b')], {
      outputDir,
      outputFile: 'apps.json',
      format: 'aggregate',
    });

    expect(files).toEqual([join(outputDir, 'apps.json')]);
    const written: unknown = JSON.parse(await readFile(files[0], 'utf-8'));
    expect(written).toEqual([entry('a'), entry('b')]);
    expect(await readdir(outputDir)).toEqual(['apps.json']);
  });

  it('writes one object file per application', async () => {
    const files = await writeOutput([entry('web'), entry('api')], {
      outputDir: tmpDir,
      outputFile: 'ignored.json',
      format: 'per-application',
    });

    expect(files).toEqual([join(tmpDir, 'web.json'), join(tmpDir, 'api.json')]);
    expect(JSON.parse(await readFile(join(tmpDir, 'api.json'), 'utf-8'))).toEqual(entry('api'));
  });

  it('refuses to write when two names map to the same file', async () => {
    const write = writeOutput([entry('team:web'), entry('team-web')], {
      outputDir: tmpDir,
      outputFile: 'ignored.json',
      format: 'per-application',
    });

    await expect(write).rejects.toThrow(
      `Failed to write ${join(tmpDir, 'team-web.json')}: ` +
        'applications "team:web" and "team-web" map to the same file',
    );
    expect(await readdir(tmpDir)).toEqual([]);
  });

  it('raises WriteError when the output directory cannot be created', async () => {
    const blocker = join(tmpDir, 'file');
    await writeFile(blocker, 'x', 'utf-8');

    await expect(
      writeOutput([entry('a')], {
        outputDir: join(blocker, 'out'),
        outputFile: 'apps.json',
        format: 'aggregate',
      }),
    ).rejects.toBeInstanceOf(WriteError);
  });
});

describe('writeFileAtomic', () => {
  it('replaces an existing file and leaves no temp files behind', async () => {
    const target = join(tmpDir, 'apps.json');
    await writeFile(target, 'old', 'utf-8');

    await writeFileAtomic(target, 'new');

    expect(await readFile(target, 'utf-8')).toBe('new');
    expect(await readdir(tmpDir)).toEqual(['apps.json']);
  });

  it('keeps the previous file when the write fails', async () => {
    // A directory in the target's place makes the final rename fail.
    const target = join(tmpDir, 'apps.json');
    await mkdir(target);
    await writeFile(join(target, 'keep'), 'previous', 'utf-8');

    await expect(writeFileAtomic(target, 'new')).rejects.toBeInstanceOf(WriteError);
    expect(await readFile(join(target, 'keep'), 'utf-8')).toBe('previous');
    expect(await readdir(tmpDir)).toEqual(['apps.json']);
  });

  it('reports the write failure even when the temp file cannot be removed', async () => {
    // A directory at the temp path fails the write, and then the cleanup.
    vi.spyOn(Date, 'now').mockReturnValue(1000);
    const target = join(tmpDir, 'apps.json');
    await mkdir(join(tmpDir, `.apps.json.${process.pid}.1000.tmp`));

    const error: unknown = await writeFileAtomic(target, 'new').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(WriteError);
    expect(error).toMatchObject({ path: target, cause: { code: 'EISDIR' } });
  });
});

describe('sanitizeFilename', () => {
  it('keeps names inside the output directory', () => {
    expect(sanitizeFilename('../../etc/passwd')).toBe('passwd');
    expect(sanitizeFilename('team a:web')).toBe('team-a-web');
  });
});
