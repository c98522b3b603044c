import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { mkdir, mkdtemp, readFile, readdir, rename, rm, stat, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, join } from 'path';

import { WorkArea, publishArtifact } from '../src/pipeline/work-area.js';

vi.mock('fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs/promises')>();
  return { ...actual, rename: vi.fn(actual.rename) };
});

function fsError(code: string): Error {
  return Object.assign(new Error(`${code}: simulated`), { code });
}

async function exists(path: string): Promise<boolean> {
  return stat(path).then(() => true, () => false);
}

describe('WorkArea', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'work-area-test-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  test('acquires a private directory named after the label', async () => {
    const area = await WorkArea.acquire(join(root, 'nested'), 'Demo: clip');

    expect(basename(area.dir)).toMatch(/^Demo_clip-/);
    expect(area.pathOf({ slot: 'video', fileName: 'video.mp4' })).toBe(join(area.dir, 'video.mp4'));
    expect(await exists(area.dir)).toBe(true);
  });

  test('release removes the directory and can be repeated', async () => {
    const area = await WorkArea.acquire(root, 'run');
    await writeFile(area.pathOf({ slot: 'audio', fileName: 'audio.m4a' }), 'a');

    await area.release();
    await area.release();

    expect(await readdir(root)).toEqual([]);
  });
});

describe('publishArtifact', () => {
  let root: string;
  let source: string;
  let destination: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'publish-test-'));
    source = join(root, 'work', 'output.mp4');
    destination = join(root, 'out', 'Demo clip.mp4');
    await mkdir(join(root, 'work'));
    await writeFile(source, 'finished');
    vi.mocked(rename).mockClear();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  test('renames into a directory it creates', async () => {
    await publishArtifact(source, destination);

    expect(await readFile(destination, 'utf-8')).toBe('finished');
    expect(await exists(source)).toBe(false);
  });

  test('copies through a staging file when the rename crosses filesystems', async () => {
    vi.mocked(rename).mockRejectedValueOnce(fsError('EXDEV'));

    await publishArtifact(source, destination);

    expect(await readFile(destination, 'utf-8')).toBe('finished');
    expect(await exists(`${destination}.part`)).toBe(false);
    expect(await exists(source)).toBe(false);
    expect(vi.mocked(rename).mock.calls.map(([, to]) => to)).toEqual([destination, destination]);
  });

  test('removes the staging file and keeps the source when the cross-device move fails', async () => {
    vi.mocked(rename)
      .mockRejectedValueOnce(fsError('EXDEV'))
      .mockRejectedValueOnce(fsError('EACCES'));

    await expect(publishArtifact(source, destination)).rejects.toMatchObject({ code: 'EACCES' });

    expect(await exists(`${destination}.part`)).toBe(false);
    expect(await exists(destination)).toBe(false);
    expect(await readFile(source, 'utf-8')).toBe('finished');
  });

  test('passes other rename failures through', async () => {
    vi.mocked(rename).mockRejectedValueOnce(fsError('EPERM'));

    await expect(publishArtifact(source, destination)).rejects.toMatchObject({ code: 'EPERM' });
    expect(await exists(`${destination}.part`)).toBe(false);
    expect(await readFile(source, 'utf-8')).toBe('finished');
  });
});
