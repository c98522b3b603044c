/**
 * Work area: the private temp directory holding one run's intermediate
 * files. Owned by exactly one executor run and removed when the run ends.
 */
import { copyFile, mkdir, mkdtemp, rename, rm } from 'fs/promises';
import { dirname, join } from 'path';
import { logger } from '../utils/logger.js';
import { sanitizeFilename } from '../utils/filename.js';
import type { SlotRef } from './types.js';

export class WorkArea {
  private released = false;

  private constructor(readonly dir: string) {}

  static async acquire(root: string, label: string): Promise<WorkArea> {
    await mkdir(root, { recursive: true });
    const prefix = sanitizeFilename(label).replace(/\s+/g, '_').slice(0, 40) || 'run';
    const dir = await mkdtemp(join(root, `${prefix}-`));
    logger.debug('WorkArea: acquired', { dir });
    return new WorkArea(dir);
  }

  pathOf(ref: SlotRef): string {
    return join(this.dir, ref.fileName);
  }

  /** Remove the directory and everything in it. Safe to call twice. */
  async release(): Promise<void> {
    if (this.released) return;
    await rm(this.dir, { recursive: true, force: true });
    this.released = true;
    logger.debug('WorkArea: released', { dir: this.dir });
  }
}

function isCrossDeviceError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EXDEV';
}

/**
 * Move the finished artifact to its destination. A same-filesystem rename is
 * atomic; across filesystems the file is copied to a ".part" sibling first and
 * renamed into place, so the destination never holds a partial file.
 */
export async function publishArtifact(source: string, destination: string): Promise<void> {
  await mkdir(dirname(destination), { recursive: true });
  try {
    await rename(source, destination);
    return;
  } catch (err) {
    if (!isCrossDeviceError(err)) throw err;
    logger.debug('WorkArea: cross-device move, copying', { source, destination });
  }

  const staging = `${destination}.part`;
  try {
    await copyFile(source, staging);
    await rename(staging, destination);
  } catch (err) {
    await rm(staging, { force: true });
    throw err;
  }
  await rm(source, { force: true });
}
