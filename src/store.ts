import fs from 'fs/promises';
import path from 'path';
import crypto from 'crypto';
import { formatCompact, zonedTime } from './clock.js';
import { StorageError, errorMessage } from './errors.js';
import { createLogger } from './logger.js';
import type { CapturedImage, StoredSnapshot } from './types.js';

export const LATEST_FILENAME = 'latest.jpg';

const log = createLogger('store');

const ARCHIVE_PATTERN = /^snapshot_(\d{8}_\d{6})(?:_(\d+))?\.(?:jpg|png|gif|webp)$/;

// Oldest first: by timestamp, then by collision suffix as a number
function compareArchives(a: string, b: string): number {
  const ma = ARCHIVE_PATTERN.exec(a);
  const mb = ARCHIVE_PATTERN.exec(b);
  const stampA = ma?.[1] ?? '';
  const stampB = mb?.[1] ?? '';
  if (stampA !== stampB) return stampA < stampB ? -1 : 1;
  return Number(ma?.[2] ?? 0) - Number(mb?.[2] ?? 0);
}

function stemOf(filename: string): string {
  return filename.slice(0, filename.length - path.extname(filename).length);
}

export interface SnapshotStoreOptions {
  archive: boolean;
  maxArchived: number; // 0 keeps everything
  timeZone: string;
}

/**
 * Snapshot files on disk: a fixed `latest.jpg` that is replaced on every
 * capture, plus timestamped archive copies when archiving is on.
 *
 * Every file is written under a temporary name in the same directory and
 * renamed into place, so readers only ever see complete images. Callers
 * serialize `save`; the store itself does no locking.
 */
export class SnapshotStore {
  private count: number | null = null;
  private last: StoredSnapshot | null = null;
  private lastContentType = 'image/jpeg';

  constructor(readonly dir: string, private readonly options: SnapshotStoreOptions) {}

  get latestPath(): string {
    return path.join(this.dir, LATEST_FILENAME);
  }

  get latestContentType(): string {
    return this.lastContentType;
  }

  sameSettings(dir: string, options: SnapshotStoreOptions): boolean {
    return path.resolve(dir) === path.resolve(this.dir)
      && options.archive === this.options.archive
      && options.maxArchived === this.options.maxArchived
      && options.timeZone === this.options.timeZone;
  }

  async ensureDirectory(): Promise<void> {
    try {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.access(this.dir, fs.constants.W_OK);
    } catch (err) {
      throw new StorageError(`Snapshot directory ${this.dir} is not writable: ${errorMessage(err)}`, err);
    }
  }

  async save(image: CapturedImage, timestamp: Date): Promise<StoredSnapshot> {
    // Reconcile with disk before adding to the count
    const count = await this.currentCount();

    let stored: StoredSnapshot;
    try {
      if (this.options.archive) {
        const filename = await this.freeArchiveName(timestamp, image.extension);
        const archivePath = path.join(this.dir, filename);
        await this.writeAtomic(archivePath, image.data);
        stored = { filename, path: archivePath, timestamp };
        try {
          await this.writeAtomic(this.latestPath, image.data);
        } catch (err) {
          // Not stored unless latest.jpg is; the copy would be counted after a restart
          await fs.rm(archivePath, { force: true });
          throw err;
        }
      } else {
        stored = { filename: LATEST_FILENAME, path: this.latestPath, timestamp };
        await this.writeAtomic(this.latestPath, image.data);
      }
    } catch (err) {
      if (err instanceof StorageError) throw err;
      throw new StorageError(`Failed to store snapshot: ${errorMessage(err)}`, err);
    }

    this.count = count + 1;
    this.last = stored;
    this.lastContentType = image.contentType;

    if (this.options.archive && this.options.maxArchived > 0) {
      await this.prune(this.options.maxArchived);
    }
    return stored;
  }

  /**
   * Number of captures. Seeded from the archive files on disk the first time
   * it is asked for, then counted in memory.
   */
  async currentCount(): Promise<number> {
    if (this.count === null) {
      this.count = (await this.listArchives()).length;
    }
    return this.count;
  }

  async latest(): Promise<StoredSnapshot | null> {
    if (this.last) return this.last;

    // After a restart: newest archive by name, else a leftover latest.jpg
    const archives = await this.listArchives();
    const newest = archives[archives.length - 1];
    const filename = newest ?? LATEST_FILENAME;
    const filePath = path.join(this.dir, filename);
    try {
      const stat = await fs.stat(filePath);
      this.last = { filename, path: filePath, timestamp: stat.mtime };
      return this.last;
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new StorageError(`Cannot read ${filePath}: ${errorMessage(err)}`, err);
    }
  }

  private async listArchives(): Promise<string[]> {
    try {
      const names = await fs.readdir(this.dir);
      return names.filter((n) => ARCHIVE_PATTERN.test(n)).sort(compareArchives);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new StorageError(`Cannot list ${this.dir}: ${errorMessage(err)}`, err);
    }
  }

  // Unique per stem, so captures of one second keep their order whatever the type
  private async freeArchiveName(timestamp: Date, extension: string): Promise<string> {
    const base = `snapshot_${formatCompact(zonedTime(timestamp, this.options.timeZone))}`;
    const taken = new Set((await this.listArchives()).map(stemOf));
    for (let n = 0; ; n++) {
      const stem = n === 0 ? base : `${base}_${n}`;
      if (!taken.has(stem)) return `${stem}.${extension}`;
    }
  }

  private async writeAtomic(target: string, data: Buffer): Promise<void> {
    const tmp = path.join(
      path.dirname(target),
      `.${path.basename(target)}.${crypto.randomBytes(4).toString('hex')}.tmp`,
    );
    try {
      await fs.writeFile(tmp, data);
      await fs.rename(tmp, target);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw new StorageError(`Failed to write ${target}: ${errorMessage(err)}`, err);
    }
  }

  // Best effort: the snapshot is already stored when this runs
  private async prune(keep: number): Promise<void> {
    try {
      const archives = await this.listArchives();
      const excess = archives.slice(0, Math.max(0, archives.length - keep));
      for (const name of excess) {
        await fs.rm(path.join(this.dir, name), { force: true });
      }
    } catch (err) {
      log.warn(`Pruning old snapshots failed: ${errorMessage(err)}`);
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
