import * as fs from 'fs-extra';
import path from 'node:path';
import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';
import { FormatError, PersistenceIOError, RecoveryExhaustedError, errorMessage, toError } from '../errors.js';
import type { LibraryState } from '../types/Library.js';
import { logger } from '../utils/logger.js';
import { decodeState, emptyState, encodeState } from './codec.js';
import type { FileHeader } from './codec.js';
import { BACKUP_MARKER, DATA_FILENAME, backupName, getBackupDir, getDataFile, getTempFile, isBackupName } from './paths.js';

export const MAX_BACKUPS = 5;

export interface RepositoryOptions {
  dataDir: string;
  maxBackups?: number;
  clock?: Clock;
}

export interface BackupInfo {
  name: string;
  path: string;
  size: number;
  modifiedAt: string;
}

export interface VerifyReport {
  file: string;
  header: FileHeader;
  savedAt: string;
  items: number;
  tasks: number;
  undoEntries: number;
  recentlyViewed: number;
}

export type LoadSource = 'empty' | 'live' | 'backup';

export interface LoadResult {
  state: LibraryState;
  source: LoadSource;
  /** Backup file the state came from when `source` is 'backup'. */
  recoveredFrom?: string;
}

/**
 * Crash-safe storage of the library aggregate in a single binary file.
 *
 * Saves go through a temp file that is fsynced and decoded before it is
 * renamed over the live file, so a reader only ever sees a complete old or
 * complete new file. Every save first copies the live file into `backups/`.
 */
export class LibraryRepository {
  readonly dataDir: string;
  readonly dataFile: string;
  readonly tempFile: string;
  readonly backupDir: string;
  private readonly maxBackups: number;
  private readonly clock: Clock;

  constructor(opts: RepositoryOptions) {
    this.dataDir = opts.dataDir;
    this.dataFile = getDataFile(opts.dataDir);
    this.tempFile = getTempFile(opts.dataDir);
    this.backupDir = getBackupDir(opts.dataDir);
    this.maxBackups = Math.max(1, opts.maxBackups ?? MAX_BACKUPS);
    this.clock = opts.clock ?? systemClock;
  }

  exists(): boolean {
    return fs.existsSync(this.dataFile);
  }

  save(state: LibraryState): void {
    try {
      fs.ensureDirSync(this.dataDir);
      if (this.exists()) this.createBackup();
      writeDurably(this.tempFile, encodeState(state));
      // Never rename a file we could not read back.
      decodeState(fs.readFileSync(this.tempFile));
      fs.renameSync(this.tempFile, this.dataFile);
    } catch (error) {
      this.discardTemp();
      throw new PersistenceIOError(`Failed to save library: ${errorMessage(error)}`, { cause: error });
    }
    logger.debug(`Saved ${state.items.length} items and ${state.tasks.length} tasks to ${this.dataFile}`);

    try {
      this.pruneBackups();
    } catch (error) {
      logger.warn(`Backup pruning failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Reads the live file. A missing file is an empty library; an unreadable one
   * falls back to the newest backup that decodes, which then replaces it.
   */
  load(): LoadResult {
    if (!this.exists()) {
      logger.info(`No library file at ${this.dataFile}, starting empty`);
      return { state: emptyState(this.clock().toISOString()), source: 'empty' };
    }

    let liveError: Error;
    try {
      return { state: decodeState(this.readLive()).state, source: 'live' };
    } catch (error) {
      liveError = toError(error);
      logger.warn(`Library file is unreadable, trying backups: ${liveError.message}`);
    }

    const backupErrors: Error[] = [];
    for (const backup of this.listBackups()) {
      let state: LibraryState;
      try {
        state = decodeState(fs.readFileSync(backup.path)).state;
      } catch (error) {
        const err = toError(error);
        logger.warn(`Backup ${backup.name} is unreadable: ${err.message}`);
        backupErrors.push(new FormatError(`${backup.name}: ${err.message}`, { cause: err }));
        continue;
      }
      try {
        this.promote(backup.path);
      } catch (error) {
        // The decoded state is still returned; the next save rewrites the live file.
        logger.warn(`Could not copy backup ${backup.name} over the library file: ${errorMessage(error)}`);
      }
      logger.info(`Recovered library from backup ${backup.name}`);
      return { state, source: 'backup', recoveredFrom: backup.name };
    }

    throw new RecoveryExhaustedError(liveError, backupErrors);
  }

  /** Copies the live file into the backup directory and returns the backup's path. */
  createBackup(): string {
    if (!this.exists()) {
      throw new PersistenceIOError(`No library file to back up at ${this.dataFile}`);
    }
    try {
      fs.ensureDirSync(this.backupDir);
      const target = this.uniqueBackupPath();
      fs.copySync(this.dataFile, target);
      logger.debug(`Created backup ${path.basename(target)}`);
      return target;
    } catch (error) {
      throw new PersistenceIOError(`Failed to create backup: ${errorMessage(error)}`, { cause: error });
    }
  }

  backupCount(): number {
    return this.listBackups().length;
  }

  /** Newest first, by modification time and then by name. */
  listBackups(): BackupInfo[] {
    if (!fs.existsSync(this.backupDir)) return [];
    const entries = fs
      .readdirSync(this.backupDir)
      .filter(isBackupName)
      .map(name => {
        const full = path.join(this.backupDir, name);
        const stat = fs.statSync(full);
        return { name, path: full, size: stat.size, mtimeMs: stat.mtimeMs };
      });
    entries.sort((a, b) => b.mtimeMs - a.mtimeMs || compareBackupNames(b.name, a.name));
    return entries.map(({ name, path: p, size, mtimeMs }) => ({
      name,
      path: p,
      size,
      modifiedAt: new Date(mtimeMs).toISOString(),
    }));
  }

  /** Decodes `file` (default: the live file) without touching anything on disk. */
  verify(file: string = this.dataFile): VerifyReport {
    let buf: Buffer;
    try {
      buf = fs.readFileSync(file);
    } catch (error) {
      throw new PersistenceIOError(`Cannot read ${file}: ${errorMessage(error)}`, { cause: error });
    }
    const { header, state } = decodeState(buf);
    return {
      file,
      header,
      savedAt: state.savedAt,
      items: state.items.length,
      tasks: state.tasks.length,
      undoEntries: state.undoHistory.length,
      recentlyViewed: state.recentlyViewed.length,
    };
  }

  /** Removes the live file, any leftover temp file and every backup. */
  deleteAll(): void {
    try {
      fs.removeSync(this.dataFile);
      fs.removeSync(this.tempFile);
      fs.removeSync(this.backupDir);
    } catch (error) {
      throw new PersistenceIOError(`Failed to delete library files: ${errorMessage(error)}`, { cause: error });
    }
  }

  private readLive(): Buffer {
    try {
      return fs.readFileSync(this.dataFile);
    } catch (error) {
      throw new PersistenceIOError(`Cannot read ${this.dataFile}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private promote(backupPath: string): void {
    try {
      fs.copySync(backupPath, this.tempFile);
      fs.renameSync(this.tempFile, this.dataFile);
    } catch (error) {
      this.discardTemp();
      throw new PersistenceIOError(`Failed to restore backup: ${errorMessage(error)}`, { cause: error });
    }
  }

  private pruneBackups(): void {
    const stale = this.listBackups().slice(this.maxBackups);
    for (const backup of stale) {
      fs.removeSync(backup.path);
      logger.debug(`Pruned backup ${backup.name}`);
    }
  }

  private uniqueBackupPath(): string {
    const base = backupName(this.clock());
    let candidate = path.join(this.backupDir, base);
    for (let n = 1; fs.existsSync(candidate); n++) {
      candidate = path.join(this.backupDir, `${base}_${n}`);
    }
    return candidate;
  }

  private discardTemp(): void {
    try {
      fs.removeSync(this.tempFile);
    } catch (error) {
      logger.warn(`Could not remove temp file ${this.tempFile}: ${errorMessage(error)}`);
    }
  }
}

/** Writes `data` and fsyncs it; the descriptor is closed on every path. */
function writeDurably(file: string, data: Buffer): void {
  const fd = fs.openSync(file, 'w');
  try {
    let offset = 0;
    while (offset < data.length) offset += fs.writeSync(fd, data, offset, data.length - offset);
    fs.fsyncSync(fd);
  } finally {
    fs.closeSync(fd);
  }
}

const STAMP_PREFIX = DATA_FILENAME + BACKUP_MARKER;

/** Orders backup names by timestamp, then by numeric collision suffix. */
export function compareBackupNames(a: string, b: string): number {
  const pa = parseBackupName(a);
  const pb = parseBackupName(b);
  if (pa.stamp !== pb.stamp) return pa.stamp < pb.stamp ? -1 : 1;
  return pa.seq - pb.seq;
}

function parseBackupName(name: string): { stamp: string; seq: number } {
  const rest = name.slice(STAMP_PREFIX.length);
  // yyyyMMdd_HHmmss_SSS is 19 characters; anything after is "_<n>".
  const stamp = rest.slice(0, 19);
  const seq = Number(rest.slice(20));
  return { stamp, seq: Number.isInteger(seq) ? seq : 0 };
}
