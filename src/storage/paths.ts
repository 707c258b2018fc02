import os from 'node:os';
import path from 'node:path';

export const DATA_FILENAME = 'library.dat';
export const TEMP_SUFFIX = '.tmp';
export const BACKUP_MARKER = '.backup_';
export const CONFIG_FILENAME = 'config.json';

export function getDataDir(custom?: string): string {
  return custom || process.env.SMART_LIBRARY_DIR || path.join(os.homedir(), '.smart-library');
}

export function getDataFile(dataDir: string): string {
  return path.join(dataDir, DATA_FILENAME);
}

export function getTempFile(dataDir: string): string {
  return path.join(dataDir, DATA_FILENAME + TEMP_SUFFIX);
}

export function getBackupDir(dataDir: string): string {
  return path.join(dataDir, 'backups');
}

export function getConfigFile(dataDir: string): string {
  return path.join(dataDir, CONFIG_FILENAME);
}

export function isBackupName(name: string): boolean {
  return name.startsWith(DATA_FILENAME + BACKUP_MARKER) && !name.endsWith(TEMP_SUFFIX);
}

/** library.dat.backup_20261019_042600_123 */
export function backupName(at: Date): string {
  const pad = (n: number, w = 2) => String(n).padStart(w, '0');
  const stamp =
    `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}` +
    `_${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}` +
    `_${pad(at.getMilliseconds(), 3)}`;
  return DATA_FILENAME + BACKUP_MARKER + stamp;
}
