import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as fs from 'fs-extra';
import { DEFAULT_CONFIG, parseConfig, readConfig } from '../src/config.js';
import { LibraryManager } from '../src/LibraryManager.js';
import { getConfigFile } from '../src/storage/paths.js';
import { logger } from '../src/utils/logger.js';
import { makeTempDir, removeDir } from './helpers.js';

describe('configuration', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await makeTempDir();
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await removeDir(dataDir);
  });

  it('fills missing keys with defaults', () => {
    expect(parseConfig({})).toEqual(DEFAULT_CONFIG);
    expect(parseConfig({ maxUndo: 10, logFormat: 'json' })).toEqual({ ...DEFAULT_CONFIG, maxUndo: 10, logFormat: 'json' });
  });

  it('rejects out-of-range values', () => {
    expect(() => parseConfig({ maxBackups: 0 })).toThrow();
    expect(() => parseConfig({ logLevel: 'loud' })).toThrow();
  });

  it('uses defaults when no config file exists', () => {
    expect(readConfig(dataDir)).toEqual(DEFAULT_CONFIG);
  });

  it('reads config.json from the data directory', () => {
    fs.writeJsonSync(getConfigFile(dataDir), { maxRecent: 3, maxBackups: 2 });
    expect(readConfig(dataDir)).toEqual({ ...DEFAULT_CONFIG, maxRecent: 3, maxBackups: 2 });
  });

  it('warns and falls back on an invalid file', () => {
    const warn = jest.spyOn(logger, 'warn').mockImplementation(() => undefined);
    fs.writeFileSync(getConfigFile(dataDir), '{ not json');
    expect(readConfig(dataDir)).toEqual(DEFAULT_CONFIG);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toMatch(/^Ignoring invalid config at /);
  });

  it('lets constructor options override the file', () => {
    fs.writeJsonSync(getConfigFile(dataDir), { maxRecent: 3, maxUndo: 7 });
    const library = new LibraryManager({ dataDir, config: { maxUndo: 2 } });
    expect(library.config.maxRecent).toBe(3);
    expect(library.config.maxUndo).toBe(2);

    for (const title of ['a', 'b', 'c']) library.addItem({ title });
    expect(library.getUndoHistory().map(m => m.item.title)).toEqual(['c', 'b']);
  });
});
