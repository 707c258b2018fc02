import * as fs from 'fs-extra';
import { z } from 'zod';
import { getConfigFile } from './storage/paths.js';
import { logger } from './utils/logger.js';
import { errorMessage } from './errors.js';
import type { LibraryConfig } from './types/Library.js';

export const DEFAULT_CONFIG: LibraryConfig = {
  maxUndo: 50,
  maxRecent: 20,
  maxBackups: 5,
  logLevel: 'info',
  logFormat: 'text',
};

const configSchema = z
  .object({
    maxUndo: z.number().int().positive(),
    maxRecent: z.number().int().positive(),
    maxBackups: z.number().int().positive(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
    logFormat: z.enum(['text', 'json']),
  })
  .partial();

export function parseConfig(raw: unknown): LibraryConfig {
  const parsed = configSchema.parse(raw);
  return { ...DEFAULT_CONFIG, ...parsed };
}

/**
 * Reads `<dataDir>/config.json`. A missing file means defaults; an invalid one
 * is logged and ignored.
 */
export function readConfig(dataDir: string): LibraryConfig {
  const configPath = getConfigFile(dataDir);
  if (!fs.existsSync(configPath)) return { ...DEFAULT_CONFIG };
  try {
    const config = parseConfig(fs.readJsonSync(configPath));
    logger.debug(`Loaded configuration from ${configPath}`);
    return config;
  } catch (error) {
    logger.warn(`Ignoring invalid config at ${configPath}: ${errorMessage(error)}`);
    return { ...DEFAULT_CONFIG };
  }
}
