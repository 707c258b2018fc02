import type { LogLevel } from '../types/Library.js';

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export interface LoggerOptions {
  level?: LogLevel;
  format?: 'text' | 'json';
  prefix?: string;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in RANK;
}

// Everything goes to stderr: stdout is reserved for the MCP stdio transport.
export class Logger {
  private level: LogLevel;
  private format: 'text' | 'json';
  private readonly prefix: string;

  constructor(opts: LoggerOptions = {}) {
    const envLevel = process.env.SMART_LIBRARY_LOG_LEVEL;
    this.level = opts.level ?? (isLogLevel(envLevel) ? envLevel : 'info');
    this.format = opts.format ?? 'text';
    this.prefix = opts.prefix ?? 'smart-library';
  }

  configure(opts: Pick<LoggerOptions, 'level' | 'format'>): void {
    if (opts.level) this.level = opts.level;
    if (opts.format) this.format = opts.format;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, data?: unknown): void {
    if (RANK[level] < RANK[this.level]) return;
    const timestamp = new Date().toISOString();
    if (this.format === 'json') {
      console.error(JSON.stringify({ level, message, data: serialize(data), timestamp, source: this.prefix }));
      return;
    }
    const line = `[${this.prefix}] ${timestamp} ${level.toUpperCase()} ${message}`;
    if (data === undefined) console.error(line);
    else console.error(line, data instanceof Error ? data.message : JSON.stringify(serialize(data)));
  }
}

function serialize(data: unknown): unknown {
  if (data instanceof Error) return { name: data.name, message: data.message };
  return data;
}

/** Process-wide logger; configured once from config.json at startup. */
export const logger = new Logger();
