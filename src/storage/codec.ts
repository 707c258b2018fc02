import { createHash } from 'node:crypto';
import { gunzipSync, gzipSync } from 'node:zlib';
import { z } from 'zod';
import { FormatError, errorMessage } from '../errors.js';
import { isoDate, itemSchema } from '../model/items.js';
import { taskSchema } from '../model/tasks.js';
import type { LibraryState } from '../types/Library.js';

/**
 * Layout (big endian):
 *   0   4  ASCII magic "SCLB"
 *   4   4  uint32 format version
 *   8   4  uint32 payload length
 *   12  32 sha256(payload)
 *   44  n  gzip(JSON aggregate)
 */
export const MAGIC = 'SCLB';
export const FORMAT_VERSION = 1;
export const HEADER_SIZE = 44;

const DIGEST_SIZE = 32;

export interface FileHeader {
  magic: string;
  version: number;
  payloadLength: number;
  digest: string;
}

const mementoSchema = z.object({
  id: z.string().min(1),
  operation: z.enum(['CREATE', 'UPDATE', 'DELETE']),
  item: itemSchema,
  description: z.string(),
  createdAt: isoDate,
});

export const stateSchema = z.object({
  savedAt: isoDate,
  items: z.array(itemSchema),
  keywordIndex: z.record(z.array(z.string())),
  tagFrequency: z.record(z.number().int().positive()),
  pathIndex: z.record(z.string()),
  tasks: z.array(taskSchema),
  recentlyViewed: z.array(z.string()),
  undoHistory: z.array(mementoSchema),
  retiredIds: z.array(z.string()).default([]),
});

export function emptyState(savedAt: string): LibraryState {
  return {
    savedAt,
    items: [],
    keywordIndex: {},
    tagFrequency: {},
    pathIndex: {},
    tasks: [],
    recentlyViewed: [],
    undoHistory: [],
    retiredIds: [],
  };
}

export function encodeState(state: LibraryState, version: number = FORMAT_VERSION): Buffer {
  const payload = gzipSync(Buffer.from(JSON.stringify(state), 'utf8'));
  const header = Buffer.alloc(HEADER_SIZE);
  header.write(MAGIC, 0, 'ascii');
  header.writeUInt32BE(version, 4);
  header.writeUInt32BE(payload.length, 8);
  createHash('sha256').update(payload).digest().copy(header, 12);
  return Buffer.concat([header, payload]);
}

/**
 * Parses and checks the fixed header. Rejects a wrong magic token and any
 * version newer than this build understands.
 */
export function readHeader(buf: Buffer): FileHeader {
  if (buf.length < HEADER_SIZE) {
    throw new FormatError(`File too short: ${buf.length} bytes, header needs ${HEADER_SIZE}`);
  }
  const magic = buf.toString('ascii', 0, 4);
  if (magic !== MAGIC) {
    throw new FormatError('Invalid file format: magic number mismatch');
  }
  const version = buf.readUInt32BE(4);
  if (version > FORMAT_VERSION) {
    throw new FormatError(`File version ${version} is newer than supported version ${FORMAT_VERSION}`);
  }
  return {
    magic,
    version,
    payloadLength: buf.readUInt32BE(8),
    digest: buf.subarray(12, 12 + DIGEST_SIZE).toString('hex'),
  };
}

export function decodeState(buf: Buffer): { header: FileHeader; state: LibraryState } {
  const header = readHeader(buf);
  const payload = buf.subarray(HEADER_SIZE);
  if (payload.length !== header.payloadLength) {
    throw new FormatError(`Payload length mismatch: header says ${header.payloadLength}, found ${payload.length}`);
  }
  const digest = createHash('sha256').update(payload).digest('hex');
  if (digest !== header.digest) {
    throw new FormatError('Checksum mismatch: payload is corrupted');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(gunzipSync(payload).toString('utf8'));
  } catch (error) {
    throw new FormatError(`Payload could not be decoded: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = stateSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new FormatError(`Invalid library data at ${issue.path.join('.') || '<root>'}: ${issue.message}`);
  }
  return { header, state: parsed.data };
}
