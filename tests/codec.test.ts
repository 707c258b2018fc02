import { describe, it, expect } from '@jest/globals';
import { createHash } from 'crypto';
import { gzipSync } from 'zlib';
import { FormatError } from '../src/errors.js';
import { buildItem } from '../src/model/items.js';
import { FORMAT_VERSION, HEADER_SIZE, MAGIC, decodeState, emptyState, encodeState, readHeader } from '../src/storage/codec.js';
import type { LibraryState } from '../src/types/Library.js';

const NOW = '2026-03-01T12:00:00.000Z';

function sampleState(): LibraryState {
  const item = buildItem({ title: 'Java Guide', tags: ['java'] }, 'A1', NOW);
  return {
    ...emptyState(NOW),
    items: [item],
    keywordIndex: { guide: ['A1'], java: ['A1'] },
    tagFrequency: { java: 1 },
    tasks: [{ id: 'T1', description: 'Read', priority: 'HIGH', status: 'PENDING', createdAt: NOW }],
    recentlyViewed: ['A1'],
  };
}

/** Frames an arbitrary JSON value the way encodeState does. */
function frame(value: unknown): Buffer {
  const payload = gzipSync(Buffer.from(JSON.stringify(value), 'utf8'));
  const header = Buffer.alloc(HEADER_SIZE);
  header.write(MAGIC, 0, 'ascii');
  header.writeUInt32BE(FORMAT_VERSION, 4);
  header.writeUInt32BE(payload.length, 8);
  createHash('sha256').update(payload).digest().copy(header, 12);
  return Buffer.concat([header, payload]);
}

describe('library file codec', () => {
  it('writes the fixed header', () => {
    const buf = encodeState(sampleState());
    expect(buf.toString('ascii', 0, 4)).toBe('SCLB');
    expect(buf.readUInt32BE(4)).toBe(1);
    expect(buf.readUInt32BE(8)).toBe(buf.length - HEADER_SIZE);
    expect(readHeader(buf)).toMatchObject({ magic: 'SCLB', version: 1, payloadLength: buf.length - HEADER_SIZE });
  });

  it('decodes what it encodes', () => {
    const state = sampleState();
    expect(decodeState(encodeState(state)).state).toEqual(state);
  });

  it('rejects a wrong magic token', () => {
    const buf = encodeState(sampleState());
    buf.write('ABCD', 0, 'ascii');
    expect(() => decodeState(buf)).toThrow('Invalid file format: magic number mismatch');
  });

  it('rejects a newer format version', () => {
    const buf = encodeState(sampleState(), 2);
    expect(() => decodeState(buf)).toThrow('File version 2 is newer than supported version 1');
  });

  it('rejects truncated files', () => {
    const buf = encodeState(sampleState());
    expect(() => decodeState(buf.subarray(0, 10))).toThrow('File too short: 10 bytes, header needs 44');
    expect(() => decodeState(buf.subarray(0, buf.length - 3))).toThrow(FormatError);
  });

  it('rejects a payload that does not match its checksum', () => {
    const buf = encodeState(sampleState());
    buf[buf.length - 1] ^= 0xff;
    expect(() => decodeState(buf)).toThrow('Checksum mismatch: payload is corrupted');
  });

  it('rejects an aggregate that fails the schema', () => {
    const bad = { ...sampleState(), items: [{ id: 'A1', title: 'No rating' }] };
    expect(() => decodeState(frame(bad))).toThrow(/^Invalid library data at items\.0\./);
  });

  it('reads files written without a retired id list', () => {
    const { retiredIds, ...older } = { ...sampleState(), retiredIds: ['A0'] };
    expect(retiredIds).toEqual(['A0']);
    expect(decodeState(frame(older)).state.retiredIds).toEqual([]);
  });

  it('rejects a payload that is not gzip', () => {
    const payload = Buffer.from('not gzip at all');
    const header = Buffer.alloc(HEADER_SIZE);
    header.write(MAGIC, 0, 'ascii');
    header.writeUInt32BE(FORMAT_VERSION, 4);
    header.writeUInt32BE(payload.length, 8);
    createHash('sha256').update(payload).digest().copy(header, 12);
    expect(() => decodeState(Buffer.concat([header, payload]))).toThrow(/^Payload could not be decoded/);
  });
});
