import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import * as fs from 'fs-extra';
import { DAY_MS } from '../src/clock.js';
import { PersistenceIOError } from '../src/errors.js';
import { readResource } from '../src/index.js';
import { LibraryManager } from '../src/LibraryManager.js';
import { callTool, listTools, toMcpError } from '../src/tools.js';
import type { ToolContext } from '../src/tools.js';
import { ManualClock, makeTempDir, removeDir } from './helpers.js';

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected a failure');
}

describe('MCP tools', () => {
  let dataDir: string;
  let clock: ManualClock;
  let ctx: ToolContext;

  const call = (name: string, args: unknown = {}): unknown => JSON.parse(callTool(ctx, name, args).content[0].text);

  beforeEach(async () => {
    dataDir = await makeTempDir();
    clock = new ManualClock();
    ctx = { manager: new LibraryManager({ dataDir, clock: clock.now }), autoSave: false };
  });

  afterEach(async () => {
    await removeDir(dataDir);
  });

  it('lists every tool with an object schema', () => {
    const tools = listTools();
    const names = tools.map(t => t.name);
    expect(names).toEqual(expect.arrayContaining(['item.add', 'item.search', 'task.poll', 'history.undo', 'library.save']));
    expect(new Set(names).size).toBe(names.length);
    for (const tool of tools) expect(tool.inputSchema.type).toBe('object');
  });

  it('adds, searches and fetches items', () => {
    call('item.add', { id: 'A1', title: 'Java Guide', tags: ['java'], rating: 4 });
    call('item.add', { id: 'A2', title: 'Cooking Basics', category: 'Food' });

    expect(call('item.search', { query: 'java' })).toMatchObject({ total: 1, results: [{ item: { id: 'A1' } }] });
    expect(call('item.get', { id: 'A2' })).toMatchObject({ id: 'A2', category: 'Food' });
    expect(call('item.list', { category: 'food' })).toMatchObject({ total: 1 });
    expect(call('history.recent')).toMatchObject({ total: 1, items: [{ id: 'A2' }] });
  });

  it('reports path duplicates and imports only new paths', () => {
    call('item.add', { id: 'A1', title: 'Talk', filePath: '/media/talk.mp4' });
    expect(call('item.isDuplicate', { filePath: '/media/talk.mp4' })).toEqual({ filePath: '/media/talk.mp4', duplicate: true });

    const summary = call('item.import', {
      items: [
        { title: 'Talk again', filePath: '/media/talk.mp4' },
        { title: 'Notes', filePath: '/docs/notes.pdf' },
      ],
    });
    expect(summary).toMatchObject({ skippedPaths: ['/media/talk.mp4'], errors: [], imported: [{ title: 'Notes', fileType: '.pdf' }] });
  });

  it('serves tasks with their effective priority', () => {
    call('task.add', { id: 'T1', description: 'Low', priority: 'LOW' });
    call('task.add', { id: 'T2', description: 'Late', priority: 'LOW', deadline: new Date(clock.millis() - DAY_MS).toISOString() });

    expect(call('task.list')).toMatchObject({
      total: 2,
      tasks: [
        { id: 'T2', effectivePriority: 21 },
        { id: 'T1', effectivePriority: 1 },
      ],
    });
    expect(call('task.overdue')).toMatchObject({ total: 1, tasks: [{ id: 'T2' }] });
    expect(call('task.poll')).toMatchObject({ task: { id: 'T2' } });
    expect(call('task.peek')).toMatchObject({ task: { id: 'T1' } });
  });

  it('undoes through the history tools', () => {
    call('item.add', { id: 'A1', title: 'Draft' });
    call('item.update', { id: 'A1', title: 'Final' });
    expect(call('history.undoLog')).toMatchObject([
      { operation: 'UPDATE', itemId: 'A1', summary: 'UPDATE: Updated: Draft (just now)' },
      { operation: 'CREATE', itemId: 'A1' },
    ]);
    expect(call('history.undo')).toEqual({ undone: true, message: 'Undone: Updated: Draft', operation: 'UPDATE', itemId: 'A1' });
    expect(call('item.get', { id: 'A1' })).toMatchObject({ title: 'Draft' });
  });

  it('maps unknown ids to invalid params', () => {
    const error = catchError(() => call('item.get', { id: 'missing' }));
    expect(error).toBeInstanceOf(McpError);
    expect(error).toMatchObject({ code: ErrorCode.InvalidParams, data: { code: 'NOT_FOUND' } });
    expect(catchError(() => call('task.remove', { id: 'missing' }))).toMatchObject({ code: ErrorCode.InvalidParams });
  });

  it('rejects arguments that fail the schema', () => {
    expect(catchError(() => call('item.add', { title: 'x', rating: 9 }))).toMatchObject({ code: ErrorCode.InvalidParams });
    expect(catchError(() => call('library.clear', {}))).toMatchObject({ code: ErrorCode.InvalidParams });
    expect(ctx.manager.getStatistics().totalItems).toBe(0);
  });

  it('refuses unknown tools', () => {
    expect(catchError(() => call('item.explode'))).toMatchObject({ code: ErrorCode.MethodNotFound });
  });

  it('maps other engine errors to internal errors', () => {
    expect(toMcpError(new PersistenceIOError('disk full'))).toMatchObject({
      code: ErrorCode.InternalError,
      data: { code: 'PERSISTENCE_IO' },
    });
    expect(toMcpError(new Error('boom'))).toMatchObject({ code: ErrorCode.InternalError });
  });

  it('saves after mutating tools when autosave is on', () => {
    ctx = { ...ctx, autoSave: true };
    call('item.search', { query: 'nothing' });
    expect(ctx.manager.getRepository().exists()).toBe(false);

    call('item.add', { id: 'A1', title: 'Persisted' });
    const reopened = LibraryManager.open({ dataDir, clock: clock.now });
    expect(reopened.getItem('A1')?.title).toBe('Persisted');
  });

  it('returns the applied change when the autosave fails', () => {
    ctx = { ...ctx, autoSave: true };
    fs.mkdirSync(ctx.manager.getRepository().tempFile);

    const result = callTool(ctx, 'item.add', { title: 'Unsaved' });
    expect(result.content).toHaveLength(2);
    expect(JSON.parse(result.content[0].text)).toMatchObject({ title: 'Unsaved' });
    expect(JSON.parse(result.content[1].text)).toMatchObject({
      saved: false,
      saveError: expect.stringMatching(/^Failed to save library: /),
    });
    expect(ctx.manager.listItems().map(i => i.title)).toEqual(['Unsaved']);
  });

  it('persists views recorded by item.get', () => {
    ctx = { ...ctx, autoSave: true };
    ctx.manager.addItem({ id: 'A1', title: 'Viewed' });
    call('item.get', { id: 'A1' });

    const reopened = LibraryManager.open({ dataDir, clock: clock.now });
    expect(reopened.listRecentlyViewed().map(i => i.id)).toEqual(['A1']);
  });

  it('clears only with confirmation', () => {
    call('item.add', { id: 'A1', title: 'x' });
    expect(call('library.clear', { confirm: true })).toEqual({ cleared: true });
    expect(call('library.stats')).toMatchObject({ totalItems: 0, undoHistorySize: 0 });
  });

  it('reads resources', () => {
    ctx.manager.addItem({ id: 'A1', title: 'x' });
    ctx.manager.getItem('A1');
    expect(readResource(ctx.manager, 'library://stats')).toMatchObject({ totalItems: 1 });
    expect(readResource(ctx.manager, 'library://recent')).toMatchObject([{ id: 'A1' }]);
    expect(readResource(ctx.manager, 'library://tasks')).toEqual([]);
    expect(catchError(() => readResource(ctx.manager, 'library://nope'))).toMatchObject({ code: ErrorCode.InvalidRequest });
  });
});
