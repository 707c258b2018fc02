import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { toMillis } from './clock.js';
import { DuplicateIdError, LibraryError, NotFoundError, ValidationError, errorMessage } from './errors.js';
import { describeMemento } from './history/Memento.js';
import type { LibraryManager } from './LibraryManager.js';
import { TASK_PRIORITIES, TASK_STATUSES } from './types/Library.js';
import { logger } from './utils/logger.js';

type JsonSchema = {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
  additionalProperties?: boolean;
};

export interface ToolContext {
  manager: LibraryManager;
  /** Persist after every tool that changes the library. */
  autoSave: boolean;
}

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
};

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: JsonSchema;
  mutates: boolean;
  call(ctx: ToolContext, rawArgs: unknown): unknown;
}

function defineTool<S extends z.ZodTypeAny>(def: {
  name: string;
  description: string;
  inputSchema: JsonSchema;
  args: S;
  mutates?: boolean;
  run: (manager: LibraryManager, args: z.infer<S>) => unknown;
}): ToolDefinition {
  return {
    name: def.name,
    description: def.description,
    inputSchema: def.inputSchema,
    mutates: def.mutates ?? false,
    call(ctx, rawArgs) {
      const parsed = def.args.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new McpError(ErrorCode.InvalidParams, `${def.name}: ${issue.path.join('.') || 'arguments'} ${issue.message}`);
      }
      return def.run(ctx.manager, parsed.data);
    },
  };
}

const isoDate = z.string().refine(s => !Number.isNaN(toMillis(s)), 'must be an ISO-8601 timestamp');
const id = z.object({ id: z.string().min(1) });
const none = z.object({});

const itemFields = {
  title: z.string(),
  category: z.string().optional(),
  tags: z.array(z.string()).optional(),
  rating: z.number().int().min(0).max(5).optional(),
  description: z.string().optional(),
  filePath: z.string().optional(),
  mediaUrl: z.string().optional(),
  fileType: z.string().optional(),
  fileSize: z.number().int().nonnegative().optional(),
};
const itemInput = z.object({ id: z.string().min(1).optional(), ...itemFields, createdAt: isoDate.optional() });
const itemUpdate = z.object({ id: z.string().min(1), ...itemFields, title: z.string().optional() });

const taskFields = {
  description: z.string(),
  itemId: z.string().optional(),
  priority: z.enum(['LOW', 'MEDIUM', 'HIGH', 'URGENT']).optional(),
  status: z.enum(['PENDING', 'IN_PROGRESS', 'COMPLETED', 'CANCELLED']).optional(),
  deadline: isoDate.optional(),
  notes: z.string().optional(),
  estimatedMinutes: z.number().int().nonnegative().optional(),
};
const taskInput = z.object({ id: z.string().min(1).optional(), ...taskFields });
const taskUpdate = z.object({ id: z.string().min(1), ...taskFields, description: z.string().optional() });

const str = { type: 'string' };
const idSchema: JsonSchema = { type: 'object', properties: { id: str }, required: ['id'], additionalProperties: false };
const emptySchema: JsonSchema = { type: 'object', properties: {}, additionalProperties: false };
const itemProperties = {
  id: str,
  title: str,
  category: str,
  tags: { type: 'array', items: str },
  rating: { type: 'integer', minimum: 0, maximum: 5 },
  description: str,
  filePath: str,
  mediaUrl: str,
  fileType: str,
  fileSize: { type: 'integer', minimum: 0 },
};
const taskProperties = {
  id: str,
  description: str,
  itemId: str,
  priority: { type: 'string', enum: TASK_PRIORITIES },
  status: { type: 'string', enum: TASK_STATUSES },
  deadline: { type: 'string', format: 'date-time' },
  notes: str,
  estimatedMinutes: { type: 'integer', minimum: 0 },
};

export const TOOLS: ToolDefinition[] = [
  defineTool({
    name: 'item.add',
    description: 'Add an item to the library',
    inputSchema: {
      type: 'object',
      properties: { ...itemProperties, createdAt: { type: 'string', format: 'date-time' } },
      required: ['title'],
      additionalProperties: false,
    },
    args: itemInput,
    mutates: true,
    run: (m, args) => m.addItem(args),
  }),
  defineTool({
    name: 'item.update',
    description: 'Update fields of an existing item',
    inputSchema: { type: 'object', properties: itemProperties, required: ['id'], additionalProperties: false },
    args: itemUpdate,
    mutates: true,
    run: (m, args) => m.updateItem(args),
  }),
  defineTool({
    name: 'item.delete',
    description: 'Delete an item by id',
    inputSchema: idSchema,
    args: id,
    mutates: true,
    run: (m, args) => m.deleteItem(args.id),
  }),
  defineTool({
    name: 'item.get',
    description: 'Get an item by id and record it as recently viewed',
    inputSchema: idSchema,
    args: id,
    mutates: true,
    run: (m, args) => {
      const item = m.getItem(args.id);
      if (!item) throw new NotFoundError('item', args.id);
      return item;
    },
  }),
  defineTool({
    name: 'item.list',
    description: 'List items, optionally filtered by category or tag',
    inputSchema: {
      type: 'object',
      properties: { category: str, tag: str },
      additionalProperties: false,
    },
    args: z.object({ category: z.string().optional(), tag: z.string().optional() }),
    run: (m, args) => {
      let items = args.category !== undefined ? m.listItemsByCategory(args.category) : m.listItems();
      if (args.tag !== undefined) {
        const tagged = new Set(m.getItemsByTag(args.tag).map(i => i.id));
        items = items.filter(i => tagged.has(i.id));
      }
      return { total: items.length, items };
    },
  }),
  defineTool({
    name: 'item.search',
    description: 'Ranked keyword search over titles, descriptions and tags',
    inputSchema: {
      type: 'object',
      properties: { query: str, limit: { type: 'integer', minimum: 1 } },
      required: ['query'],
      additionalProperties: false,
    },
    args: z.object({ query: z.string(), limit: z.number().int().positive().optional() }),
    run: (m, args) => {
      const results = m.search(args.query);
      return { total: results.length, results: args.limit ? results.slice(0, args.limit) : results };
    },
  }),
  defineTool({
    name: 'item.isDuplicate',
    description: 'Check whether a file path is already in the library',
    inputSchema: { type: 'object', properties: { filePath: str }, required: ['filePath'], additionalProperties: false },
    args: z.object({ filePath: z.string() }),
    run: (m, args) => ({ filePath: args.filePath, duplicate: m.isDuplicatePath(args.filePath) }),
  }),
  defineTool({
    name: 'item.import',
    description: 'Add candidate items, skipping those whose file path is already known',
    inputSchema: {
      type: 'object',
      properties: { items: { type: 'array', items: { type: 'object', properties: itemProperties, required: ['title'] } } },
      required: ['items'],
      additionalProperties: false,
    },
    args: z.object({ items: z.array(itemInput) }),
    mutates: true,
    run: (m, args) => m.importItems(args.items),
  }),
  defineTool({
    name: 'task.add',
    description: 'Queue a task',
    inputSchema: { type: 'object', properties: taskProperties, required: ['description'], additionalProperties: false },
    args: taskInput,
    mutates: true,
    run: (m, args) => m.addTask(args),
  }),
  defineTool({
    name: 'task.update',
    description: 'Change a queued task; priority and deadline changes reorder the queue',
    inputSchema: { type: 'object', properties: taskProperties, required: ['id'], additionalProperties: false },
    args: taskUpdate,
    mutates: true,
    run: (m, args) => m.updateTask(args),
  }),
  defineTool({
    name: 'task.remove',
    description: 'Remove a task from the queue',
    inputSchema: idSchema,
    args: id,
    mutates: true,
    run: (m, args) => {
      const task = m.removeTask(args.id);
      if (!task) throw new NotFoundError('task', args.id);
      return task;
    },
  }),
  defineTool({
    name: 'task.peek',
    description: 'Show the next task without removing it',
    inputSchema: emptySchema,
    args: none,
    run: m => ({ task: m.peekNextTask() }),
  }),
  defineTool({
    name: 'task.poll',
    description: 'Remove and return the next task',
    inputSchema: emptySchema,
    args: none,
    mutates: true,
    run: m => ({ task: m.pollNextTask() }),
  }),
  defineTool({
    name: 'task.list',
    description: 'List queued tasks in the order they would be served',
    inputSchema: { type: 'object', properties: { dueSoon: { type: 'boolean' } }, additionalProperties: false },
    args: z.object({ dueSoon: z.boolean().optional() }),
    run: (m, args) => {
      const tasks = args.dueSoon ? m.listDueSoonTasks() : m.listTasks();
      return { total: tasks.length, tasks: tasks.map(t => ({ ...t, effectivePriority: m.effectivePriority(t) })) };
    },
  }),
  defineTool({
    name: 'task.overdue',
    description: 'List pending or in-progress tasks whose deadline has passed',
    inputSchema: emptySchema,
    args: none,
    run: m => {
      const tasks = m.listOverdueTasks();
      return { total: tasks.length, tasks };
    },
  }),
  defineTool({
    name: 'history.undo',
    description: 'Revert the most recent add, update or delete',
    inputSchema: emptySchema,
    args: none,
    mutates: true,
    run: m => m.undo(),
  }),
  defineTool({
    name: 'history.recent',
    description: 'Recently viewed items, newest first',
    inputSchema: emptySchema,
    args: none,
    run: m => {
      const items = m.listRecentlyViewed();
      return { total: items.length, items };
    },
  }),
  defineTool({
    name: 'history.back',
    description: 'Leave the current item and return the previously viewed one',
    inputSchema: emptySchema,
    args: none,
    mutates: true,
    run: m => ({ item: m.goBack() }),
  }),
  defineTool({
    name: 'history.undoLog',
    description: 'Undo history, newest first',
    inputSchema: emptySchema,
    args: none,
    run: m => {
      const now = m.now().getTime();
      return m.getUndoHistory().map(entry => ({
        id: entry.id,
        operation: entry.operation,
        itemId: entry.item.id,
        createdAt: entry.createdAt,
        summary: describeMemento(entry, now),
      }));
    },
  }),
  defineTool({
    name: 'library.save',
    description: 'Write the library to disk',
    inputSchema: emptySchema,
    args: none,
    run: m => {
      m.save();
      return { saved: true, dataDir: m.dataDir };
    },
  }),
  defineTool({
    name: 'library.backup',
    description: 'Copy the saved library file into the backup directory',
    inputSchema: emptySchema,
    args: none,
    run: m => ({ backup: m.createBackup() }),
  }),
  defineTool({
    name: 'library.stats',
    description: 'Counts of items, keywords, tags, tasks and backups',
    inputSchema: emptySchema,
    args: none,
    run: m => m.getStatistics(),
  }),
  defineTool({
    name: 'library.rebuild',
    description: 'Rebuild the keyword, tag and path indices from the items',
    inputSchema: emptySchema,
    args: none,
    run: m => {
      m.rebuildIndices();
      return m.getStatistics();
    },
  }),
  defineTool({
    name: 'library.clear',
    description: 'Remove every item, task and history entry',
    inputSchema: {
      type: 'object',
      properties: { confirm: { type: 'boolean', const: true } },
      required: ['confirm'],
      additionalProperties: false,
    },
    args: z.object({ confirm: z.literal(true) }),
    mutates: true,
    run: m => {
      m.clearAll();
      return { cleared: true };
    },
  }),
];

const byName = new Map(TOOLS.map(t => [t.name, t]));

export function listTools(): Array<Pick<ToolDefinition, 'name' | 'description' | 'inputSchema'>> {
  return TOOLS.map(({ name, description, inputSchema }) => ({ name, description, inputSchema }));
}

/** Engine errors caused by the request map to InvalidParams, everything else to InternalError. */
export function toMcpError(error: unknown): McpError {
  if (error instanceof McpError) return error;
  if (error instanceof NotFoundError || error instanceof DuplicateIdError || error instanceof ValidationError) {
    return new McpError(ErrorCode.InvalidParams, error.message, { code: error.code });
  }
  if (error instanceof LibraryError) {
    return new McpError(ErrorCode.InternalError, error.message, { code: error.code });
  }
  return new McpError(ErrorCode.InternalError, `Tool failed: ${errorMessage(error)}`);
}

export function callTool(ctx: ToolContext, name: string, rawArgs: unknown): ToolResult {
  const tool = byName.get(name);
  if (!tool) throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);

  let result: unknown;
  try {
    result = tool.call(ctx, rawArgs);
  } catch (error) {
    const mapped = toMcpError(error);
    logger.warn(`Tool ${name} failed: ${mapped.message}`);
    throw mapped;
  }

  const content: ToolResult['content'] = [{ type: 'text', text: JSON.stringify(result, null, 2) }];
  if (tool.mutates && ctx.autoSave) {
    // The change is already applied in memory; report the failed save beside the result.
    try {
      ctx.manager.save();
    } catch (error) {
      logger.error(`Autosave after ${name} failed: ${errorMessage(error)}`);
      content.push({ type: 'text', text: JSON.stringify({ saved: false, saveError: errorMessage(error) }, null, 2) });
    }
  }
  return { content };
}
