import type { Clock } from './clock.js';
import { systemClock } from './clock.js';
import { readConfig } from './config.js';
import { DuplicateIdError, NotFoundError, ValidationError } from './errors.js';
import { createMemento, freezeMemento, restoreItem } from './history/Memento.js';
import { RecentlyViewed } from './history/RecentlyViewed.js';
import { UndoStack } from './history/UndoStack.js';
import { buildItem, cloneItem, hasMedia, hasTag, isDocument, mergeItem, validateItem } from './model/items.js';
import { buildTask, cloneTask, validateTask } from './model/tasks.js';
import { rankSearch } from './search/RankedSearch.js';
import { InvertedIndexer } from './storage/Indexer.js';
import { LibraryRepository } from './storage/LibraryRepository.js';
import type { LoadSource } from './storage/LibraryRepository.js';
import { getDataDir } from './storage/paths.js';
import { TaskScheduler } from './tasks/TaskScheduler.js';
import type {
  ImportSummary,
  ItemInput,
  LibraryConfig,
  LibraryItem,
  LibraryState,
  LibraryStatistics,
  Memento,
  MementoOperation,
  SearchResult,
  Task,
  TaskInput,
  UndoResult,
} from './types/Library.js';
import { IdGenerator } from './utils/ids.js';
import { logger } from './utils/logger.js';

export interface LibraryManagerOptions {
  /** Defaults to SMART_LIBRARY_DIR, then ~/.smart-library. */
  dataDir?: string;
  /** Overrides on top of `<dataDir>/config.json`. */
  config?: Partial<LibraryConfig>;
  clock?: Clock;
}

export type ItemUpdate = Partial<LibraryItem> & { id: string };
export type TaskUpdate = Partial<Task> & { id: string };

/**
 * The library engine. Owns the item store and everything derived from it:
 * indices, undo history, recently viewed ids and the task queue.
 *
 * Every public method is synchronous, so each runs to completion on the event
 * loop. Items and tasks are copied on the way in and on the way out.
 */
export class LibraryManager {
  readonly dataDir: string;
  readonly config: LibraryConfig;
  private readonly clock: Clock;
  private readonly ids: IdGenerator;
  private readonly repository: LibraryRepository;

  private items: LibraryItem[] = [];
  private itemMap: Map<string, LibraryItem> = new Map();
  private retired: Set<string> = new Set();
  private readonly index = new InvertedIndexer();
  private readonly tasks: TaskScheduler;
  private readonly recent: RecentlyViewed;
  private readonly undoStack: UndoStack;

  constructor(opts: LibraryManagerOptions = {}) {
    this.dataDir = getDataDir(opts.dataDir);
    this.config = { ...readConfig(this.dataDir), ...opts.config };
    this.clock = opts.clock ?? systemClock;
    this.ids = new IdGenerator(() => this.clock().getTime());
    this.repository = new LibraryRepository({
      dataDir: this.dataDir,
      maxBackups: this.config.maxBackups,
      clock: this.clock,
    });
    this.tasks = new TaskScheduler(this.clock);
    this.recent = new RecentlyViewed(this.config.maxRecent);
    this.undoStack = new UndoStack(this.config.maxUndo);
  }

  /** Builds a manager, applies its logging config and loads the library from disk. */
  static open(opts: LibraryManagerOptions = {}): LibraryManager {
    const manager = new LibraryManager(opts);
    logger.configure({ level: manager.config.logLevel, format: manager.config.logFormat });
    manager.load();
    return manager;
  }

  // Items

  addItem(input: ItemInput): LibraryItem {
    const id = input.id ?? this.ids.next();
    if (this.itemMap.has(id) || this.retired.has(id)) throw new DuplicateIdError('item', id);
    const item = buildItem(input, id, this.nowIso());
    validateItem(item);

    this.record('CREATE', item);
    this.items.push(item);
    this.itemMap.set(id, item);
    this.index.indexItem(item);
    logger.debug(`Added item ${id}: ${item.title}`);
    return cloneItem(item);
  }

  updateItem(update: ItemUpdate): LibraryItem {
    const stored = this.itemMap.get(update.id);
    if (!stored) throw new NotFoundError('item', update.id);
    const next = mergeItem(stored, update, this.nowIso());
    validateItem(next);

    this.record('UPDATE', stored);
    this.replace(stored, next);
    logger.debug(`Updated item ${next.id}`);
    return cloneItem(next);
  }

  deleteItem(id: string): LibraryItem {
    const stored = this.itemMap.get(id);
    if (!stored) throw new NotFoundError('item', id);

    this.record('DELETE', stored);
    this.detach(stored);
    logger.debug(`Deleted item ${id}`);
    return cloneItem(stored);
  }

  /** Returns a copy and records the view, or null when the id is unknown. */
  getItem(id: string): LibraryItem | null {
    const item = this.itemMap.get(id);
    if (!item) return null;
    this.recent.touch(id);
    return cloneItem(item);
  }

  listItems(): LibraryItem[] {
    return this.items.map(cloneItem);
  }

  listItemsByCategory(category: string): LibraryItem[] {
    const wanted = category.toLowerCase();
    return this.items.filter(i => i.category.toLowerCase() === wanted).map(cloneItem);
  }

  getItemsByTag(tag: string): LibraryItem[] {
    return this.items.filter(i => hasTag(i, tag)).map(cloneItem);
  }

  getItemByPath(filePath: string): LibraryItem | null {
    const owner = this.index.pathOwner(filePath);
    const item = owner === undefined ? undefined : this.itemMap.get(owner);
    return item ? cloneItem(item) : null;
  }

  isDuplicatePath(filePath: string): boolean {
    return this.index.hasPath(filePath);
  }

  /**
   * Adds every candidate whose file path is not yet known. Each add commits
   * on its own; a candidate that fails validation is reported and skipped.
   */
  importItems(candidates: ItemInput[]): ImportSummary {
    const summary: ImportSummary = { imported: [], skippedPaths: [], errors: [] };
    for (const candidate of candidates) {
      if (candidate.filePath && this.isDuplicatePath(candidate.filePath)) {
        summary.skippedPaths.push(candidate.filePath);
        continue;
      }
      try {
        summary.imported.push(this.addItem(candidate));
      } catch (error) {
        if (!(error instanceof ValidationError || error instanceof DuplicateIdError)) throw error;
        summary.errors.push(`${candidate.filePath ?? candidate.title}: ${error.message}`);
      }
    }
    logger.info(
      `Imported ${summary.imported.length} items, skipped ${summary.skippedPaths.length} duplicates, ` +
        `${summary.errors.length} rejected`
    );
    return summary;
  }

  search(query: string): SearchResult[] {
    return rankSearch(query, this.index, this.items, this.clock().getTime()).map(r => ({
      ...r,
      item: cloneItem(r.item),
    }));
  }

  rebuildIndices(): void {
    this.index.rebuild(this.items);
    logger.info(`Rebuilt indices: ${this.index.keywordCount} keywords, ${this.index.tagCount} tags`);
  }

  // Tasks

  addTask(input: TaskInput): Task {
    const id = input.id ?? this.ids.next();
    if (this.tasks.has(id)) throw new DuplicateIdError('task', id);
    const task = buildTask(input, id, this.nowIso());
    if (task.itemId !== undefined) {
      const item = this.itemMap.get(task.itemId);
      if (!item) throw new NotFoundError('item', task.itemId);
      task.itemTitle ??= item.title;
    }
    validateTask(task);
    this.tasks.add(task);
    return cloneTask(task);
  }

  updateTask(update: TaskUpdate): Task {
    const stored = this.tasks.get(update.id);
    if (!stored) throw new NotFoundError('task', update.id);
    const next: Task = { ...stored, ...update, id: stored.id, createdAt: stored.createdAt };
    validateTask(next);
    this.tasks.update(next);
    return cloneTask(next);
  }

  /** Removes the task, returning it, or null when the id is not queued. */
  removeTask(id: string): Task | null {
    return this.tasks.remove(id);
  }

  getTask(id: string): Task | null {
    return this.tasks.get(id);
  }

  peekNextTask(): Task | null {
    return this.tasks.peek();
  }

  pollNextTask(): Task | null {
    return this.tasks.poll();
  }

  listTasks(): Task[] {
    return this.tasks.list();
  }

  listOverdueTasks(): Task[] {
    return this.tasks.overdue();
  }

  listDueSoonTasks(): Task[] {
    return this.tasks.dueSoon();
  }

  effectivePriority(task: Task): number {
    return this.tasks.effectivePriority(task);
  }

  // History

  canUndo(): boolean {
    return !this.undoStack.isEmpty();
  }

  /**
   * Reverts the most recent mutation without recording a new entry. When the
   * inverse cannot apply the entry is discarded and `undone` is false.
   */
  undo(): UndoResult {
    const memento = this.undoStack.pop();
    if (!memento) return { undone: false, message: 'Nothing to undo' };

    const snapshot = restoreItem(memento);
    const current = this.itemMap.get(snapshot.id);
    const base = { operation: memento.operation, itemId: snapshot.id };

    switch (memento.operation) {
      case 'CREATE':
        if (!current) return { ...base, undone: false, message: `Cannot undo create: item ${snapshot.id} is gone` };
        this.detach(current);
        break;
      case 'UPDATE':
        if (!current) return { ...base, undone: false, message: `Cannot undo update: item ${snapshot.id} is gone` };
        this.replace(current, snapshot);
        break;
      case 'DELETE':
        if (current) return { ...base, undone: false, message: `Cannot undo delete: id ${snapshot.id} is in use` };
        this.items.push(snapshot);
        this.itemMap.set(snapshot.id, snapshot);
        this.retired.delete(snapshot.id);
        this.index.indexItem(snapshot);
        break;
    }

    logger.debug(`Undid ${memento.operation} of ${snapshot.id}`);
    return { ...base, undone: true, message: `Undone: ${memento.description}` };
  }

  /** Most recent first. */
  getUndoHistory(): Memento[] {
    return this.undoStack.list();
  }

  clearUndoHistory(): void {
    this.undoStack.clear();
  }

  /** Most recently viewed first; ids whose item is gone are skipped. */
  listRecentlyViewed(): LibraryItem[] {
    const out: LibraryItem[] = [];
    for (const id of this.recent.list()) {
      const item = this.itemMap.get(id);
      if (item) out.push(cloneItem(item));
    }
    return out;
  }

  /** Leaves the current item and returns the previously viewed one. */
  goBack(): LibraryItem | null {
    const id = this.recent.back();
    const item = id === null ? undefined : this.itemMap.get(id);
    return item ? cloneItem(item) : null;
  }

  // Persistence

  save(): void {
    this.repository.save(this.toState());
  }

  /** Replaces every in-memory structure with what is on disk. */
  load(): LoadSource {
    const { state, source, recoveredFrom } = this.repository.load();
    this.applyState(state);
    if (recoveredFrom) logger.warn(`Library restored from backup ${recoveredFrom}`);
    logger.info(`Loaded ${this.items.length} items and ${this.tasks.size} tasks (${source})`);
    return source;
  }

  createBackup(): string {
    return this.repository.createBackup();
  }

  /**
   * Empties the in-memory library. Cleared ids stay retired. Files on disk
   * change only on the next save.
   */
  clearAll(): void {
    for (const item of this.items) this.retired.add(item.id);
    this.items = [];
    this.itemMap.clear();
    this.index.clear();
    this.tasks.clear();
    this.recent.clear();
    this.undoStack.clear();
    logger.info('All library data cleared');
  }

  getRepository(): LibraryRepository {
    return this.repository;
  }

  getStatistics(): LibraryStatistics {
    const categoryCounts: Record<string, number> = {};
    for (const item of this.items) categoryCounts[item.category] = (categoryCounts[item.category] ?? 0) + 1;
    return {
      totalItems: this.items.length,
      mediaItems: this.items.filter(hasMedia).length,
      documentItems: this.items.filter(isDocument).length,
      totalKeywords: this.index.keywordCount,
      uniqueTags: this.index.tagCount,
      totalTasks: this.tasks.size,
      overdueTasks: this.tasks.overdue().length,
      recentlyViewedCount: this.recent.size,
      undoHistorySize: this.undoStack.size,
      backupsAvailable: this.repository.backupCount(),
      categoryCounts,
    };
  }

  toState(): LibraryState {
    return {
      savedAt: this.nowIso(),
      items: this.items.map(cloneItem),
      ...this.index.snapshot(),
      tasks: this.tasks.list(),
      recentlyViewed: this.recent.toArray(),
      undoHistory: this.undoStack.toArray(),
      retiredIds: [...this.retired],
    };
  }

  private applyState(state: LibraryState): void {
    this.clearAll();

    for (const item of state.items) {
      if (this.itemMap.has(item.id)) {
        logger.warn(`Dropping duplicate stored item ${item.id}`);
        continue;
      }
      const copy = cloneItem(item);
      this.items.push(copy);
      this.itemMap.set(copy.id, copy);
    }

    this.index.rebuild(this.items);
    if (!this.index.matches(state)) {
      logger.warn('Stored indices did not match the items and were rebuilt');
    }

    const taskIds = new Set<string>();
    const tasks: Task[] = [];
    for (const task of state.tasks) {
      if (taskIds.has(task.id)) {
        logger.warn(`Dropping duplicate stored task ${task.id}`);
        continue;
      }
      taskIds.add(task.id);
      tasks.push(task);
    }
    this.tasks.restore(tasks);

    this.recent.restore(state.recentlyViewed.filter(id => this.itemMap.has(id)));
    this.undoStack.restore(state.undoHistory.map(freezeMemento));

    // Files written before retired ids were stored still name them in history and tasks.
    this.retired = new Set(state.retiredIds);
    const referenced = [...state.undoHistory.map(m => m.item.id), ...tasks.flatMap(t => (t.itemId ? [t.itemId] : []))];
    for (const id of referenced) {
      if (!this.itemMap.has(id)) this.retired.add(id);
    }
  }

  private record(operation: MementoOperation, item: LibraryItem): void {
    this.undoStack.push(createMemento(this.ids.next(), item, operation, this.nowIso()));
  }

  /** Swaps `next` in at `current`'s position in the store and indices. */
  private replace(current: LibraryItem, next: LibraryItem): void {
    this.index.deindexItem(current);
    const pos = this.items.indexOf(current);
    if (pos >= 0) this.items[pos] = next;
    else this.items.push(next);
    this.itemMap.set(next.id, next);
    this.index.indexItem(next);
  }

  private detach(item: LibraryItem): void {
    const pos = this.items.indexOf(item);
    if (pos >= 0) this.items.splice(pos, 1);
    this.itemMap.delete(item.id);
    this.retired.add(item.id);
    this.index.deindexItem(item);
    this.recent.remove(item.id);
  }

  /** The engine's clock reading; every timestamp it writes comes from here. */
  now(): Date {
    return this.clock();
  }

  private nowIso(): string {
    return this.clock().toISOString();
  }
}
