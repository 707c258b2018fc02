import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';
import { DuplicateIdError, NotFoundError } from '../errors.js';
import { cloneTask, compareTasks, effectivePriority, isDueSoon, isOverdue, nextBonusChange } from '../model/tasks.js';
import type { Task } from '../types/Library.js';

/**
 * Max-priority queue of tasks with O(log n) removal by id.
 *
 * Effective priority moves with the clock (deadline bonuses), so a heap
 * ordered at one instant can go stale. The queue remembers the earliest
 * instant at which any queued task's bonus changes and re-heapifies before
 * answering once the clock has reached it. Between those instants every
 * comparison gives the same answer, so the heap stays valid.
 */
export class TaskScheduler {
  private heap: Task[] = [];
  private positions: Map<string, number> = new Map();
  private orderedAt: number;
  private staleAt = Infinity;

  constructor(private readonly clock: Clock = systemClock) {
    this.orderedAt = clock().getTime();
  }

  add(task: Task): void {
    if (this.positions.has(task.id)) throw new DuplicateIdError('task', task.id);
    this.refresh();
    const copy = cloneTask(task);
    this.heap.push(copy);
    this.positions.set(copy.id, this.heap.length - 1);
    this.siftUp(this.heap.length - 1);
    this.staleAt = Math.min(this.staleAt, nextBonusChange(copy, this.orderedAt));
  }

  /** Removes and returns the task, or null when the id is not queued. */
  remove(id: string): Task | null {
    const pos = this.positions.get(id);
    if (pos === undefined) return null;
    this.refresh();
    return this.removeAt(pos);
  }

  /** Priority or deadline changes need a full requeue, never an in-place edit. */
  update(task: Task): void {
    if (!this.positions.has(task.id)) throw new NotFoundError('task', task.id);
    this.remove(task.id);
    this.add(task);
  }

  peek(): Task | null {
    this.refresh();
    return this.heap.length ? cloneTask(this.heap[0]) : null;
  }

  poll(): Task | null {
    this.refresh();
    if (!this.heap.length) return null;
    return this.removeAt(0);
  }

  get(id: string): Task | null {
    const pos = this.positions.get(id);
    return pos === undefined ? null : cloneTask(this.heap[pos]);
  }

  has(id: string): boolean {
    return this.positions.has(id);
  }

  get size(): number {
    return this.heap.length;
  }

  /** Every queued task in the order `poll` would return them. */
  list(): Task[] {
    const now = this.clock().getTime();
    return this.heap.map(cloneTask).sort((a, b) => compareTasks(a, b, now));
  }

  /** Pending or in-progress tasks whose deadline has passed, in queue order. */
  overdue(): Task[] {
    const now = this.clock().getTime();
    return this.list().filter(t => isOverdue(t, now));
  }

  dueSoon(): Task[] {
    const now = this.clock().getTime();
    return this.list().filter(t => isDueSoon(t, now));
  }

  effectivePriority(task: Task): number {
    return effectivePriority(task, this.clock().getTime());
  }

  /** Replaces the queue contents, e.g. after loading from disk. */
  restore(tasks: Task[]): void {
    this.clear();
    for (const task of tasks) this.add(task);
  }

  clear(): void {
    this.heap = [];
    this.positions.clear();
    this.orderedAt = this.clock().getTime();
    this.staleAt = Infinity;
  }

  private refresh(): void {
    const now = this.clock().getTime();
    if (now < this.staleAt && now >= this.orderedAt) return;
    this.orderedAt = now;
    this.staleAt = Infinity;
    for (const task of this.heap) this.staleAt = Math.min(this.staleAt, nextBonusChange(task, now));
    for (let i = (this.heap.length >> 1) - 1; i >= 0; i--) this.siftDown(i);
  }

  private before(i: number, j: number): boolean {
    return compareTasks(this.heap[i], this.heap[j], this.orderedAt) < 0;
  }

  private swap(i: number, j: number): void {
    const a = this.heap[i];
    const b = this.heap[j];
    this.heap[i] = b;
    this.heap[j] = a;
    this.positions.set(b.id, i);
    this.positions.set(a.id, j);
  }

  private siftUp(i: number): void {
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.before(i, parent)) return;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(i: number): void {
    const n = this.heap.length;
    for (;;) {
      const l = 2 * i + 1;
      const r = l + 1;
      let best = i;
      if (l < n && this.before(l, best)) best = l;
      if (r < n && this.before(r, best)) best = r;
      if (best === i) return;
      this.swap(i, best);
      i = best;
    }
  }

  private removeAt(pos: number): Task {
    const last = this.heap.length - 1;
    if (pos !== last) this.swap(pos, last);
    const removed = this.heap.pop();
    if (!removed) throw new Error('TaskScheduler heap underflow');
    this.positions.delete(removed.id);
    if (pos < this.heap.length) {
      this.siftDown(pos);
      this.siftUp(pos);
    }
    return removed;
  }
}
