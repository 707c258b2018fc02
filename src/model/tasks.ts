import { z } from 'zod';
import { DAY_MS, toMillis } from '../clock.js';
import { ValidationError } from '../errors.js';
import { isoDate } from './items.js';
import { PRIORITY_WEIGHT } from '../types/Library.js';
import type { Task, TaskInput } from '../types/Library.js';

export const OVERDUE_BONUS = 20;
export const DAY_BONUS = 10;
export const WEEK_BONUS = 5;

export const taskSchema = z.object({
  id: z.string().min(1, 'must not be empty'),
  itemId: z.string().optional(),
  itemTitle: z.string().optional(),
  description: z.string(),
  priority: z.enum(['LOW', 'MEDIUM', 'HIGH', 'URGENT']),
  deadline: isoDate.optional(),
  status: z.enum(['PENDING', 'IN_PROGRESS', 'COMPLETED', 'CANCELLED']),
  createdAt: isoDate,
  notes: z.string().optional(),
  estimatedMinutes: z.number().int().nonnegative().optional(),
});

export function validateTask(task: Task): void {
  const result = taskSchema.safeParse(task);
  if (result.success) return;
  const issue = result.error.issues[0];
  throw new ValidationError(issue.path.join('.') || 'task', issue.message);
}

export function buildTask(input: TaskInput, id: string, nowIso: string): Task {
  const task: Task = {
    ...input,
    id,
    description: input.description,
    priority: input.priority ?? 'MEDIUM',
    status: input.status ?? 'PENDING',
    createdAt: input.createdAt ?? nowIso,
  };
  for (const key of ['itemId', 'itemTitle', 'deadline', 'notes', 'estimatedMinutes'] as const) {
    if (task[key] === undefined) delete task[key];
  }
  return task;
}

export function cloneTask(task: Task): Task {
  return { ...task };
}

/**
 * Deadline proximity bonus at `nowMs`: passed -> 20, within 24h -> 10,
 * within 7 days -> 5, otherwise (or no deadline) 0.
 */
export function urgencyBonus(task: Pick<Task, 'deadline'>, nowMs: number): number {
  if (!task.deadline) return 0;
  const remaining = toMillis(task.deadline) - nowMs;
  if (remaining < 0) return OVERDUE_BONUS;
  if (remaining <= DAY_MS) return DAY_BONUS;
  if (remaining <= 7 * DAY_MS) return WEEK_BONUS;
  return 0;
}

export function effectivePriority(task: Pick<Task, 'priority' | 'deadline'>, nowMs: number): number {
  return PRIORITY_WEIGHT[task.priority] + urgencyBonus(task, nowMs);
}

/**
 * The next instant after `nowMs` at which the task's urgency bonus changes,
 * or Infinity when it never will again.
 */
export function nextBonusChange(task: Pick<Task, 'deadline'>, nowMs: number): number {
  if (!task.deadline) return Infinity;
  const deadline = toMillis(task.deadline);
  const boundaries = [deadline - 7 * DAY_MS, deadline - DAY_MS, deadline + 1];
  for (const b of boundaries) if (b > nowMs) return b;
  return Infinity;
}

export function isOverdue(task: Task, nowMs: number): boolean {
  return (
    task.deadline !== undefined &&
    toMillis(task.deadline) < nowMs &&
    (task.status === 'PENDING' || task.status === 'IN_PROGRESS')
  );
}

export function isDueSoon(task: Task, nowMs: number): boolean {
  if (!task.deadline) return false;
  const remaining = toMillis(task.deadline) - nowMs;
  return remaining > 0 && remaining <= DAY_MS;
}

/**
 * Queue order: negative when `a` should be served before `b`.
 * Higher effective priority first, then earlier deadline, then tasks with a
 * deadline, then older tasks, then id.
 */
export function compareTasks(a: Task, b: Task, nowMs: number): number {
  const byPriority = effectivePriority(b, nowMs) - effectivePriority(a, nowMs);
  if (byPriority !== 0) return byPriority;
  if (a.deadline && b.deadline) {
    const byDeadline = toMillis(a.deadline) - toMillis(b.deadline);
    if (byDeadline !== 0) return byDeadline;
  } else if (a.deadline) {
    return -1;
  } else if (b.deadline) {
    return 1;
  }
  const byCreated = toMillis(a.createdAt) - toMillis(b.createdAt);
  if (byCreated !== 0) return byCreated;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
