import { cloneItem } from '../model/items.js';
import { toMillis } from '../clock.js';
import type { LibraryItem, Memento, MementoOperation } from '../types/Library.js';

const VERB: Record<MementoOperation, string> = {
  CREATE: 'Created',
  UPDATE: 'Updated',
  DELETE: 'Deleted',
};

/**
 * Captures `item` as it is right now. The snapshot owns its own copy and is
 * frozen, so later edits to the live item cannot reach it.
 */
export function createMemento(id: string, item: LibraryItem, operation: MementoOperation, nowIso: string): Memento {
  return freezeMemento({
    id,
    operation,
    item: cloneItem(item),
    description: `${VERB[operation]}: ${item.title}`,
    createdAt: nowIso,
  });
}

/** Deep-freezes a memento built from fresh storage (new snapshot or decoded file). */
export function freezeMemento(memento: Memento): Memento {
  const snapshot = cloneItem(memento.item);
  Object.freeze(snapshot.tags);
  return Object.freeze({ ...memento, item: Object.freeze(snapshot) });
}

/** A mutable copy of the snapshotted item, safe to put back into the store. */
export function restoreItem(memento: Memento): LibraryItem {
  return cloneItem(memento.item);
}

export function timeAgo(fromIso: string, nowMs: number): string {
  const minutes = Math.floor((nowMs - toMillis(fromIso)) / 60_000);
  if (minutes < 1) return 'just now';
  if (minutes < 60) return `${minutes} min ago`;
  if (minutes < 1440) {
    const hours = Math.floor(minutes / 60);
    return `${hours} hour${hours > 1 ? 's' : ''} ago`;
  }
  const days = Math.floor(minutes / 1440);
  return `${days} day${days > 1 ? 's' : ''} ago`;
}

/** "DELETE: Deleted: Java Guide (3 min ago)" */
export function describeMemento(memento: Memento, nowMs: number): string {
  return `${memento.operation}: ${memento.description} (${timeAgo(memento.createdAt, nowMs)})`;
}
