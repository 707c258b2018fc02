import { describe, it, expect } from '@jest/globals';
import { createMemento, describeMemento, freezeMemento, restoreItem, timeAgo } from '../src/history/Memento.js';
import { RecentlyViewed, MAX_RECENT } from '../src/history/RecentlyViewed.js';
import { UndoStack, MAX_UNDO } from '../src/history/UndoStack.js';
import { buildItem } from '../src/model/items.js';
import type { Memento } from '../src/types/Library.js';

const NOW = '2026-03-01T12:00:00.000Z';
const NOW_MS = Date.parse(NOW);

function memento(n: number): Memento {
  const item = buildItem({ title: `Item ${n}` }, `I${n}`, NOW);
  return createMemento(`M${n}`, item, 'CREATE', NOW);
}

describe('Memento', () => {
  it('snapshots the item so later edits do not leak in', () => {
    const item = buildItem({ title: 'Java Guide', tags: ['java'] }, 'A1', NOW);
    const m = createMemento('M1', item, 'DELETE', NOW);
    item.title = 'Changed';
    item.tags.push('mutated');

    expect(m.description).toBe('Deleted: Java Guide');
    expect(m.item.title).toBe('Java Guide');
    expect(m.item.tags).toEqual(['java']);
    expect(Object.isFrozen(m)).toBe(true);
    expect(Object.isFrozen(m.item)).toBe(true);
    expect(Object.isFrozen(m.item.tags)).toBe(true);
  });

  it('restores a mutable copy', () => {
    const m = memento(1);
    const restored = restoreItem(m);
    restored.tags.push('x');
    expect(m.item.tags).toEqual([]);
    expect(Object.isFrozen(restored)).toBe(false);
  });

  it('re-freezes decoded entries', () => {
    const decoded: Memento = JSON.parse(JSON.stringify(memento(2)));
    const frozen = freezeMemento(decoded);
    expect(Object.isFrozen(frozen.item)).toBe(true);
    expect(frozen.item).toEqual(decoded.item);
  });

  it('describes entries relative to now', () => {
    expect(timeAgo(NOW, NOW_MS + 30_000)).toBe('just now');
    expect(timeAgo(NOW, NOW_MS + 3 * 60_000)).toBe('3 min ago');
    expect(timeAgo(NOW, NOW_MS + 60 * 60_000)).toBe('1 hour ago');
    expect(timeAgo(NOW, NOW_MS + 5 * 60 * 60_000)).toBe('5 hours ago');
    expect(timeAgo(NOW, NOW_MS + 2 * 24 * 60 * 60_000)).toBe('2 days ago');
    expect(describeMemento(memento(3), NOW_MS + 3 * 60_000)).toBe('CREATE: Created: Item 3 (3 min ago)');
  });
});

describe('UndoStack', () => {
  it('is LIFO', () => {
    const stack = new UndoStack();
    stack.push(memento(1));
    stack.push(memento(2));
    expect(stack.peek()?.id).toBe('M2');
    expect(stack.pop()?.id).toBe('M2');
    expect(stack.pop()?.id).toBe('M1');
    expect(stack.pop()).toBeUndefined();
    expect(stack.isEmpty()).toBe(true);
  });

  it(`evicts the oldest entry past ${MAX_UNDO}`, () => {
    const stack = new UndoStack();
    const evicted: string[] = [];
    for (let i = 1; i <= MAX_UNDO + 2; i++) {
      const out = stack.push(memento(i));
      if (out) evicted.push(out.id);
    }
    expect(stack.size).toBe(MAX_UNDO);
    expect(evicted).toEqual(['M1', 'M2']);
    expect(stack.list()[0].id).toBe(`M${MAX_UNDO + 2}`);
    expect(stack.toArray()[0].id).toBe('M3');
  });

  it('keeps only the newest entries when restoring too many', () => {
    const stack = new UndoStack(3);
    stack.restore([1, 2, 3, 4, 5].map(memento));
    expect(stack.toArray().map(m => m.id)).toEqual(['M3', 'M4', 'M5']);
    stack.clear();
    expect(stack.size).toBe(0);
  });
});

describe('RecentlyViewed', () => {
  it('moves a re-viewed id to the top without duplicating it', () => {
    const recent = new RecentlyViewed();
    recent.touch('a');
    recent.touch('b');
    recent.touch('a');
    expect(recent.list()).toEqual(['a', 'b']);
    expect(recent.toArray()).toEqual(['b', 'a']);
  });

  it(`never holds more than ${MAX_RECENT} ids`, () => {
    const recent = new RecentlyViewed();
    for (let i = 0; i < MAX_RECENT + 5; i++) recent.touch(`id${i}`);
    expect(recent.size).toBe(MAX_RECENT);
    expect(recent.has('id4')).toBe(false);
    expect(recent.has('id5')).toBe(true);
    expect(recent.peek()).toBe(`id${MAX_RECENT + 4}`);
  });

  it('goes back by dropping the current entry', () => {
    const recent = new RecentlyViewed();
    recent.touch('a');
    expect(recent.back()).toBeNull();
    recent.touch('b');
    recent.touch('c');
    expect(recent.back()).toBe('b');
    expect(recent.list()).toEqual(['b', 'a']);
  });

  it('removes ids and restores from oldest-first arrays', () => {
    const recent = new RecentlyViewed(2);
    recent.restore(['x', 'y', 'z']);
    expect(recent.list()).toEqual(['z', 'y']);
    expect(recent.remove('z')).toBe(true);
    expect(recent.remove('z')).toBe(false);
    expect(recent.list()).toEqual(['y']);
  });
});
