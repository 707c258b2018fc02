import type { Memento } from '../types/Library.js';

export const MAX_UNDO = 50;

/** Bounded LIFO of mementos; pushing past capacity evicts the oldest entry. */
export class UndoStack {
  private entries: Memento[] = [];
  private readonly max: number;

  constructor(max: number = MAX_UNDO) {
    this.max = Math.max(1, max);
  }

  push(memento: Memento): Memento | undefined {
    this.entries.push(memento);
    if (this.entries.length > this.max) return this.entries.shift();
    return undefined;
  }

  pop(): Memento | undefined {
    return this.entries.pop();
  }

  peek(): Memento | undefined {
    return this.entries[this.entries.length - 1];
  }

  get size(): number {
    return this.entries.length;
  }

  get capacity(): number {
    return this.max;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  /** Most recent first. */
  list(): Memento[] {
    return [...this.entries].reverse();
  }

  /** Oldest first, the order the persistence engine stores. */
  toArray(): Memento[] {
    return [...this.entries];
  }

  /** Replaces the contents; when `entries` exceeds capacity only the newest survive. */
  restore(entries: Memento[]): void {
    this.entries = entries.slice(-this.max);
  }

  clear(): void {
    this.entries = [];
  }
}
