export const MAX_RECENT = 20;

/**
 * Capped stack of item ids. Map insertion order doubles as stack order:
 * the last key is the top, re-touching an id moves it there.
 */
export class RecentlyViewed {
  private readonly max: number;
  private ids: Map<string, true> = new Map();

  constructor(max: number = MAX_RECENT) {
    this.max = Math.max(1, max);
  }

  touch(id: string): void {
    if (this.ids.has(id)) this.ids.delete(id);
    this.ids.set(id, true);
    if (this.ids.size > this.max) {
      const oldest = this.ids.keys().next();
      if (!oldest.done) this.ids.delete(oldest.value);
    }
  }

  has(id: string): boolean {
    return this.ids.has(id);
  }

  remove(id: string): boolean {
    return this.ids.delete(id);
  }

  peek(): string | undefined {
    let top: string | undefined;
    for (const id of this.ids.keys()) top = id;
    return top;
  }

  /**
   * Drops the current (top) entry and returns the one beneath it, which stays
   * on the stack. Needs at least two entries.
   */
  back(): string | null {
    if (this.ids.size < 2) return null;
    const current = this.peek();
    if (current !== undefined) this.ids.delete(current);
    return this.peek() ?? null;
  }

  get size(): number {
    return this.ids.size;
  }

  /** Most recent first. */
  list(): string[] {
    return Array.from(this.ids.keys()).reverse();
  }

  /** Oldest first (bottom of the stack first). */
  toArray(): string[] {
    return Array.from(this.ids.keys());
  }

  restore(idsOldestFirst: string[]): void {
    this.ids.clear();
    for (const id of idsOldestFirst) this.touch(id);
  }

  clear(): void {
    this.ids.clear();
  }
}
