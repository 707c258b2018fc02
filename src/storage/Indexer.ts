import { isDeepStrictEqual } from 'node:util';
import type { IndexSnapshot, LibraryItem } from '../types/Library.js';
import { normalizeTag, words } from '../utils/tokenize.js';

/** Description words shorter than this are not indexed. */
export const MIN_DESCRIPTION_WORD = 4;

interface Filing {
  keywords: Set<string>;
  tags: string[];
  path?: string;
}

/**
 * Keyword, tag-frequency and path indices over the item store.
 *
 * Items never hold references into the index. Instead each indexed id keeps a
 * filing record of the buckets it was put in, so de-indexing touches exactly
 * those buckets and never depends on the caller passing the same version of
 * the item that was indexed.
 */
export class InvertedIndexer {
  private keywords: Map<string, Set<string>> = new Map();
  private tagCounts: Map<string, number> = new Map();
  // A path shared by several items resolves to the smallest id, so the
  // owner depends only on which items are indexed, never on their order.
  private paths: Map<string, Set<string>> = new Map();
  private filings: Map<string, Filing> = new Map();

  static fromItems(items: Iterable<LibraryItem>): InvertedIndexer {
    const idx = new InvertedIndexer();
    idx.rebuild(items);
    return idx;
  }

  /** Keywords an item is filed under: title words, long description words, tags. */
  static keywordsOf(item: LibraryItem): Set<string> {
    const out = new Set<string>(words(item.title));
    for (const tag of item.tags) {
      const t = normalizeTag(tag);
      if (t) out.add(t);
    }
    for (const w of words(item.description, MIN_DESCRIPTION_WORD)) out.add(w);
    return out;
  }

  indexItem(item: LibraryItem): void {
    if (this.filings.has(item.id)) this.deindexItem(item);

    const keywords = InvertedIndexer.keywordsOf(item);
    for (const kw of keywords) {
      let bucket = this.keywords.get(kw);
      if (!bucket) {
        bucket = new Set();
        this.keywords.set(kw, bucket);
      }
      bucket.add(item.id);
    }

    const tags = Array.from(new Set(item.tags.map(normalizeTag).filter(Boolean)));
    for (const tag of tags) this.tagCounts.set(tag, (this.tagCounts.get(tag) ?? 0) + 1);

    if (item.filePath) {
      let owners = this.paths.get(item.filePath);
      if (!owners) {
        owners = new Set();
        this.paths.set(item.filePath, owners);
      }
      owners.add(item.id);
    }

    this.filings.set(item.id, { keywords, tags, path: item.filePath });
  }

  /** Removes every trace of the item's id. Unknown ids are a no-op. */
  deindexItem(item: Pick<LibraryItem, 'id'>): void {
    const filing = this.filings.get(item.id);
    if (!filing) return;

    for (const kw of filing.keywords) {
      const bucket = this.keywords.get(kw);
      if (!bucket) continue;
      bucket.delete(item.id);
      if (bucket.size === 0) this.keywords.delete(kw);
    }

    for (const tag of filing.tags) {
      const count = (this.tagCounts.get(tag) ?? 0) - 1;
      if (count > 0) this.tagCounts.set(tag, count);
      else this.tagCounts.delete(tag);
    }

    if (filing.path !== undefined) {
      const owners = this.paths.get(filing.path);
      owners?.delete(item.id);
      if (owners && owners.size === 0) this.paths.delete(filing.path);
    }

    this.filings.delete(item.id);
  }

  rebuild(items: Iterable<LibraryItem>): void {
    this.clear();
    for (const item of items) this.indexItem(item);
  }

  clear(): void {
    this.keywords.clear();
    this.tagCounts.clear();
    this.paths.clear();
    this.filings.clear();
  }

  /** Ids filed under `keyword` (already normalized). Empty when none. */
  lookup(keyword: string): ReadonlySet<string> {
    return this.keywords.get(keyword) ?? EMPTY;
  }

  tagFrequencyOf(tag: string): number {
    return this.tagCounts.get(normalizeTag(tag)) ?? 0;
  }

  pathOwner(filePath: string): string | undefined {
    const owners = this.paths.get(filePath);
    return owners ? smallest(owners) : undefined;
  }

  hasPath(filePath: string): boolean {
    return this.paths.has(filePath);
  }

  isIndexed(id: string): boolean {
    return this.filings.has(id);
  }

  get keywordCount(): number {
    return this.keywords.size;
  }

  get tagCount(): number {
    return this.tagCounts.size;
  }

  /** Deterministic plain-object form: keys and id lists sorted. */
  snapshot(): IndexSnapshot {
    const keywordIndex: Record<string, string[]> = {};
    for (const kw of [...this.keywords.keys()].sort()) {
      keywordIndex[kw] = [...(this.keywords.get(kw) ?? EMPTY)].sort();
    }
    const tagFrequency: Record<string, number> = {};
    for (const tag of [...this.tagCounts.keys()].sort()) tagFrequency[tag] = this.tagCounts.get(tag) ?? 0;
    const pathIndex: Record<string, string> = {};
    for (const p of [...this.paths.keys()].sort()) {
      const owner = this.pathOwner(p);
      if (owner !== undefined) pathIndex[p] = owner;
    }
    return { keywordIndex, tagFrequency, pathIndex };
  }

  matches(snapshot: IndexSnapshot): boolean {
    return isDeepStrictEqual(this.snapshot(), normalizeSnapshot(snapshot));
  }
}

const EMPTY: ReadonlySet<string> = new Set<string>();

function smallest(ids: Iterable<string>): string | undefined {
  let min: string | undefined;
  for (const id of ids) if (min === undefined || id < min) min = id;
  return min;
}

/** Sorts a snapshot read from elsewhere so it compares equal to `snapshot()`. */
export function normalizeSnapshot(snapshot: IndexSnapshot): IndexSnapshot {
  const keywordIndex: Record<string, string[]> = {};
  for (const kw of Object.keys(snapshot.keywordIndex).sort()) {
    keywordIndex[kw] = [...snapshot.keywordIndex[kw]].sort();
  }
  const tagFrequency: Record<string, number> = {};
  for (const tag of Object.keys(snapshot.tagFrequency).sort()) tagFrequency[tag] = snapshot.tagFrequency[tag];
  const pathIndex: Record<string, string> = {};
  for (const p of Object.keys(snapshot.pathIndex).sort()) pathIndex[p] = snapshot.pathIndex[p];
  return { keywordIndex, tagFrequency, pathIndex };
}
