import { DAY_MS, toMillis } from '../clock.js';
import type { InvertedIndexer } from '../storage/Indexer.js';
import type { LibraryItem, SearchResult } from '../types/Library.js';
import { queryTokens } from '../utils/tokenize.js';

export const WEIGHTS = {
  keyword: 10,
  tagFrequency: 2,
  rating: 5,
  recentWeek: 5,
  recentMonth: 2,
} as const;

export function recencyBonus(createdAt: string, nowMs: number): number {
  const daysOld = Math.floor((nowMs - toMillis(createdAt)) / DAY_MS);
  if (daysOld < 7) return WEIGHTS.recentWeek;
  if (daysOld < 30) return WEIGHTS.recentMonth;
  return 0;
}

export function tagFrequencySum(item: LibraryItem, index: InvertedIndexer): number {
  let total = 0;
  for (const tag of item.tags) total += index.tagFrequencyOf(tag);
  return total;
}

export function scoreItem(item: LibraryItem, keywordMatches: number, index: InvertedIndexer, nowMs: number): SearchResult {
  const tagFrequency = tagFrequencySum(item, index);
  const ratingWeight = WEIGHTS.rating * item.rating;
  const recency = recencyBonus(item.createdAt, nowMs);
  return {
    item,
    score: WEIGHTS.keyword * keywordMatches + WEIGHTS.tagFrequency * tagFrequency + ratingWeight + recency,
    keywordMatches,
    tagFrequency,
    ratingWeight,
    recencyBonus: recency,
  };
}

/**
 * Resolves `query` against the keyword index and returns matching items by
 * relevance. Each distinct query token counts at most once per item.
 * `items` supplies the store order used as the last tie-break.
 */
export function rankSearch(
  query: string,
  index: InvertedIndexer,
  items: readonly LibraryItem[],
  nowMs: number
): SearchResult[] {
  const tokens = queryTokens(query);
  if (!tokens.length) return [];

  const matchCounts = new Map<string, number>();
  for (const token of tokens) {
    for (const id of index.lookup(token)) matchCounts.set(id, (matchCounts.get(id) ?? 0) + 1);
  }
  if (!matchCounts.size) return [];

  const results: SearchResult[] = [];
  for (const item of items) {
    const matches = matchCounts.get(item.id);
    if (matches) results.push(scoreItem(item, matches, index, nowMs));
  }

  // Array.prototype.sort is stable, so equal results keep store order.
  results.sort((a, b) => b.score - a.score || toMillis(b.item.createdAt) - toMillis(a.item.createdAt));
  return results;
}
