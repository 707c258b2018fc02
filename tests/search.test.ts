import { describe, it, expect } from '@jest/globals';
import { DAY_MS } from '../src/clock.js';
import { buildItem } from '../src/model/items.js';
import { rankSearch, recencyBonus } from '../src/search/RankedSearch.js';
import { InvertedIndexer } from '../src/storage/Indexer.js';
import type { ItemInput, LibraryItem } from '../src/types/Library.js';

const NOW_MS = Date.parse('2026-03-01T12:00:00.000Z');

function daysAgo(days: number): string {
  return new Date(NOW_MS - days * DAY_MS).toISOString();
}

function item(id: string, input: ItemInput): LibraryItem {
  return buildItem(input, id, new Date(NOW_MS).toISOString());
}

describe('recencyBonus', () => {
  it('uses whole days since creation', () => {
    expect(recencyBonus(new Date(NOW_MS).toISOString(), NOW_MS)).toBe(5);
    expect(recencyBonus(new Date(NOW_MS - 7 * DAY_MS + 1).toISOString(), NOW_MS)).toBe(5);
    expect(recencyBonus(daysAgo(7), NOW_MS)).toBe(2);
    expect(recencyBonus(new Date(NOW_MS - 30 * DAY_MS + 1).toISOString(), NOW_MS)).toBe(2);
    expect(recencyBonus(daysAgo(30), NOW_MS)).toBe(0);
  });
});

describe('rankSearch', () => {
  const items = [
    item('A1', { title: 'Java Programming', tags: ['java', 'programming'], rating: 4, createdAt: daysAgo(2) }),
    item('B2', {
      title: 'Python Basics',
      description: 'Learn python programming quickly',
      tags: ['python'],
      rating: 3,
      createdAt: daysAgo(10),
    }),
    item('C3', { title: 'Cooking', tags: ['food'], rating: 5, createdAt: daysAgo(60) }),
  ];
  const index = InvertedIndexer.fromItems(items);

  it('returns nothing for blank or punctuation-only queries', () => {
    expect(rankSearch('', index, items, NOW_MS)).toEqual([]);
    expect(rankSearch('   ', index, items, NOW_MS)).toEqual([]);
    expect(rankSearch('!!! ??', index, items, NOW_MS)).toEqual([]);
    expect(rankSearch('unknownword', index, items, NOW_MS)).toEqual([]);
  });

  it('scores keyword matches, tag popularity, rating and recency', () => {
    const results = rankSearch('programming', index, items, NOW_MS);
    expect(results.map(r => r.item.id)).toEqual(['A1', 'B2']);

    // A1: 10*1 + 2*(java 1 + programming 1) + 5*4 + 5
    expect(results[0]).toMatchObject({ score: 39, keywordMatches: 1, tagFrequency: 2, ratingWeight: 20, recencyBonus: 5 });
    // B2: 10*1 + 2*(python 1) + 5*3 + 2
    expect(results[1]).toMatchObject({ score: 29, keywordMatches: 1, tagFrequency: 1, ratingWeight: 15, recencyBonus: 2 });
  });

  it('counts each distinct query token once per item', () => {
    const results = rankSearch('Java java PROGRAMMING!', index, items, NOW_MS);
    expect(results.map(r => [r.item.id, r.keywordMatches, r.score])).toEqual([
      ['A1', 2, 49],
      ['B2', 1, 29],
    ]);
  });

  it('breaks score ties by newer createdAt and then store order', () => {
    const tied = [
      item('E5', { title: 'Older note', createdAt: daysAgo(50) }),
      item('D4', { title: 'Newer note', createdAt: daysAgo(40) }),
      item('G7', { title: 'Second note', createdAt: daysAgo(45) }),
      item('F6', { title: 'First note', createdAt: daysAgo(45) }),
    ];
    const tiedIndex = InvertedIndexer.fromItems(tied);
    const results = rankSearch('note', tiedIndex, tied, NOW_MS);
    expect(results.map(r => r.score)).toEqual([10, 10, 10, 10]);
    expect(results.map(r => r.item.id)).toEqual(['D4', 'G7', 'F6', 'E5']);
  });
});
