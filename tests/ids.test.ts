import { describe, it, expect } from '@jest/globals';
import { IdGenerator } from '../src/utils/ids.js';

describe('IdGenerator', () => {
  it('mints 26-character Crockford ids', () => {
    const id = new IdGenerator(() => 0).next();
    expect(id).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
    expect(id.slice(0, 10)).toBe('0000000000');
  });

  it('stays strictly increasing when the clock stalls or goes back', () => {
    let now = 1_000_000;
    const ids = new IdGenerator(() => now);
    const minted = [ids.next(), ids.next(), ids.next()];
    now -= 500;
    minted.push(ids.next());
    now += 10_000;
    minted.push(ids.next());

    expect([...minted].sort()).toEqual(minted);
    expect(new Set(minted).size).toBe(minted.length);
  });
});
