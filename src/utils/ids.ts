// ULID-style ids: 10 chars of time + 16 chars of randomness, Crockford base32.
// Ids minted within the same millisecond stay strictly increasing.

import crypto from 'node:crypto';

const ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
const TIME_LEN = 10;
const RANDOM_LEN = 16;

function encodeTime(ms: number): string {
  let out = '';
  let t = Math.max(0, Math.floor(ms));
  for (let i = 0; i < TIME_LEN; i++) {
    const mod = t % 32;
    out = ALPHABET[mod] + out;
    t = (t - mod) / 32;
  }
  return out;
}

function randomChars(len: number): string {
  const bytes = crypto.randomBytes(len);
  let out = '';
  for (const b of bytes) out += ALPHABET[b % 32];
  return out;
}

function increment(chars: string): string | null {
  const arr = chars.split('');
  for (let i = arr.length - 1; i >= 0; i--) {
    const idx = ALPHABET.indexOf(arr[i]);
    if (idx < ALPHABET.length - 1) {
      arr[i] = ALPHABET[idx + 1];
      for (let j = i + 1; j < arr.length; j++) arr[j] = ALPHABET[0];
      return arr.join('');
    }
  }
  return null;
}

export class IdGenerator {
  private lastTime = -1;
  private lastRandom = '';

  constructor(private readonly now: () => number = Date.now) {}

  next(): string {
    const time = this.now();
    if (time <= this.lastTime) {
      // Clock stalled or went backwards: keep the previous time, bump randomness.
      const bumped = increment(this.lastRandom);
      if (bumped) {
        this.lastRandom = bumped;
        return encodeTime(this.lastTime) + bumped;
      }
      this.lastTime += 1;
    } else {
      this.lastTime = time;
    }
    this.lastRandom = randomChars(RANDOM_LEN);
    return encodeTime(this.lastTime) + this.lastRandom;
  }
}
