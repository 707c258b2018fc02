import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import type { Clock } from '../src/clock.js';

/** A clock tests can move by hand. */
export class ManualClock {
  private ms: number;

  constructor(start: string | number = '2026-03-01T12:00:00.000Z') {
    this.ms = typeof start === 'number' ? start : Date.parse(start);
  }

  readonly now: Clock = () => new Date(this.ms);

  advance(ms: number): void {
    this.ms += ms;
  }

  set(iso: string): void {
    this.ms = Date.parse(iso);
  }

  millis(): number {
    return this.ms;
  }
}

export async function makeTempDir(prefix = 'smart-library-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.remove(dir);
}
