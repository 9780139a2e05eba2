import { CollaboratorError } from '../cpu/exceptions.js';

export interface RandomSource {
  chance(p: number): boolean;
  intInclusive(min: number, max: number): number;
}

function checkProbability(p: number): void {
  if (!(p >= 0 && p <= 1)) throw new RangeError(`probability must be within [0, 1], got ${p}`);
}

function checkBounds(min: number, max: number): void {
  if (!Number.isInteger(min) || !Number.isInteger(max) || min > max) {
    throw new RangeError(`invalid integer bounds [${min}, ${max}]`);
  }
}

// Deterministic PRNG (32-bit LCG). One instance per simulation.
export class SeededRandom implements RandomSource {
  private s: number;

  constructor(seed: number) {
    this.s = seed >>> 0;
  }

  private next(): number {
    this.s = (this.s * 1664525 + 1013904223) >>> 0;
    return this.s / 0x100000000;
  }

  chance(p: number): boolean {
    checkProbability(p);
    if (p === 0) return false;
    if (p === 1) return true;
    return this.next() < p;
  }

  intInclusive(min: number, max: number): number {
    checkBounds(min, max);
    return min + Math.floor(this.next() * (max - min + 1));
  }
}

export type RandomScript = {
  chances?: readonly boolean[];
  ints?: readonly number[];
};

// Replays fixed answers. p = 0 and p = 1 are answered without consuming the script.
export class ScriptedRandom implements RandomSource {
  private chances: readonly boolean[];
  private ints: readonly number[];
  private ci = 0;
  private ii = 0;

  constructor(script: RandomScript = {}) {
    this.chances = script.chances ?? [];
    this.ints = script.ints ?? [];
  }

  chance(p: number): boolean {
    checkProbability(p);
    if (p === 0) return false;
    if (p === 1) return true;
    const v = this.chances[this.ci];
    if (v === undefined) throw new CollaboratorError('RandomExhausted', `chance script exhausted after ${this.ci} draws`);
    this.ci++;
    return v;
  }

  intInclusive(min: number, max: number): number {
    checkBounds(min, max);
    const v = this.ints[this.ii];
    if (v === undefined) throw new CollaboratorError('RandomExhausted', `integer script exhausted after ${this.ii} draws`);
    if (v < min || v > max) throw new RangeError(`scripted value ${v} outside [${min}, ${max}]`);
    this.ii++;
    return v;
  }
}
