// server/rng.ts — Random sources: cryptographic default, seeded for replay/tests

import { randomInt } from 'node:crypto';

export interface Rng {
  /** Uniform float in [0, 1). */
  next(): number;
  /** Uniform integer in [min, max] inclusive. */
  nextInt(min: number, max: number): number;
}

export class CryptoRng implements Rng {
  next(): number {
    return randomInt(0, 2 ** 32) / 2 ** 32;
  }

  nextInt(min: number, max: number): number {
    return randomInt(min, max + 1);
  }
}

/** mulberry32 */
export class SeededRng implements Rng {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  nextInt(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }

  nextFloat(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  chance(p: number): boolean {
    return this.next() < p;
  }
}

export function createRng(seed: number | null): Rng {
  return seed === null ? new CryptoRng() : new SeededRng(seed);
}
