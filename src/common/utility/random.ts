/**
 * Source of uniform floats in [0, 1). Generators take one of these instead of
 * calling Math.random so tests can pin the sequence.
 */
export interface RandomSource {
  next(): number;
}

export const RANDOM_SOURCE = 'RANDOM_SOURCE';

export class MathRandomSource implements RandomSource {
  next(): number {
    return Math.random();
  }
}

/** mulberry32: small, fast and good enough for fixture data. */
export class SeededRandomSource implements RandomSource {
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
}

/** Integer in [min, max], both ends inclusive. */
export function randomInt(rng: RandomSource, min: number, max: number): number {
  return min + Math.floor(rng.next() * (max - min + 1));
}

/** Float in [min, max]. */
export function randomFloat(rng: RandomSource, min: number, max: number): number {
  return min + rng.next() * (max - min);
}

export function pickOne<T>(rng: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new RangeError('Cannot pick from an empty pool');
  }
  return items[Math.floor(rng.next() * items.length)];
}
