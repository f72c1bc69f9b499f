import { RandomSource, SeededRandomSource, pickOne, randomFloat, randomInt } from './random';

class FixedRandomSource implements RandomSource {
  constructor(private readonly value: number) {}

  next(): number {
    return this.value;
  }
}

describe('random helpers', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = new SeededRandomSource(7);
    const b = new SeededRandomSource(7);
    const first = Array.from({ length: 5 }, () => a.next());

    expect(Array.from({ length: 5 }, () => b.next())).toEqual(first);
    first.forEach((value) => {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    });
  });

  it('includes both ends of an integer range', () => {
    expect(randomInt(new FixedRandomSource(0), 50, 1000)).toBe(50);
    expect(randomInt(new FixedRandomSource(0.999999), 50, 1000)).toBe(1000);
  });

  it('scales floats into the range', () => {
    expect(randomFloat(new FixedRandomSource(0.5), 2, 8)).toBe(5);
  });

  it('picks from a pool and refuses an empty one', () => {
    expect(pickOne(new FixedRandomSource(0.5), ['a', 'b', 'c', 'd'])).toBe('c');
    expect(() => pickOne(new FixedRandomSource(0.5), [])).toThrow(RangeError);
  });
});
