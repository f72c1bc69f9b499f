import { InvalidArgumentError } from '../../common/errors/insights.errors';
import { classifyTier, TIER_RANGES } from './tier-classifier';

describe('classifyTier', () => {
  it.each([
    [0, 'SMALL'],
    [999_999, 'SMALL'],
    [1_000_000, 'MEDIUM'],
    [9_999_999, 'MEDIUM'],
    [10_000_000, 'LARGE'],
    [27_000_000, 'LARGE'],
  ])('classifies %d followers as %s', (followers, tier) => {
    expect(classifyTier(followers).tier).toBe(tier);
  });

  it('returns the ranges of the chosen tier', () => {
    expect(classifyTier(5_000).ranges).toBe(TIER_RANGES.SMALL);
    expect(classifyTier(5_000).ranges.likes).toEqual({ min: 50, max: 1000 });
  });

  it.each([-1, 1.5, Number.NaN, Number.POSITIVE_INFINITY])('rejects %p', (followers) => {
    expect(() => classifyTier(followers)).toThrow(InvalidArgumentError);
  });
});
