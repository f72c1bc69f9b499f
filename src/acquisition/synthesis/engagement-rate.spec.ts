import { calculateEngagementRate } from './engagement-rate';

describe('calculateEngagementRate', () => {
  it('is the share of followers that interacted, as a percentage', () => {
    expect(calculateEngagementRate(100, 10, 5, 1_000)).toBe(11.5);
    expect(calculateEngagementRate(1_000, 50, 25, 10_000)).toBe(10.75);
  });

  it('rounds to two decimals', () => {
    expect(calculateEngagementRate(525, 32, 10, 500_000)).toBe(0.11);
  });

  it('is 0 without followers', () => {
    expect(calculateEngagementRate(100, 10, 5, 0)).toBe(0);
  });
});
