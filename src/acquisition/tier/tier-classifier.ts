import { InvalidArgumentError } from '../../common/errors/insights.errors';

export type Tier = 'SMALL' | 'MEDIUM' | 'LARGE';

export interface NumericRange {
  min: number;
  max: number;
}

export interface TierRanges {
  likes: NumericRange;
  commentRatio: NumericRange;
  shareRatio: NumericRange;
  viewMultiplier: NumericRange;
}

export interface TierClassification {
  tier: Tier;
  ranges: TierRanges;
}

export const MEDIUM_TIER_THRESHOLD = 1_000_000;
export const LARGE_TIER_THRESHOLD = 10_000_000;

export const TIER_RANGES: Readonly<Record<Tier, TierRanges>> = {
  SMALL: {
    likes: { min: 50, max: 1000 },
    commentRatio: { min: 0.02, max: 0.1 },
    shareRatio: { min: 0.01, max: 0.05 },
    viewMultiplier: { min: 2, max: 8 },
  },
  MEDIUM: {
    likes: { min: 100, max: 2000 },
    commentRatio: { min: 0.02, max: 0.08 },
    shareRatio: { min: 0.01, max: 0.05 },
    viewMultiplier: { min: 3, max: 10 },
  },
  LARGE: {
    likes: { min: 150, max: 5000 },
    commentRatio: { min: 0.01, max: 0.06 },
    shareRatio: { min: 0.005, max: 0.04 },
    viewMultiplier: { min: 5, max: 15 },
  },
};

export function classifyTier(followers: number): TierClassification {
  if (!Number.isSafeInteger(followers) || followers < 0) {
    throw new InvalidArgumentError(
      `Follower count must be a non-negative integer, got ${followers}`,
    );
  }

  const tier: Tier =
    followers >= LARGE_TIER_THRESHOLD
      ? 'LARGE'
      : followers >= MEDIUM_TIER_THRESHOLD
        ? 'MEDIUM'
        : 'SMALL';

  return { tier, ranges: TIER_RANGES[tier] };
}
