import { Inject, Injectable } from '@nestjs/common';
import { subSeconds } from 'date-fns';
import { InvalidArgumentError } from '../../common/errors/insights.errors';
import { RANDOM_SOURCE, RandomSource, randomFloat, randomInt } from '../../common/utility/random';
import { NumericRange, TierRanges } from '../tier/tier-classifier';
import { calculateEngagementRate } from './engagement-rate';

export interface EngagementCounts {
  likes: number;
  comments: number;
  shares: number;
  views: number;
  engagementRate: number;
}

export const POSTING_WINDOW_DAYS: NumericRange = { min: 1, max: 30 };

const SECONDS_PER_DAY = 86_400;

const within = (value: number, { min, max }: NumericRange): boolean => value >= min && value <= max;

/**
 * Checks the relationships every generated post must keep: views cover likes,
 * comments and shares stay fractions of likes, and the view multiplier lies in
 * the tier range. Views are rounded to whole numbers, so the multiplier check
 * allows half a view of slack on either side.
 */
export function assertEngagementConsistency(counts: EngagementCounts, ranges: TierRanges): void {
  const { likes, comments, shares, views } = counts;
  const problems: string[] = [];

  if (views < likes) problems.push(`views (${views}) < likes (${likes})`);
  if (comments < 0 || comments > likes) problems.push(`comments (${comments}) outside [0, ${likes}]`);
  if (shares < 0 || shares > likes) problems.push(`shares (${shares}) outside [0, ${likes}]`);

  if (likes > 0) {
    const { min, max } = ranges.viewMultiplier;
    const lowest = Math.max(likes, likes * min) - 0.5;
    const highest = likes * max + 0.5;
    if (views < lowest || views > highest) {
      problems.push(`views/likes ${(views / likes).toFixed(3)} outside [${min}, ${max}]`);
    }
  }

  if (problems.length > 0) {
    throw new InvalidArgumentError(`Inconsistent engagement: ${problems.join('; ')}`);
  }
}

@Injectable()
export class EngagementSynthesizer {
  constructor(@Inject(RANDOM_SOURCE) private readonly random: RandomSource) {}

  synthesize(ranges: TierRanges, followers: number): EngagementCounts {
    const likes = randomInt(this.random, ranges.likes.min, ranges.likes.max);
    const comments = Math.round(
      likes * randomFloat(this.random, ranges.commentRatio.min, ranges.commentRatio.max),
    );
    const shares = Math.round(
      likes * randomFloat(this.random, ranges.shareRatio.min, ranges.shareRatio.max),
    );
    const multiplier = Math.max(
      1,
      randomFloat(this.random, ranges.viewMultiplier.min, ranges.viewMultiplier.max),
    );
    const views = Math.round(likes * multiplier);

    const counts: EngagementCounts = {
      likes,
      comments,
      shares,
      views,
      engagementRate: calculateEngagementRate(likes, comments, shares, followers),
    };
    assertEngagementConsistency(counts, ranges);
    return counts;
  }

  /** One posting time per post, each 1 to 30 days before `now`, most recent first. */
  postingTimestamps(count: number, now: Date): Date[] {
    if (!Number.isInteger(count) || count < 0) {
      throw new InvalidArgumentError(`Post count must be a non-negative integer, got ${count}`);
    }
    return Array.from({ length: count }, () =>
      subSeconds(
        now,
        randomInt(
          this.random,
          POSTING_WINDOW_DAYS.min * SECONDS_PER_DAY,
          POSTING_WINDOW_DAYS.max * SECONDS_PER_DAY,
        ),
      ),
    ).sort((a, b) => b.getTime() - a.getTime());
  }
}
