import { roundTo } from '../../common/utility/number.utils';

/** Percentage of followers that interacted, rounded to two decimals; 0 with no followers. */
export function calculateEngagementRate(
  likes: number,
  comments: number,
  shares: number,
  followers: number,
): number {
  if (followers <= 0) {
    return 0;
  }
  return roundTo(((likes + comments + shares) / followers) * 100, 2);
}
