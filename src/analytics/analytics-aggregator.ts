import { roundTo } from '../common/utility/number.utils';
import { Tier, classifyTier } from '../acquisition/tier/tier-classifier';
import { FollowerSample, PageRecord, PostRecord } from '../pages/interfaces/page.interface';

export interface FollowerTrendPoint {
  /** ISO-8601 time of the acquisition that recorded the sample. */
  date: string;
  followers: number;
}

export interface AnalyticsSnapshot {
  pageIdentifier: string;
  /** `lastAcquiredAt` of the page the snapshot was computed from. */
  pageAcquiredAt: Date;
  tier: Tier;
  followersCount: number;
  totalPosts: number;
  averageEngagementRate: number;
  mostEngagedPost: PostRecord | null;
  totalLikes: number;
  totalComments: number;
  totalShares: number;
  totalViews: number;
  totalEngagement: number;
  averageLikes: number;
  averageComments: number;
  averageShares: number;
  followerTrend: FollowerTrendPoint[];
  computedAt: Date;
  summary: string | null;
  summaryGeneratedAt: Date | null;
}

const sum = (values: number[]): number => values.reduce((total, value) => total + value, 0);

/** Highest engagement rate; on a tie the most recent post wins. */
export function findMostEngagedPost(posts: PostRecord[]): PostRecord | null {
  return posts.reduce<PostRecord | null>((best, post) => {
    if (
      best === null ||
      post.engagementRate > best.engagementRate ||
      (post.engagementRate === best.engagementRate && post.postedAt.getTime() > best.postedAt.getTime())
    ) {
      return post;
    }
    return best;
  }, null);
}

export function buildFollowerTrend(history: FollowerSample[]): FollowerTrendPoint[] {
  return [...history]
    .sort((a, b) => a.recordedAt.getTime() - b.recordedAt.getTime())
    .map((sample) => ({ date: sample.recordedAt.toISOString(), followers: sample.followers }));
}

export function aggregateAnalytics(
  page: PageRecord,
  posts: PostRecord[],
  history: FollowerSample[],
  computedAt: Date,
): AnalyticsSnapshot {
  const count = posts.length;
  const average = (values: number[]): number => (count === 0 ? 0 : sum(values) / count);

  const totalLikes = sum(posts.map((post) => post.likesCount));
  const totalComments = sum(posts.map((post) => post.commentsCount));
  const totalShares = sum(posts.map((post) => post.sharesCount));

  return {
    pageIdentifier: page.identifier,
    pageAcquiredAt: page.lastAcquiredAt,
    tier: classifyTier(page.followersCount).tier,
    followersCount: page.followersCount,
    totalPosts: count,
    averageEngagementRate: average(posts.map((post) => post.engagementRate)),
    mostEngagedPost: findMostEngagedPost(posts),
    totalLikes,
    totalComments,
    totalShares,
    totalViews: sum(posts.map((post) => post.viewsCount)),
    totalEngagement: totalLikes + totalComments + totalShares,
    averageLikes: roundTo(average(posts.map((post) => post.likesCount)), 2),
    averageComments: roundTo(average(posts.map((post) => post.commentsCount)), 2),
    averageShares: roundTo(average(posts.map((post) => post.sharesCount)), 2),
    followerTrend: buildFollowerTrend(history),
    computedAt,
    summary: null,
    summaryGeneratedAt: null,
  };
}
