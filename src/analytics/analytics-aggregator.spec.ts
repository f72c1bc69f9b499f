import { TEST_NOW, pageWrite, postWrite } from '../common/testing/page.fixtures';
import { PageRecord, PostRecord } from '../pages/interfaces/page.interface';
import { aggregateAnalytics, findMostEngagedPost } from './analytics-aggregator';

const PAGE: PageRecord = { ...pageWrite('acme'), createdAt: TEST_NOW, updatedAt: TEST_NOW };

function post(postId: string, overrides: Partial<PostRecord>): PostRecord {
  const { comments: _comments, ...write } = postWrite(postId);
  return { ...write, pageIdentifier: 'acme', ...overrides };
}

describe('aggregateAnalytics', () => {
  const posts = [
    post('p1', {
      likesCount: 100,
      commentsCount: 10,
      sharesCount: 5,
      viewsCount: 400,
      engagementRate: 0.5,
      postedAt: new Date('2026-02-01T00:00:00.000Z'),
    }),
    post('p2', {
      likesCount: 200,
      commentsCount: 20,
      sharesCount: 10,
      viewsCount: 900,
      engagementRate: 1.5,
      postedAt: new Date('2026-02-02T00:00:00.000Z'),
    }),
    post('p3', {
      likesCount: 300,
      commentsCount: 31,
      sharesCount: 15,
      viewsCount: 1_200,
      engagementRate: 1.5,
      postedAt: new Date('2026-02-05T00:00:00.000Z'),
    }),
  ];

  it('totals and averages the posts', () => {
    const snapshot = aggregateAnalytics(PAGE, posts, [], TEST_NOW);

    expect(snapshot).toMatchObject({
      pageIdentifier: 'acme',
      pageAcquiredAt: PAGE.lastAcquiredAt,
      tier: 'SMALL',
      followersCount: 500_000,
      totalPosts: 3,
      totalLikes: 600,
      totalComments: 61,
      totalShares: 30,
      totalViews: 2_500,
      totalEngagement: 691,
      averageLikes: 200,
      averageComments: 20.33,
      averageShares: 10,
      computedAt: TEST_NOW,
      summary: null,
      summaryGeneratedAt: null,
    });
    expect(snapshot.averageEngagementRate).toBeCloseTo(3.5 / 3, 10);
  });

  it('breaks engagement ties in favour of the most recent post', () => {
    expect(findMostEngagedPost(posts)?.postId).toBe('p3');
    expect(findMostEngagedPost([...posts].reverse())?.postId).toBe('p3');
  });

  it('reports zeros for a page without posts', () => {
    const snapshot = aggregateAnalytics(PAGE, [], [], TEST_NOW);

    expect(snapshot.totalPosts).toBe(0);
    expect(snapshot.averageEngagementRate).toBe(0);
    expect(snapshot.averageLikes).toBe(0);
    expect(snapshot.mostEngagedPost).toBeNull();
  });

  it('orders the follower trend oldest first', () => {
    const snapshot = aggregateAnalytics(
      PAGE,
      [],
      [
        { recordedAt: new Date('2026-02-02T00:00:00.000Z'), followers: 510_000 },
        { recordedAt: new Date('2026-02-01T00:00:00.000Z'), followers: 500_000 },
      ],
      TEST_NOW,
    );

    expect(snapshot.followerTrend).toEqual([
      { date: '2026-02-01T00:00:00.000Z', followers: 500_000 },
      { date: '2026-02-02T00:00:00.000Z', followers: 510_000 },
    ]);
  });
});
