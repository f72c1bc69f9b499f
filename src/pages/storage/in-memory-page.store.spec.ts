import { Test, TestingModule } from '@nestjs/testing';
import {
  TEST_NOW,
  pageWrite,
  personWrite,
  postWrite,
} from '../../common/testing/page.fixtures';
import { CLOCK, FixedClock } from '../../common/utility/clock';
import { InMemoryPageStore } from './in-memory-page.store';

const HOUR_MS = 3_600_000;

describe('InMemoryPageStore', () => {
  let store: InMemoryPageStore;
  let clock: FixedClock;

  beforeEach(async () => {
    clock = new FixedClock(TEST_NOW);
    const module: TestingModule = await Test.createTestingModule({
      providers: [InMemoryPageStore, { provide: CLOCK, useValue: clock }],
    }).compile();

    store = module.get<InMemoryPageStore>(InMemoryPageStore);
  });

  describe('upsertPage', () => {
    it('keeps the creation time and replaces posts and people wholesale', async () => {
      await store.upsertPage(
        pageWrite('acme'),
        [postWrite('p1'), postWrite('p2')],
        [personWrite('follower-1', 'FOLLOWER')],
      );
      clock.advance(HOUR_MS);

      const updated = await store.upsertPage(
        pageWrite('acme', { followersCount: 510_000, lastAcquiredAt: clock.now() }),
        [postWrite('p3')],
        [],
      );

      expect(updated.createdAt).toEqual(TEST_NOW);
      expect(updated.updatedAt).toEqual(new Date(TEST_NOW.getTime() + HOUR_MS));
      expect((await store.getPostsFor('acme')).map((post) => post.postId)).toEqual(['p3']);
      expect((await store.listPeople('acme', 'FOLLOWER', { page: 1, limit: 10 })).data).toEqual([]);
    });

    it('records one follower sample per acquisition', async () => {
      await store.upsertPage(pageWrite('acme', { followersCount: 500_000 }), [], []);
      clock.advance(HOUR_MS);
      await store.upsertPage(
        pageWrite('acme', { followersCount: 510_000, lastAcquiredAt: clock.now() }),
        [],
        [],
      );

      expect(await store.getFollowerHistory('acme')).toEqual([
        { recordedAt: TEST_NOW, followers: 500_000 },
        { recordedAt: new Date(TEST_NOW.getTime() + HOUR_MS), followers: 510_000 },
      ]);
    });
  });

  it('returns null for an unknown page', async () => {
    await expect(store.getPage('nobody')).resolves.toBeNull();
    await expect(store.getPostsFor('nobody')).resolves.toEqual([]);
  });

  describe('listPages', () => {
    beforeEach(async () => {
      await store.upsertPage(
        pageWrite('alpha', { name: 'Alpha', industry: 'Software Development', followersCount: 5_000 }),
        [],
        [],
      );
      await store.upsertPage(
        pageWrite('beta', { name: 'Beta Works', industry: 'Manufacturing', followersCount: 50_000 }),
        [],
        [],
      );
      await store.upsertPage(
        pageWrite('gamma', { name: 'Gamma', industry: 'Software', followersCount: 2_000_000 }),
        [],
        [],
      );
    });

    it('orders by follower count, largest first', async () => {
      const result = await store.listPages({}, { page: 1, limit: 20 });
      expect(result.data.map((page) => page.identifier)).toEqual(['gamma', 'beta', 'alpha']);
      expect(result.meta).toEqual({ page: 1, limit: 20, total: 3, totalPages: 1 });
    });

    it('filters by follower bounds, industry and name', async () => {
      const ids = async (filter: Parameters<InMemoryPageStore['listPages']>[0]) =>
        (await store.listPages(filter, { page: 1, limit: 20 })).data.map((page) => page.identifier);

      expect(await ids({ minFollowers: 10_000 })).toEqual(['gamma', 'beta']);
      expect(await ids({ minFollowers: 1_000, maxFollowers: 100_000 })).toEqual(['beta', 'alpha']);
      expect(await ids({ industry: 'software' })).toEqual(['gamma', 'alpha']);
      expect(await ids({ name: 'WORKS' })).toEqual(['beta']);
    });

    it('paginates', async () => {
      const result = await store.listPages({}, { page: 2, limit: 1 });
      expect(result.data.map((page) => page.identifier)).toEqual(['beta']);
      expect(result.meta.totalPages).toBe(3);
    });
  });

  describe('listPosts', () => {
    beforeEach(async () => {
      await store.upsertPage(
        pageWrite('acme'),
        [
          postWrite('old', {
            likesCount: 900,
            engagementRate: 0.2,
            postedAt: new Date('2026-02-01T00:00:00.000Z'),
          }),
          postWrite('mid', {
            likesCount: 300,
            engagementRate: 0.9,
            postedAt: new Date('2026-02-10T00:00:00.000Z'),
          }),
          postWrite('new', {
            likesCount: 100,
            engagementRate: 0.5,
            postedAt: new Date('2026-02-20T00:00:00.000Z'),
          }),
        ],
        [],
      );
    });

    it.each([
      ['recent', ['new', 'mid', 'old']],
      ['popular', ['old', 'mid', 'new']],
      ['engagement', ['mid', 'new', 'old']],
    ] as const)('sorts by %s', async (sort, expected) => {
      const result = await store.listPosts('acme', sort, { page: 1, limit: 20 });
      expect(result.data.map((post) => post.postId)).toEqual(expected);
    });
  });

  describe('listComments', () => {
    it('lists the newest comments first', async () => {
      await store.upsertPage(
        pageWrite('acme'),
        [
          postWrite('p1', {
            comments: [
              {
                commentId: 'p1-c1',
                authorName: 'Sarah Patel',
                content: 'Great insights, thanks for sharing.',
                likesCount: 3,
                createdAt: new Date('2026-02-21T00:00:00.000Z'),
              },
              {
                commentId: 'p1-c2',
                authorName: 'Mike Chen',
                content: 'Exciting times ahead!',
                likesCount: 0,
                createdAt: new Date('2026-02-25T00:00:00.000Z'),
              },
            ],
          }),
        ],
        [],
      );

      const result = await store.listComments('acme', 'p1', { page: 1, limit: 20 });
      expect(result?.data.map((comment) => comment.commentId)).toEqual(['p1-c2', 'p1-c1']);
    });

    it('returns null for a post the page does not have', async () => {
      await store.upsertPage(pageWrite('acme'), [], []);
      await expect(store.listComments('acme', 'missing', { page: 1, limit: 20 })).resolves.toBeNull();
    });
  });

  it('lists people of one role by name', async () => {
    await store.upsertPage(
      pageWrite('acme'),
      [],
      [
        personWrite('follower-1', 'FOLLOWER', { name: 'Zoe Adams' }),
        personWrite('employee-1', 'EMPLOYEE', { name: 'Alice Morgan' }),
        personWrite('follower-2', 'FOLLOWER', { name: 'Ben Foster' }),
      ],
    );

    const result = await store.listPeople('acme', 'FOLLOWER', { page: 1, limit: 20 });
    expect(result.data.map((person) => person.profileId)).toEqual(['follower-2', 'follower-1']);
    expect(result.meta.total).toBe(2);
  });

  it('finds pages acquired before a cutoff, oldest first', async () => {
    await store.upsertPage(pageWrite('fresh', { lastAcquiredAt: TEST_NOW }), [], []);
    await store.upsertPage(
      pageWrite('stale', { lastAcquiredAt: new Date('2026-02-25T00:00:00.000Z') }),
      [],
      [],
    );
    await store.upsertPage(
      pageWrite('older', { lastAcquiredAt: new Date('2026-02-20T00:00:00.000Z') }),
      [],
      [],
    );

    await expect(store.findStalePages(new Date('2026-02-28T00:00:00.000Z'), 50)).resolves.toEqual([
      'older',
      'stale',
    ]);
    await expect(store.findStalePages(new Date('2026-02-28T00:00:00.000Z'), 1)).resolves.toEqual([
      'older',
    ]);
  });
});
