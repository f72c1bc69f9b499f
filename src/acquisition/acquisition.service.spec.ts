import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { TEXT_GENERATION_PROVIDER } from '../ai/interfaces/ai-provider.interface';
import { InsightSummaryService } from '../ai/service/insight-summary.service';
import { AnalyticsService, analyticsCacheKey } from '../analytics/analytics.service';
import { CACHE_STORE } from '../cache/cache-store.interface';
import { InMemoryCacheStore } from '../cache/in-memory-cache.store';
import {
  InvalidArgumentError,
  NotFoundError,
  StorageFailureError,
} from '../common/errors/insights.errors';
import { TEST_NOW, testConfig } from '../common/testing/page.fixtures';
import { CLOCK, FixedClock } from '../common/utility/clock';
import { RANDOM_SOURCE, SeededRandomSource } from '../common/utility/random';
import { PageFacts } from '../pages/interfaces/page.interface';
import { InMemoryPageStore } from '../pages/storage/in-memory-page.store';
import { PAGE_STORE } from '../pages/storage/page-store.interface';
import { AcquisitionService } from './acquisition.service';
import { LIVE_PAGE_PROVIDER, LiveFetchOptions, LivePageSnapshot } from './live/live-page-provider.interface';
import { SyntheticContentGenerator, defaultEmployeeSampleSize } from './synthesis/content-generator';
import { CONTENT_POOLS, CONTENT_POOLS_TOKEN } from './synthesis/content-pools';
import { calculateEngagementRate } from './synthesis/engagement-rate';
import { EngagementSynthesizer } from './synthesis/engagement-synthesizer';
import { TIER_RANGES } from './tier/tier-classifier';

const LIVE_FACTS: PageFacts = {
  name: 'Live Co',
  url: 'https://www.linkedin.com/company/liveco',
  description: 'A company with a public page.',
  industry: 'Software Development',
  headquarters: 'Austin, TX',
  website: 'https://liveco.example.test',
  companySize: '1,001-5,000 employees',
  foundedYear: 2010,
  specialties: ['Software'],
  profilePictureUrl: null,
  followersCount: 2_000_000,
  employeesCount: 3_000,
};

describe('AcquisitionService', () => {
  let service: AcquisitionService;
  let store: InMemoryPageStore;
  let analytics: AnalyticsService;
  let cache: InMemoryCacheStore;
  const liveProvider = { fetch: jest.fn<Promise<LivePageSnapshot>, [string, LiveFetchOptions]>() };

  async function createService(config: ConfigService = testConfig()): Promise<void> {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AcquisitionService,
        SyntheticContentGenerator,
        EngagementSynthesizer,
        AnalyticsService,
        InsightSummaryService,
        { provide: PAGE_STORE, useClass: InMemoryPageStore },
        { provide: CACHE_STORE, useClass: InMemoryCacheStore },
        { provide: LIVE_PAGE_PROVIDER, useValue: liveProvider },
        { provide: CLOCK, useValue: new FixedClock(TEST_NOW) },
        { provide: RANDOM_SOURCE, useValue: new SeededRandomSource(42) },
        { provide: CONTENT_POOLS_TOKEN, useValue: CONTENT_POOLS },
        { provide: TEXT_GENERATION_PROVIDER, useValue: { enabled: false, generateText: jest.fn() } },
        { provide: ConfigService, useValue: config },
      ],
    }).compile();

    service = module.get<AcquisitionService>(AcquisitionService);
    store = module.get<InMemoryPageStore>(PAGE_STORE);
    analytics = module.get<AnalyticsService>(AnalyticsService);
    cache = module.get<InMemoryCacheStore>(CACHE_STORE);
  }

  beforeEach(async () => {
    liveProvider.fetch.mockReset();
    liveProvider.fetch.mockRejectedValue(new Error('blocked by the live source'));
    await createService();
  });

  describe('synthetic fallback', () => {
    it('synthesizes a small page from hints when live retrieval fails', async () => {
      const result = await service.acquire('acme', 2, { hints: { followers: 500_000 } });

      expect(result).toMatchObject({
        source: 'SYNTHETIC',
        depth: 2,
        tier: 'SMALL',
        postsCount: 15,
        followersCount: 0,
        employeesCount: 0,
      });
      expect(result.page.followersCount).toBe(500_000);
      expect(result.page.name).toBe('Acme');

      const posts = await store.getPostsFor('acme');
      const { likes } = TIER_RANGES.SMALL;
      expect(posts).toHaveLength(15);
      posts.forEach((post, index) => {
        expect(post.likesCount).toBeGreaterThanOrEqual(likes.min);
        expect(post.likesCount).toBeLessThanOrEqual(likes.max);
        expect(post.commentsCount).toBeLessThanOrEqual(post.likesCount);
        expect(post.viewsCount).toBeGreaterThanOrEqual(post.likesCount);
        expect(post.engagementRate).toBe(
          calculateEngagementRate(post.likesCount, post.commentsCount, post.sharesCount, 500_000),
        );
        if (index > 0) {
          expect(post.postedAt.getTime()).toBeLessThanOrEqual(posts[index - 1].postedAt.getTime());
        }
      });

      const snapshot = await analytics.getAnalytics('acme');
      const mean = posts.reduce((total, post) => total + post.engagementRate, 0) / posts.length;
      expect(snapshot.totalPosts).toBe(15);
      expect(snapshot.averageEngagementRate).toBeCloseTo(mean, 10);
    });

    it('classifies a very large page and samples its people at depth 3', async () => {
      const result = await service.acquire('globalcorp', 3, { hints: { followers: 27_000_000 } });

      expect(result.source).toBe('SYNTHETIC');
      expect(result.tier).toBe('LARGE');
      expect(result.postsCount).toBe(15);
      expect(result.followersCount).toBe(25);
      expect(result.employeesCount).toBe(defaultEmployeeSampleSize(result.page.employeesCount));

      const posts = await store.getPostsFor('globalcorp');
      posts.forEach((post) => {
        expect(post.likesCount).toBeGreaterThanOrEqual(TIER_RANGES.LARGE.likes.min);
        expect(post.likesCount).toBeLessThanOrEqual(TIER_RANGES.LARGE.likes.max);
      });
      await expect(cache.get(analyticsCacheKey('globalcorp'))).resolves.not.toBeNull();
    });

    it('stores only the page itself at depth 1', async () => {
      const result = await service.acquire('acme', 1);

      expect(result.postsCount).toBe(0);
      await expect(store.getPostsFor('acme')).resolves.toEqual([]);
      await expect(store.getPage('acme')).resolves.toMatchObject({ lastDepth: 1 });
    });

    it('honours explicit counts and generates comments', async () => {
      await service.acquire('acme', 3, {
        postsCount: 3,
        followersCount: 4,
        employeesCount: 2,
        commentsPerPost: 2,
      });

      const posts = await store.getPostsFor('acme');
      expect(posts.map((post) => post.postId).sort()).toEqual([
        'acme-post-1',
        'acme-post-2',
        'acme-post-3',
      ]);
      const comments = await store.listComments('acme', 'acme-post-1', { page: 1, limit: 20 });
      expect(comments?.data.map((comment) => comment.commentId).sort()).toEqual([
        'acme-post-1-c1',
        'acme-post-1-c2',
      ]);
      expect((await store.listPeople('acme', 'FOLLOWER', { page: 1, limit: 20 })).meta.total).toBe(4);
      expect((await store.listPeople('acme', 'EMPLOYEE', { page: 1, limit: 20 })).meta.total).toBe(2);
    });

    it('keeps what it learned about a page on later synthetic acquisitions', async () => {
      await service.acquire('acme', 2, { hints: { followers: 2_500_000, name: 'Acme Rockets' } });
      const result = await service.acquire('acme', 2);

      expect(result.page.name).toBe('Acme Rockets');
      expect(result.tier).toBe('MEDIUM');
    });
  });

  it('replaces the previous acquisition instead of accumulating', async () => {
    await service.acquire('acme', 3);
    const second = await service.acquire('acme', 3);

    expect(await store.getPostsFor('acme')).toHaveLength(15);
    expect((await store.listPeople('acme', 'FOLLOWER', { page: 1, limit: 100 })).meta.total).toBe(25);
    expect((await store.listPages({}, { page: 1, limit: 20 })).meta.total).toBe(1);
    expect(await store.getFollowerHistory('acme')).toHaveLength(2);
    expect(second.postsCount).toBe(15);
  });

  it('serializes concurrent requests for the same page', async () => {
    const [deep, shallow] = await Promise.all([
      service.acquire('acme', 3),
      service.acquire('acme', 1),
    ]);

    expect(deep.postsCount).toBe(15);
    expect(shallow.postsCount).toBe(0);
    await expect(store.getPage('acme')).resolves.toMatchObject({ lastDepth: 1 });
    await expect(store.getPostsFor('acme')).resolves.toEqual([]);
    expect((await store.listPeople('acme', 'FOLLOWER', { page: 1, limit: 100 })).data).toEqual([]);
    expect((await store.listPeople('acme', 'EMPLOYEE', { page: 1, limit: 100 })).data).toEqual([]);
  });

  it('falls back to synthesis when live retrieval exceeds its budget', async () => {
    let signal: AbortSignal | undefined;
    liveProvider.fetch.mockImplementation(
      (_identifier, options) =>
        new Promise<LivePageSnapshot>((_resolve, reject) => {
          signal = options.signal;
          options.signal.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );

    const result = await service.acquire('slowcorp', 2, { timeoutMs: 20 });

    expect(result.source).toBe('SYNTHETIC');
    expect(result.postsCount).toBe(15);
    expect(signal?.aborted).toBe(true);
  });

  describe('live retrieval', () => {
    it('stores live facts and posts with computed engagement', async () => {
      liveProvider.fetch.mockResolvedValue({
        facts: LIVE_FACTS,
        posts: [
          {
            postId: 'urn:post:1',
            content: 'We shipped it.',
            imageUrl: null,
            likesCount: 15_000,
            commentsCount: 4_000,
            sharesCount: 1_000,
            viewsCount: 90_000,
            postedAt: new Date('2026-02-27T09:00:00.000Z'),
          },
          {
            postId: 'urn:post:1',
            content: 'Duplicate entry',
            imageUrl: null,
            likesCount: 1,
            commentsCount: 0,
            sharesCount: 0,
            viewsCount: 1,
            postedAt: null,
          },
          {
            postId: 'urn:post:2',
            content: 'No date on this one.',
            imageUrl: null,
            likesCount: 0,
            commentsCount: 0,
            sharesCount: 0,
            viewsCount: 0,
            postedAt: null,
          },
        ],
      });

      const result = await service.acquire('liveco', 2);

      expect(result).toMatchObject({ source: 'LIVE', tier: 'MEDIUM', postsCount: 2 });
      expect(result.page.name).toBe('Live Co');
      expect(result.page.lastSource).toBe('LIVE');

      const posts = await store.getPostsFor('liveco');
      expect(posts.map((post) => [post.postId, post.engagementRate])).toEqual([
        ['urn:post:2', 0],
        ['urn:post:1', 1],
      ]);
      expect(posts[0].postedAt).toEqual(TEST_NOW);
    });

    it('synthesizes posts for a live page that shows none', async () => {
      liveProvider.fetch.mockResolvedValue({ facts: LIVE_FACTS, posts: [] });

      const result = await service.acquire('liveco', 2);

      expect(result.source).toBe('LIVE');
      expect(result.postsCount).toBe(15);
      const posts = await store.getPostsFor('liveco');
      posts.forEach((post) => {
        expect(post.likesCount).toBeGreaterThanOrEqual(TIER_RANGES.MEDIUM.likes.min);
        expect(post.likesCount).toBeLessThanOrEqual(TIER_RANGES.MEDIUM.likes.max);
      });
    });

    it('fills facts the live page does not show from what is already known', async () => {
      const first = await service.acquire('liveco', 1, { hints: { followers: 2_500_000 } });
      liveProvider.fetch.mockResolvedValue({
        facts: { ...LIVE_FACTS, followersCount: 0, employeesCount: 0, industry: null },
        posts: [],
      });

      const result = await service.acquire('liveco', 2);

      expect(result).toMatchObject({ source: 'LIVE', tier: 'MEDIUM', postsCount: 15 });
      expect(result.page).toMatchObject({
        name: 'Live Co',
        headquarters: 'Austin, TX',
        followersCount: 2_500_000,
        employeesCount: first.page.employeesCount,
        industry: first.page.industry,
      });
      const posts = await store.getPostsFor('liveco');
      posts.forEach((post) => {
        expect(post.engagementRate).toBe(
          calculateEngagementRate(post.likesCount, post.commentsCount, post.sharesCount, 2_500_000),
        );
      });
      const history = await store.getFollowerHistory('liveco');
      expect(history.map((sample) => sample.followers)).toEqual([2_500_000, 2_500_000]);
    });
  });

  describe('unknown pages', () => {
    it('synthesizes unknown pages by default', async () => {
      liveProvider.fetch.mockRejectedValue(new NotFoundError('no such page'));

      await expect(service.acquire('nobody-here', 2)).resolves.toMatchObject({ source: 'SYNTHETIC' });
    });

    it('surfaces not found when synthesis for unknown pages is off', async () => {
      await createService(testConfig({ ALLOW_SYNTHETIC_FOR_UNKNOWN: false }));
      liveProvider.fetch.mockRejectedValue(new NotFoundError('no such page'));

      await expect(service.acquire('nobody-here', 2)).rejects.toBeInstanceOf(NotFoundError);
      await expect(store.getPage('nobody-here')).resolves.toBeNull();
    });
  });

  describe('validation', () => {
    it.each(['', 'bad id!', '-leading-dash', 'x'.repeat(101)])(
      'rejects the identifier %p',
      async (identifier) => {
        await expect(service.acquire(identifier, 2)).rejects.toBeInstanceOf(InvalidArgumentError);
        expect(liveProvider.fetch).not.toHaveBeenCalled();
      },
    );

    it('rejects negative counts and a zero timeout', async () => {
      await expect(service.acquire('acme', 2, { postsCount: -1 })).rejects.toBeInstanceOf(
        InvalidArgumentError,
      );
      await expect(service.acquire('acme', 2, { timeoutMs: 0 })).rejects.toBeInstanceOf(
        InvalidArgumentError,
      );
    });

    it('rejects follower hints the storage cannot hold', async () => {
      await expect(
        service.acquire('acme', 2, { hints: { followers: 3_000_000_000 } }),
      ).rejects.toBeInstanceOf(InvalidArgumentError);
      await expect(store.getPage('acme')).resolves.toBeNull();
    });

    it('trims surrounding whitespace from the identifier', async () => {
      const result = await service.acquire('  acme  ', 1);
      expect(result.page.identifier).toBe('acme');
    });
  });

  it('propagates storage failures', async () => {
    jest.spyOn(store, 'upsertPage').mockRejectedValueOnce(new StorageFailureError('disk full'));

    await expect(service.acquire('acme', 2)).rejects.toBeInstanceOf(StorageFailureError);
  });

  it('succeeds when analytics cannot be refreshed after the records are stored', async () => {
    jest.spyOn(analytics, 'refresh').mockRejectedValueOnce(new StorageFailureError('cache offline'));

    const result = await service.acquire('acme', 3);

    expect(result.postsCount).toBe(15);
    await expect(store.getPage('acme')).resolves.toMatchObject({ lastDepth: 3 });
  });

  it('reports each page of a batch separately', async () => {
    const outcomes = await service.acquireMany([
      { identifier: 'acme', depth: 2 },
      { identifier: 'bad id', depth: 2 },
    ]);

    expect(outcomes[0]).toMatchObject({ identifier: 'acme', status: 'fulfilled' });
    expect(outcomes[1]).toMatchObject({
      identifier: 'bad id',
      status: 'rejected',
      error: { kind: 'InvalidArgument' },
    });
  });
});
