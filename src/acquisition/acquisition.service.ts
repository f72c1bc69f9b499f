import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pLimit from 'p-limit';
import { AnalyticsService } from '../analytics/analytics.service';
import {
  AcquisitionFailedError,
  AcquisitionTimeoutError,
  InsightsError,
  InvalidArgumentError,
  NotFoundError,
  describeError,
} from '../common/errors/insights.errors';
import { CLOCK, Clock } from '../common/utility/clock';
import { KeyedMutex } from '../common/utility/keyed-mutex';
import { MAX_STORED_COUNT } from '../common/utility/number.utils';
import {
  ACQUISITION_DEPTHS,
  AcquisitionDepth,
  AcquisitionSource,
  PageFacts,
  PersonProfileWrite,
  PostWrite,
} from '../pages/interfaces/page.interface';
import { PAGE_STORE, PageStore } from '../pages/storage/page-store.interface';
import {
  AcquisitionOptions,
  AcquisitionRequest,
  AcquisitionResult,
  AcquisitionState,
  BatchAcquisitionOutcome,
  IDENTIFIER_PATTERN,
} from './acquisition.types';
import {
  LIVE_PAGE_PROVIDER,
  LivePageProvider,
  LivePageSnapshot,
  LivePost,
} from './live/live-page-provider.interface';
import {
  DEFAULT_FOLLOWERS_COUNT,
  DEFAULT_POSTS_COUNT,
  SyntheticContentGenerator,
  defaultEmployeeSampleSize,
} from './synthesis/content-generator';
import { CONTENT_POOLS_TOKEN, ContentPools } from './synthesis/content-pools';
import {
  completeLiveFacts,
  defaultPageFacts,
  resolveSyntheticFacts,
} from './synthesis/default-page-facts';
import { calculateEngagementRate } from './synthesis/engagement-rate';
import { EngagementSynthesizer } from './synthesis/engagement-synthesizer';
import { classifyTier } from './tier/tier-classifier';

export const BATCH_CONCURRENCY = 4;

interface RecordSet {
  source: AcquisitionSource;
  facts: PageFacts;
  posts: PostWrite[];
  people: PersonProfileWrite[];
}

function assertCount(
  name: string,
  value: number | undefined,
  options: { positive?: boolean } = {},
): void {
  if (value === undefined) {
    return;
  }
  const minimum = options.positive ? 1 : 0;
  if (!Number.isSafeInteger(value) || value < minimum) {
    throw new InvalidArgumentError(
      `${name} must be ${options.positive ? 'a positive' : 'a non-negative'} integer, got ${value}`,
    );
  }
  if (value > MAX_STORED_COUNT) {
    throw new InvalidArgumentError(`${name} must not exceed ${MAX_STORED_COUNT}, got ${value}`);
  }
}

function assertOptions(options: AcquisitionOptions): void {
  assertCount('timeoutMs', options.timeoutMs, { positive: true });
  assertCount('postsCount', options.postsCount);
  assertCount('followersCount', options.followersCount);
  assertCount('employeesCount', options.employeesCount);
  assertCount('commentsPerPost', options.commentsPerPost);
  assertCount('hints.followers', options.hints?.followers);
  assertCount('hints.employees', options.hints?.employees);
}

/**
 * Acquires a page: live retrieval first, synthesis on any failure, then one
 * upsert that replaces everything stored for the identifier.
 *
 * Same-identifier requests are serialized around generate+persist, so the
 * stored post set always belongs to exactly one request. The live fetch runs
 * outside the lock.
 */
@Injectable()
export class AcquisitionService {
  private readonly logger = new Logger(AcquisitionService.name);
  private readonly locks = new KeyedMutex();
  private readonly liveTimeoutMs: number;
  private readonly lockWaitMs: number;
  private readonly allowSyntheticForUnknown: boolean;
  private readonly baseUrl: string;

  constructor(
    @Inject(PAGE_STORE) private readonly store: PageStore,
    @Inject(LIVE_PAGE_PROVIDER) private readonly liveProvider: LivePageProvider,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(CONTENT_POOLS_TOKEN) private readonly pools: ContentPools,
    private readonly generator: SyntheticContentGenerator,
    private readonly synthesizer: EngagementSynthesizer,
    private readonly analytics: AnalyticsService,
    config: ConfigService,
  ) {
    this.liveTimeoutMs = config.get<number>('LIVE_ACQUISITION_TIMEOUT_MS', 30_000);
    this.lockWaitMs = config.get<number>('ACQUISITION_LOCK_WAIT_MS', 60_000);
    this.allowSyntheticForUnknown = config.get<boolean>('ALLOW_SYNTHETIC_FOR_UNKNOWN', true);
    this.baseUrl = config.get<string>('LIVE_SOURCE_BASE_URL', 'https://www.linkedin.com');
  }

  async acquire(
    rawIdentifier: string,
    depth: AcquisitionDepth,
    options: AcquisitionOptions = {},
  ): Promise<AcquisitionResult> {
    const identifier = rawIdentifier.trim();
    if (!IDENTIFIER_PATTERN.test(identifier)) {
      throw new InvalidArgumentError(
        `Invalid page identifier '${rawIdentifier}': use letters, digits, '.', '_' or '-' (max 100)`,
      );
    }
    if (!ACQUISITION_DEPTHS.includes(depth)) {
      throw new InvalidArgumentError(`Depth must be 1, 2 or 3, got ${depth}`);
    }
    assertOptions(options);

    this.transition(identifier, 'REQUESTED');
    this.transition(identifier, 'ACQUIRING');
    const live = await this.tryLive(identifier, depth, options.timeoutMs ?? this.liveTimeoutMs);

    return this.locks.runExclusive(identifier, this.lockWaitMs, async () => {
      const now = this.clock.now();
      const records = await this.buildRecords(identifier, depth, options, live, now);
      this.transition(identifier, records.source === 'LIVE' ? 'ACQUIRED_LIVE' : 'ACQUIRED_SYNTHETIC');

      const page = await this.store.upsertPage(
        {
          ...records.facts,
          identifier,
          lastSource: records.source,
          lastDepth: depth,
          lastAcquiredAt: now,
        },
        records.posts,
        records.people,
      );
      this.transition(identifier, 'PERSISTED');

      await this.settleAnalytics(identifier, depth);

      return {
        page,
        source: records.source,
        depth,
        tier: classifyTier(page.followersCount).tier,
        postsCount: records.posts.length,
        followersCount: records.people.filter((person) => person.role === 'FOLLOWER').length,
        employeesCount: records.people.filter((person) => person.role === 'EMPLOYEE').length,
      };
    });
  }

  /** Acquires several pages with bounded concurrency; one failure does not stop the rest. */
  async acquireMany(requests: AcquisitionRequest[]): Promise<BatchAcquisitionOutcome[]> {
    const limit = pLimit(BATCH_CONCURRENCY);
    const settled = await Promise.allSettled(
      requests.map((request) =>
        limit(() => this.acquire(request.identifier, request.depth, request.options)),
      ),
    );

    return settled.map((outcome, index): BatchAcquisitionOutcome => {
      const { identifier } = requests[index];
      if (outcome.status === 'fulfilled') {
        return { identifier, status: 'fulfilled', result: outcome.value };
      }
      const error: unknown = outcome.reason;
      return {
        identifier,
        status: 'rejected',
        error: {
          kind: error instanceof InsightsError ? error.kind : 'Internal',
          message: describeError(error),
        },
      };
    });
  }

  private async tryLive(
    identifier: string,
    depth: AcquisitionDepth,
    timeoutMs: number,
  ): Promise<LivePageSnapshot | null> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new AcquisitionTimeoutError(identifier, timeoutMs));
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        this.liveProvider.fetch(identifier, { depth, signal: controller.signal }),
        deadline,
      ]);
    } catch (error) {
      if (error instanceof NotFoundError && !this.allowSyntheticForUnknown) {
        this.transition(identifier, 'FAILED');
        throw error;
      }
      this.logger.warn(
        `Live acquisition of '${identifier}' failed, using synthesis: ${describeError(error)}`,
      );
      return null;
    } finally {
      clearTimeout(timer);
    }
  }

  private async buildRecords(
    identifier: string,
    depth: AcquisitionDepth,
    options: AcquisitionOptions,
    live: LivePageSnapshot | null,
    now: Date,
  ): Promise<RecordSet> {
    let fallback: PageFacts;
    try {
      const stored = await this.store.getPage(identifier);
      fallback = resolveSyntheticFacts(
        defaultPageFacts(identifier, this.baseUrl, this.pools),
        stored,
        options.hints,
      );
    } catch (error) {
      throw this.failed(identifier, error);
    }

    if (live) {
      try {
        return this.fromLive(identifier, depth, options, live, fallback, now);
      } catch (error) {
        this.logger.warn(
          `Live data for '${identifier}' could not be used, using synthesis: ${describeError(error)}`,
        );
      }
    }

    try {
      return {
        source: 'SYNTHETIC',
        facts: fallback,
        posts: depth >= 2 ? this.synthesizePosts(identifier, fallback, options, now) : [],
        people: depth === 3 ? this.synthesizePeople(fallback, options) : [],
      };
    } catch (error) {
      throw this.failed(identifier, error);
    }
  }

  private failed(identifier: string, error: unknown): InsightsError {
    this.transition(identifier, 'FAILED');
    if (error instanceof InsightsError && error.kind === 'StorageFailure') {
      return error;
    }
    return new AcquisitionFailedError(
      `Could not acquire '${identifier}': live retrieval and synthesis both failed`,
      { cause: error },
    );
  }

  private fromLive(
    identifier: string,
    depth: AcquisitionDepth,
    options: AcquisitionOptions,
    live: LivePageSnapshot,
    fallback: PageFacts,
    now: Date,
  ): RecordSet {
    const facts = completeLiveFacts(live.facts, fallback);
    classifyTier(facts.followersCount);

    let posts: PostWrite[] = [];
    if (depth >= 2) {
      posts =
        live.posts.length > 0
          ? this.liveToPosts(live.posts, facts.followersCount, now)
          : this.synthesizePosts(identifier, facts, options, now);
    }

    return {
      source: 'LIVE',
      facts,
      posts,
      people: depth === 3 ? this.synthesizePeople(facts, options) : [],
    };
  }

  private liveToPosts(livePosts: LivePost[], followers: number, now: Date): PostWrite[] {
    const seen = new Set<string>();
    return livePosts
      .filter((post) => {
        if (seen.has(post.postId)) {
          return false;
        }
        seen.add(post.postId);
        return true;
      })
      .map((post) => ({
        postId: post.postId,
        content: post.content,
        imageUrl: post.imageUrl,
        likesCount: post.likesCount,
        commentsCount: post.commentsCount,
        sharesCount: post.sharesCount,
        viewsCount: post.viewsCount,
        engagementRate: calculateEngagementRate(
          post.likesCount,
          post.commentsCount,
          post.sharesCount,
          followers,
        ),
        postedAt: post.postedAt ?? now,
        comments: [],
      }));
  }

  private synthesizePosts(
    identifier: string,
    facts: PageFacts,
    options: AcquisitionOptions,
    now: Date,
  ): PostWrite[] {
    const count = options.postsCount ?? DEFAULT_POSTS_COUNT;
    const { ranges } = classifyTier(facts.followersCount);
    const bodies = this.generator.generatePostBodies(facts, count);
    const timestamps = this.synthesizer.postingTimestamps(count, now);

    return bodies.map((content, index) => {
      const postId = `${identifier}-post-${index + 1}`;
      const counts = this.synthesizer.synthesize(ranges, facts.followersCount);
      return {
        postId,
        content,
        imageUrl: null,
        likesCount: counts.likes,
        commentsCount: counts.comments,
        sharesCount: counts.shares,
        viewsCount: counts.views,
        engagementRate: counts.engagementRate,
        postedAt: timestamps[index],
        comments: this.generator.generateComments(
          postId,
          options.commentsPerPost ?? 0,
          timestamps[index],
          now,
        ),
      };
    });
  }

  private synthesizePeople(facts: PageFacts, options: AcquisitionOptions): PersonProfileWrite[] {
    return [
      ...this.generator.generatePeople(
        facts,
        'FOLLOWER',
        options.followersCount ?? DEFAULT_FOLLOWERS_COUNT,
      ),
      ...this.generator.generatePeople(
        facts,
        'EMPLOYEE',
        options.employeesCount ?? defaultEmployeeSampleSize(facts.employeesCount),
      ),
    ];
  }

  // The records are committed by now; a cache problem must not fail the acquisition.
  private async settleAnalytics(identifier: string, depth: AcquisitionDepth): Promise<void> {
    try {
      await this.analytics.invalidate(identifier);
      if (depth === 3) {
        await this.analytics.refresh(identifier);
      }
    } catch (error) {
      this.logger.warn(`Analytics for '${identifier}' were not refreshed: ${describeError(error)}`);
    }
  }

  private transition(identifier: string, state: AcquisitionState): void {
    const message = `Acquisition '${identifier}' -> ${state}`;
    if (state === 'FAILED') {
      this.logger.warn(message);
    } else {
      this.logger.log(message);
    }
  }
}
