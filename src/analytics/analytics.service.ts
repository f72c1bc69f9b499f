import { Inject, Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { ConfigService } from '@nestjs/config';
import { InsightSummaryService } from '../ai/service/insight-summary.service';
import { CACHE_STORE, CacheStore } from '../cache/cache-store.interface';
import { PageNotFoundError, describeError } from '../common/errors/insights.errors';
import { CLOCK, Clock } from '../common/utility/clock';
import { PageRecord } from '../pages/interfaces/page.interface';
import { PAGE_STORE, PageStore } from '../pages/storage/page-store.interface';
import { AnalyticsSnapshot, aggregateAnalytics } from './analytics-aggregator';
import { AnalyticsResponseDto } from './dtos/analytics-response.dto';

export interface AnalyticsQuery {
  withSummary?: boolean;
}

export function analyticsCacheKey(identifier: string): string {
  return `analytics:${identifier}`;
}

@Injectable()
export class AnalyticsService {
  private readonly logger = new Logger(AnalyticsService.name);
  private readonly ttlSeconds: number;

  constructor(
    @Inject(PAGE_STORE) private readonly store: PageStore,
    @Inject(CACHE_STORE) private readonly cache: CacheStore,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly summaries: InsightSummaryService,
    config: ConfigService,
  ) {
    this.ttlSeconds = config.get<number>('CACHE_TTL_SECONDS', 300);
  }

  async getAnalytics(
    identifier: string,
    { withSummary = false }: AnalyticsQuery = {},
  ): Promise<AnalyticsSnapshot> {
    const page = await this.store.getPage(identifier);
    if (!page) {
      throw new PageNotFoundError(identifier);
    }

    const snapshot = (await this.readCached(page)) ?? (await this.compute(page));
    if (!withSummary || snapshot.summary !== null) {
      return snapshot;
    }

    const posts = await this.store.getPostsFor(identifier);
    const summary = await this.summaries.summarize(page, snapshot, posts);
    if (summary === null) {
      return snapshot;
    }

    const summarized: AnalyticsSnapshot = {
      ...snapshot,
      summary,
      summaryGeneratedAt: this.clock.now(),
    };
    await this.write(summarized);
    return summarized;
  }

  /** Recomputes from storage and replaces the cached entry. */
  async refresh(identifier: string): Promise<AnalyticsSnapshot> {
    const page = await this.store.getPage(identifier);
    if (!page) {
      throw new PageNotFoundError(identifier);
    }
    return this.compute(page);
  }

  async invalidate(identifier: string): Promise<void> {
    await this.cache.delete(analyticsCacheKey(identifier));
  }

  private async compute(page: PageRecord): Promise<AnalyticsSnapshot> {
    const [posts, history] = await Promise.all([
      this.store.getPostsFor(page.identifier),
      this.store.getFollowerHistory(page.identifier),
    ]);
    const snapshot = aggregateAnalytics(page, posts, history, this.clock.now());
    await this.write(snapshot);
    return snapshot;
  }

  private async write(snapshot: AnalyticsSnapshot): Promise<void> {
    await this.cache.set(
      analyticsCacheKey(snapshot.pageIdentifier),
      JSON.stringify(snapshot),
      this.ttlSeconds,
    );
  }

  /**
   * A computation that overlapped a re-acquisition may have cached figures
   * for the previous record set; such entries no longer match the page.
   */
  private async readCached(page: PageRecord): Promise<AnalyticsSnapshot | null> {
    const { identifier } = page;
    const raw = await this.cache.get(analyticsCacheKey(identifier));
    if (raw === null) {
      return null;
    }
    let cached: AnalyticsResponseDto;
    try {
      const plain: unknown = JSON.parse(raw);
      cached = plainToInstance(AnalyticsResponseDto, plain);
    } catch (error) {
      this.logger.warn(
        `Discarding unreadable analytics cache for '${identifier}': ${describeError(error)}`,
      );
      await this.invalidate(identifier);
      return null;
    }

    if (
      !(cached.pageAcquiredAt instanceof Date) ||
      cached.pageAcquiredAt.getTime() !== page.lastAcquiredAt.getTime()
    ) {
      this.logger.debug(`Cached analytics for '${identifier}' predate the stored page, recomputing`);
      return null;
    }
    return cached;
  }
}
