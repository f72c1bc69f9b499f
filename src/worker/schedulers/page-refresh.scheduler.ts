import { InjectQueue } from '@nestjs/bullmq';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { Queue } from 'bullmq';
import { format, subHours } from 'date-fns';
import { CLOCK, Clock } from '../../common/utility/clock';
import { PAGE_STORE, PageStore } from '../../pages/storage/page-store.interface';
import { PAGE_REFRESH_QUEUE, REFRESH_PAGE_JOB, RefreshPageJobData } from '../queue.constants';

export const REFRESH_BATCH_SIZE = 50;

// Moves stale pages from the database to the refresh queue; the worker does the acquiring.
@Injectable()
export class PageRefreshScheduler {
  private readonly logger = new Logger(PageRefreshScheduler.name);
  private readonly staleAfterHours: number;

  constructor(
    @Inject(PAGE_STORE) private readonly store: PageStore,
    @Inject(CLOCK) private readonly clock: Clock,
    @InjectQueue(PAGE_REFRESH_QUEUE) private readonly refreshQueue: Queue<RefreshPageJobData>,
    config: ConfigService,
  ) {
    this.staleAfterHours = config.get<number>('REFRESH_STALE_AFTER_HOURS', 24);
  }

  @Cron(CronExpression.EVERY_HOUR)
  async enqueueStalePages(): Promise<number> {
    const now = this.clock.now();
    const identifiers = await this.store.findStalePages(
      subHours(now, this.staleAfterHours),
      REFRESH_BATCH_SIZE,
    );
    if (identifiers.length === 0) return 0;

    this.logger.log(`Found ${identifiers.length} pages due for refresh.`);

    // Job ids dedupe a page within the hour.
    const hour = format(now, 'yyyyMMddHH');
    await this.refreshQueue.addBulk(
      identifiers.map((identifier) => ({
        name: REFRESH_PAGE_JOB,
        data: { identifier },
        opts: {
          jobId: `refresh-${identifier}-${hour}`,
          attempts: 3,
          backoff: { type: 'exponential', delay: 5000 },
          removeOnComplete: true,
          removeOnFail: 100,
        },
      })),
    );
    return identifiers.length;
  }
}
