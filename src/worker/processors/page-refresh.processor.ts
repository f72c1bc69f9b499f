import { OnWorkerEvent, Processor, WorkerHost } from '@nestjs/bullmq';
import { Inject, Logger } from '@nestjs/common';
import { Job } from 'bullmq';
import { AcquisitionService } from '../../acquisition/acquisition.service';
import { PAGE_STORE, PageStore } from '../../pages/storage/page-store.interface';
import {
  PAGE_REFRESH_QUEUE,
  REFRESH_PAGE_JOB,
  RefreshPageJob,
  RefreshPageJobData,
} from '../queue.constants';

@Processor(PAGE_REFRESH_QUEUE)
export class PageRefreshProcessor extends WorkerHost {
  private readonly logger = new Logger(PageRefreshProcessor.name);

  constructor(
    private readonly acquisitionService: AcquisitionService,
    @Inject(PAGE_STORE) private readonly store: PageStore,
  ) {
    super();
  }

  async process(job: RefreshPageJob): Promise<void> {
    switch (job.name) {
      case REFRESH_PAGE_JOB:
        await this.refreshPage(job.data.identifier);
        break;
      default:
        this.logger.warn(`Unknown job name: ${job.name}`);
    }
  }

  @OnWorkerEvent('failed')
  onFailed(job: Job<RefreshPageJobData>, error: Error): void {
    this.logger.error(
      `Refresh failed [page: ${job.data.identifier}, attempt ${job.attemptsMade}]: ${error.message}`,
      error.stack,
    );
  }

  @OnWorkerEvent('completed')
  onCompleted(job: Job<RefreshPageJobData>): void {
    this.logger.debug(`Refresh completed [page: ${job.data.identifier}]`);
  }

  /** Re-acquires at the depth the page was last acquired with. */
  private async refreshPage(identifier: string): Promise<void> {
    const page = await this.store.getPage(identifier);
    if (!page) {
      this.logger.warn(`Skipping refresh of '${identifier}': page no longer exists`);
      return;
    }

    const result = await this.acquisitionService.acquire(identifier, page.lastDepth);
    this.logger.log(
      `Refreshed '${identifier}' from ${result.source} source: ${result.page.followersCount} followers`,
    );
  }
}
