import { BullModule } from '@nestjs/bullmq';
import { Module } from '@nestjs/common';
import { AcquisitionModule } from '../acquisition/acquisition.module';
import { PageRefreshProcessor } from './processors/page-refresh.processor';
import { PAGE_REFRESH_QUEUE } from './queue.constants';
import { PageRefreshScheduler } from './schedulers/page-refresh.scheduler';

@Module({
  imports: [BullModule.registerQueue({ name: PAGE_REFRESH_QUEUE }), AcquisitionModule],
  providers: [PageRefreshProcessor, PageRefreshScheduler],
  exports: [BullModule],
})
export class WorkerModule {}
