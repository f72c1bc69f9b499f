import { BullModule } from '@nestjs/bullmq';
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { CacheModule } from './cache/cache.module';
import { CommonModule } from './common/common.module';
import { validateEnvironment } from './common/config/env.validation';
import { StorageModule } from './pages/storage/storage.module';
import { bullRootOptions } from './worker/bull.config';
import { WorkerModule } from './worker/worker.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    CommonModule,
    StorageModule.forRoot(),
    CacheModule.forRoot(),
    ScheduleModule.forRoot(),
    BullModule.forRootAsync({ useFactory: bullRootOptions }),
    WorkerModule,
  ],
})
export class WorkerAppModule {}
