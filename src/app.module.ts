import { BullModule } from '@nestjs/bullmq';
import { DynamicModule, Module, Type } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { AcquisitionModule } from './acquisition/acquisition.module';
import { AiModule } from './ai/ai.module';
import { AnalyticsModule } from './analytics/analytics.module';
import { AppController } from './app.controller';
import { CacheModule } from './cache/cache.module';
import { CommonModule } from './common/common.module';
import { readFlag, validateEnvironment } from './common/config/env.validation';
import { PagesModule } from './pages/pages.module';
import { StorageModule } from './pages/storage/storage.module';
import { bullRootOptions } from './worker/bull.config';
import { WorkerModule } from './worker/worker.module';

/** Background refresh needs Redis; REFRESH_ENABLED=false runs the API without it. */
function refreshModules(): Array<DynamicModule | Type<unknown>> {
  if (!readFlag('REFRESH_ENABLED', true)) {
    return [];
  }
  return [
    ScheduleModule.forRoot(),
    BullModule.forRootAsync({ useFactory: bullRootOptions }),
    WorkerModule,
  ];
}

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    CommonModule,
    StorageModule.forRoot(),
    CacheModule.forRoot(),
    AiModule,
    AnalyticsModule,
    AcquisitionModule,
    PagesModule,
    ...refreshModules(),
  ],
  controllers: [AppController],
})
export class AppModule {}
