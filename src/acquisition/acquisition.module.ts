import { HttpModule } from '@nestjs/axios';
import { Module } from '@nestjs/common';
import { AnalyticsModule } from '../analytics/analytics.module';
import { AcquisitionService } from './acquisition.service';
import { HttpLivePageProvider } from './live/http-live-page.provider';
import { LIVE_PAGE_PROVIDER } from './live/live-page-provider.interface';
import { SyntheticContentGenerator } from './synthesis/content-generator';
import { CONTENT_POOLS, CONTENT_POOLS_TOKEN } from './synthesis/content-pools';
import { EngagementSynthesizer } from './synthesis/engagement-synthesizer';

@Module({
  imports: [HttpModule, AnalyticsModule],
  providers: [
    AcquisitionService,
    SyntheticContentGenerator,
    EngagementSynthesizer,
    HttpLivePageProvider,
    { provide: LIVE_PAGE_PROVIDER, useExisting: HttpLivePageProvider },
    { provide: CONTENT_POOLS_TOKEN, useValue: CONTENT_POOLS },
  ],
  exports: [AcquisitionService],
})
export class AcquisitionModule {}
