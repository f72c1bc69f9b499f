import { Module } from '@nestjs/common';
import { TEXT_GENERATION_PROVIDER } from './interfaces/ai-provider.interface';
import { GeminiProvider } from './providers/gemini.provider';
import { InsightSummaryService } from './service/insight-summary.service';

@Module({
  providers: [
    GeminiProvider,
    { provide: TEXT_GENERATION_PROVIDER, useExisting: GeminiProvider },
    InsightSummaryService,
  ],
  exports: [InsightSummaryService],
})
export class AiModule {}
