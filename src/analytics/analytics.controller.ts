import { Controller, Get, Param, Query } from '@nestjs/common';
import { ApiNotFoundResponse, ApiOperation, ApiParam, ApiTags } from '@nestjs/swagger';
import { ApiStandardResponse } from '../common/decorators/api-standard-response.decorator';
import { ApiErrorResponseDto } from '../common/dtos/api-response.dto';
import { AnalyticsSnapshot } from './analytics-aggregator';
import { AnalyticsService } from './analytics.service';
import { AnalyticsResponseDto } from './dtos/analytics-response.dto';
import { GetAnalyticsDto } from './dtos/get-analytics.dto';

@ApiTags('Analytics')
@Controller('pages')
export class AnalyticsController {
  constructor(private readonly analyticsService: AnalyticsService) {}

  @Get(':identifier/analytics')
  @ApiOperation({
    summary: 'Engagement analytics for an acquired page',
    description:
      'Average engagement, most engaged post and follower trend, recomputed from stored posts or served from cache.',
  })
  @ApiParam({ name: 'identifier', example: 'acme' })
  @ApiStandardResponse(AnalyticsResponseDto)
  @ApiNotFoundResponse({ type: ApiErrorResponseDto, description: 'Page was never acquired' })
  getAnalytics(
    @Param('identifier') identifier: string,
    @Query() query: GetAnalyticsDto,
  ): Promise<AnalyticsSnapshot> {
    return this.analyticsService.getAnalytics(identifier, { withSummary: query.withSummary });
  }
}
