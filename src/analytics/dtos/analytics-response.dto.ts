import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { PostResponseDto } from '../../pages/dto/response/page-response.dto';
import { Tier } from '../../acquisition/tier/tier-classifier';
import { AnalyticsSnapshot, FollowerTrendPoint } from '../analytics-aggregator';

export class FollowerTrendPointDto implements FollowerTrendPoint {
  @ApiProperty({ example: '2026-01-01T00:00:00.000Z' }) date!: string;
  @ApiProperty() followers!: number;
}

/** Also the shape analytics are cached in; the Type hints revive dates on read. */
export class AnalyticsResponseDto implements AnalyticsSnapshot {
  @ApiProperty() pageIdentifier!: string;

  @ApiProperty({ description: 'Acquisition time of the page the analytics were computed from' })
  @Type(() => Date)
  pageAcquiredAt!: Date;

  @ApiProperty({ enum: ['SMALL', 'MEDIUM', 'LARGE'] }) tier!: Tier;
  @ApiProperty() followersCount!: number;
  @ApiProperty() totalPosts!: number;

  @ApiProperty({ description: 'Mean of the post engagement rates, 0 without posts' })
  averageEngagementRate!: number;

  @ApiProperty({ type: PostResponseDto, nullable: true })
  @Type(() => PostResponseDto)
  mostEngagedPost!: PostResponseDto | null;

  @ApiProperty() totalLikes!: number;
  @ApiProperty() totalComments!: number;
  @ApiProperty() totalShares!: number;
  @ApiProperty() totalViews!: number;
  @ApiProperty() totalEngagement!: number;
  @ApiProperty() averageLikes!: number;
  @ApiProperty() averageComments!: number;
  @ApiProperty() averageShares!: number;

  @ApiProperty({ type: [FollowerTrendPointDto] })
  @Type(() => FollowerTrendPointDto)
  followerTrend!: FollowerTrendPointDto[];

  @ApiProperty()
  @Type(() => Date)
  computedAt!: Date;

  @ApiProperty({ type: String, nullable: true }) summary!: string | null;

  @ApiProperty({ type: Date, nullable: true })
  @Type(() => Date)
  summaryGeneratedAt!: Date | null;
}
