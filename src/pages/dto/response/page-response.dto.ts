import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  AcquisitionDepth,
  AcquisitionSource,
  CommentRecord,
  PageRecord,
  PersonProfileRecord,
  PersonRole,
  PostRecord,
} from '../../interfaces/page.interface';

export class PageResponseDto implements PageRecord {
  @ApiProperty({ example: 'acme' }) identifier!: string;
  @ApiProperty({ example: 'Acme' }) name!: string;
  @ApiProperty({ example: 'https://www.linkedin.com/company/acme' }) url!: string;
  @ApiProperty({ type: String, nullable: true }) description!: string | null;
  @ApiProperty({ type: String, nullable: true, example: 'Technology' }) industry!: string | null;
  @ApiProperty({ type: String, nullable: true }) headquarters!: string | null;
  @ApiProperty({ type: String, nullable: true }) website!: string | null;
  @ApiProperty({ type: String, nullable: true, example: '51-200 employees' }) companySize!: string | null;
  @ApiProperty({ type: Number, nullable: true }) foundedYear!: number | null;
  @ApiProperty({ type: [String] }) specialties!: string[];
  @ApiProperty({ type: String, nullable: true }) profilePictureUrl!: string | null;
  @ApiProperty({ example: 500000 }) followersCount!: number;
  @ApiProperty({ example: 250 }) employeesCount!: number;
  @ApiProperty({ enum: ['LIVE', 'SYNTHETIC'] }) lastSource!: AcquisitionSource;
  @ApiProperty({ enum: [1, 2, 3] }) lastDepth!: AcquisitionDepth;

  @ApiProperty()
  @Type(() => Date)
  lastAcquiredAt!: Date;

  @ApiProperty()
  @Type(() => Date)
  createdAt!: Date;

  @ApiProperty()
  @Type(() => Date)
  updatedAt!: Date;
}

export class PostResponseDto implements PostRecord {
  @ApiProperty({ example: 'acme' }) pageIdentifier!: string;
  @ApiProperty({ example: 'acme-post-1' }) postId!: string;
  @ApiProperty() content!: string;
  @ApiProperty({ type: String, nullable: true }) imageUrl!: string | null;
  @ApiProperty() likesCount!: number;
  @ApiProperty() commentsCount!: number;
  @ApiProperty() sharesCount!: number;
  @ApiProperty() viewsCount!: number;
  @ApiProperty({ description: 'Percentage of followers that interacted, two decimals' })
  engagementRate!: number;

  @ApiProperty()
  @Type(() => Date)
  postedAt!: Date;
}

export class CommentResponseDto implements CommentRecord {
  @ApiProperty() commentId!: string;
  @ApiProperty() authorName!: string;
  @ApiProperty() content!: string;
  @ApiProperty() likesCount!: number;

  @ApiProperty()
  @Type(() => Date)
  createdAt!: Date;
}

export class PersonProfileResponseDto implements PersonProfileRecord {
  @ApiProperty() pageIdentifier!: string;
  @ApiProperty({ example: 'follower-1' }) profileId!: string;
  @ApiProperty({ enum: ['FOLLOWER', 'EMPLOYEE'] }) role!: PersonRole;
  @ApiProperty() name!: string;
  @ApiProperty({ type: String, nullable: true }) username!: string | null;
  @ApiProperty({ type: String, nullable: true }) headline!: string | null;
  @ApiProperty({ type: String, nullable: true }) location!: string | null;
  @ApiProperty() connectionsCount!: number;
  @ApiProperty() followersCount!: number;
  @ApiProperty({ type: String, nullable: true }) currentPosition!: string | null;
  @ApiProperty({ type: String, nullable: true }) currentCompany!: string | null;
}

export class PageDetailResponseDto extends PageResponseDto {
  @ApiPropertyOptional({ type: [PostResponseDto] }) posts?: PostResponseDto[];
  @ApiPropertyOptional({ type: [PersonProfileResponseDto] }) followers?: PersonProfileResponseDto[];
  @ApiPropertyOptional({ type: [PersonProfileResponseDto] }) employees?: PersonProfileResponseDto[];
}

export class AcquisitionResultDto {
  @ApiProperty({ type: PageResponseDto }) page!: PageResponseDto;
  @ApiProperty({ enum: ['LIVE', 'SYNTHETIC'] }) source!: AcquisitionSource;
  @ApiProperty({ enum: [1, 2, 3] }) depth!: AcquisitionDepth;
  @ApiProperty({ enum: ['SMALL', 'MEDIUM', 'LARGE'] }) tier!: string;
  @ApiProperty() postsCount!: number;
  @ApiProperty() followersCount!: number;
  @ApiProperty() employeesCount!: number;
}

export class BatchAcquisitionItemDto {
  @ApiProperty() identifier!: string;
  @ApiProperty({ enum: ['fulfilled', 'rejected'] }) status!: 'fulfilled' | 'rejected';
  @ApiPropertyOptional({ type: AcquisitionResultDto }) result?: AcquisitionResultDto;
  @ApiPropertyOptional({ example: { kind: 'InvalidArgument', message: 'Invalid identifier' } })
  error?: { kind: string; message: string };
}
