import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Max,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { AcquisitionOptions, IDENTIFIER_PATTERN } from '../../../acquisition/acquisition.types';
import { PageHints } from '../../../acquisition/synthesis/default-page-facts';
import { MAX_STORED_COUNT } from '../../../common/utility/number.utils';
import { ACQUISITION_DEPTHS, AcquisitionDepth } from '../../interfaces/page.interface';

export class PageHintsDto implements PageHints {
  @ApiPropertyOptional({ example: 'Acme Corporation' })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  name?: string;

  @ApiPropertyOptional({ example: 'Manufacturing' })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  industry?: string;

  @ApiPropertyOptional({ example: 500000, description: 'Drives the engagement tier' })
  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(MAX_STORED_COUNT)
  followers?: number;

  @ApiPropertyOptional({ example: 1200 })
  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(MAX_STORED_COUNT)
  employees?: number;

  @ApiPropertyOptional({ example: 'Denver, CO' })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  headquarters?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  description?: string;
}

export class AcquisitionOptionsDto implements AcquisitionOptions {
  @ApiPropertyOptional({ example: 10000, description: 'Live retrieval timeout in milliseconds' })
  @IsOptional()
  @IsInt()
  @Min(100)
  @Max(300000)
  timeoutMs?: number;

  @ApiPropertyOptional({ default: 15 })
  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(100)
  postsCount?: number;

  @ApiPropertyOptional({ default: 25 })
  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(500)
  followersCount?: number;

  @ApiPropertyOptional({ description: 'Defaults to one per hundred employees, between 5 and 20' })
  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(500)
  employeesCount?: number;

  @ApiPropertyOptional({ default: 0 })
  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(50)
  commentsPerPost?: number;

  @ApiPropertyOptional({ type: PageHintsDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => PageHintsDto)
  hints?: PageHintsDto;
}

export class AcquirePageDto {
  @ApiProperty({ example: 'acme', description: 'Public page identifier' })
  @IsString()
  @IsNotEmpty()
  @Matches(IDENTIFIER_PATTERN, {
    message: "identifier may only contain letters, digits, '.', '_' or '-' (max 100)",
  })
  identifier!: string;

  @ApiPropertyOptional({
    enum: [...ACQUISITION_DEPTHS],
    default: 2,
    description: '1 = page, 2 = page and posts, 3 = page, posts, people and analytics',
  })
  @IsOptional()
  @IsIn([...ACQUISITION_DEPTHS])
  depth: AcquisitionDepth = 2;

  @ApiPropertyOptional({ type: AcquisitionOptionsDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => AcquisitionOptionsDto)
  options?: AcquisitionOptionsDto;
}
