import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, IsString, Matches, MaxLength, Min } from 'class-validator';
import { PaginationQueryDto } from '../../../common/dtos/pagination.dto';

export class ListPagesDto extends PaginationQueryDto {
  @ApiPropertyOptional({ example: 1000 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  minFollowers?: number;

  @ApiPropertyOptional({ example: 1000000 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  maxFollowers?: number;

  @ApiPropertyOptional({
    example: '1k-10k',
    description: 'Shorthand for minFollowers/maxFollowers, e.g. "1k-10k" or "1m-5m"',
  })
  @IsOptional()
  @IsString()
  @Matches(/^\s*\d+(\.\d+)?\s*[kmb]?\s*-\s*\d+(\.\d+)?\s*[kmb]?\s*$/i, {
    message: 'followerRange must look like "1k-10k"',
  })
  followerRange?: string;

  @ApiPropertyOptional({ example: 'Technology', description: 'Case-insensitive substring match' })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  industry?: string;

  @ApiPropertyOptional({ example: 'acme', description: 'Case-insensitive substring match' })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  name?: string;
}
