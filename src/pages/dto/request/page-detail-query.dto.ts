import { ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsBoolean, IsOptional } from 'class-validator';

const toFlag = ({ value }: { value: unknown }) => value === true || value === 'true' || value === '1';

export class PageDetailQueryDto {
  @ApiPropertyOptional({ default: false, description: 'Embed the 10 most recent posts' })
  @IsOptional()
  @Transform(toFlag)
  @IsBoolean()
  includePosts: boolean = false;

  @ApiPropertyOptional({ default: false, description: 'Embed the first 10 followers' })
  @IsOptional()
  @Transform(toFlag)
  @IsBoolean()
  includeFollowers: boolean = false;

  @ApiPropertyOptional({ default: false, description: 'Embed the first 10 employees' })
  @IsOptional()
  @Transform(toFlag)
  @IsBoolean()
  includeEmployees: boolean = false;
}
