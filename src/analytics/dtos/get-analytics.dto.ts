import { ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsBoolean, IsOptional } from 'class-validator';

export class GetAnalyticsDto {
  @ApiPropertyOptional({
    description: 'Add a generated narrative summary when text generation is configured',
    default: false,
  })
  @IsOptional()
  @Transform(({ value }) => value === true || value === 'true' || value === '1')
  @IsBoolean()
  withSummary: boolean = false;
}
