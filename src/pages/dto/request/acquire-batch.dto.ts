import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { ArrayMaxSize, ArrayMinSize, IsArray, ValidateNested } from 'class-validator';
import { AcquirePageDto } from './acquire-page.dto';

export class AcquireBatchDto {
  @ApiProperty({ type: [AcquirePageDto] })
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(50)
  @ValidateNested({ each: true })
  @Type(() => AcquirePageDto)
  pages!: AcquirePageDto[];
}
