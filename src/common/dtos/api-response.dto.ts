import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class PaginationMetaDto {
  @ApiProperty() page: number = 1;
  @ApiProperty() limit: number = 20;
  @ApiProperty() total: number = 0;
  @ApiProperty() totalPages: number = 0;
}

export class ApiResponseDto {
  @ApiProperty({ example: true })
  success: boolean = true;

  @ApiPropertyOptional({ type: PaginationMetaDto })
  meta?: PaginationMetaDto;

  @ApiProperty({ example: '2026-01-01T00:00:00.000Z' })
  timestamp: string = '';
}

export class ApiErrorDetailDto {
  @ApiProperty({ example: 'NotFound' }) kind: string = '';
  @ApiProperty({ example: "Page 'acme' has not been acquired" }) message: string = '';
}

export class ApiErrorResponseDto {
  @ApiProperty({ example: false }) success: boolean = false;
  @ApiProperty({ type: ApiErrorDetailDto }) error: ApiErrorDetailDto = new ApiErrorDetailDto();
  @ApiProperty() path: string = '';
  @ApiProperty() timestamp: string = '';
}
