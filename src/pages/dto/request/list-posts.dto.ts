import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsIn, IsOptional } from 'class-validator';
import { PaginationQueryDto } from '../../../common/dtos/pagination.dto';
import { PostSort } from '../../storage/page-store.interface';

export const POST_SORTS: readonly PostSort[] = ['recent', 'popular', 'engagement'];

export class ListPostsDto extends PaginationQueryDto {
  @ApiPropertyOptional({ enum: [...POST_SORTS], default: 'recent' })
  @IsOptional()
  @IsIn([...POST_SORTS])
  sortBy: PostSort = 'recent';
}
