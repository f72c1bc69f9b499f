import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post, Query } from '@nestjs/common';
import {
  ApiBadGatewayResponse,
  ApiBadRequestResponse,
  ApiConflictResponse,
  ApiNotFoundResponse,
  ApiOperation,
  ApiParam,
  ApiTags,
} from '@nestjs/swagger';
import { AcquisitionService } from '../acquisition/acquisition.service';
import { AcquisitionResult, BatchAcquisitionOutcome } from '../acquisition/acquisition.types';
import {
  ApiPaginatedResponse,
  ApiStandardResponse,
} from '../common/decorators/api-standard-response.decorator';
import { ApiErrorResponseDto } from '../common/dtos/api-response.dto';
import { PaginatedResult, PaginationQueryDto } from '../common/dtos/pagination.dto';
import { AcquireBatchDto } from './dto/request/acquire-batch.dto';
import { AcquirePageDto } from './dto/request/acquire-page.dto';
import { ListPagesDto } from './dto/request/list-pages.dto';
import { ListPostsDto } from './dto/request/list-posts.dto';
import { PageDetailQueryDto } from './dto/request/page-detail-query.dto';
import {
  AcquisitionResultDto,
  BatchAcquisitionItemDto,
  CommentResponseDto,
  PageDetailResponseDto,
  PageResponseDto,
  PersonProfileResponseDto,
  PostResponseDto,
} from './dto/response/page-response.dto';
import {
  CommentRecord,
  PageRecord,
  PersonProfileRecord,
  PostRecord,
} from './interfaces/page.interface';
import { PageDetail, PagesService } from './pages.service';

@ApiTags('Pages')
@Controller('pages')
export class PagesController {
  constructor(
    private readonly pagesService: PagesService,
    private readonly acquisitionService: AcquisitionService,
  ) {}

  @Post('acquire')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Acquire a page',
    description:
      'Tries the live source first and falls back to synthetic data. Replaces any posts and people stored for the identifier.',
  })
  @ApiStandardResponse(AcquisitionResultDto)
  @ApiBadRequestResponse({ type: ApiErrorResponseDto })
  @ApiConflictResponse({ type: ApiErrorResponseDto, description: 'Same page is being acquired' })
  @ApiBadGatewayResponse({ type: ApiErrorResponseDto, description: 'Live and synthetic paths failed' })
  acquire(@Body() dto: AcquirePageDto): Promise<AcquisitionResult> {
    return this.acquisitionService.acquire(dto.identifier, dto.depth, dto.options);
  }

  @Post('acquire/batch')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Acquire several pages',
    description: 'Each page succeeds or fails on its own; the response lists every outcome.',
  })
  @ApiStandardResponse(BatchAcquisitionItemDto)
  acquireBatch(@Body() dto: AcquireBatchDto): Promise<BatchAcquisitionOutcome[]> {
    return this.acquisitionService.acquireMany(
      dto.pages.map((page) => ({
        identifier: page.identifier,
        depth: page.depth,
        options: page.options,
      })),
    );
  }

  @Get()
  @ApiOperation({ summary: 'List acquired pages' })
  @ApiPaginatedResponse(PageResponseDto)
  listPages(@Query() query: ListPagesDto): Promise<PaginatedResult<PageRecord>> {
    return this.pagesService.listPages(query);
  }

  @Get(':identifier')
  @ApiOperation({ summary: 'Page details' })
  @ApiParam({ name: 'identifier', example: 'acme' })
  @ApiStandardResponse(PageDetailResponseDto)
  @ApiNotFoundResponse({ type: ApiErrorResponseDto })
  getPage(
    @Param('identifier') identifier: string,
    @Query() query: PageDetailQueryDto,
  ): Promise<PageDetail> {
    return this.pagesService.getPage(identifier, query);
  }

  @Get(':identifier/posts')
  @ApiOperation({ summary: 'Posts of a page' })
  @ApiParam({ name: 'identifier', example: 'acme' })
  @ApiPaginatedResponse(PostResponseDto)
  @ApiNotFoundResponse({ type: ApiErrorResponseDto })
  listPosts(
    @Param('identifier') identifier: string,
    @Query() query: ListPostsDto,
  ): Promise<PaginatedResult<PostRecord>> {
    return this.pagesService.listPosts(identifier, query.sortBy, {
      page: query.page,
      limit: query.limit,
    });
  }

  @Get(':identifier/posts/:postId/comments')
  @ApiOperation({ summary: 'Comments on a post' })
  @ApiParam({ name: 'identifier', example: 'acme' })
  @ApiParam({ name: 'postId', example: 'acme-post-1' })
  @ApiPaginatedResponse(CommentResponseDto)
  @ApiNotFoundResponse({ type: ApiErrorResponseDto })
  listComments(
    @Param('identifier') identifier: string,
    @Param('postId') postId: string,
    @Query() query: PaginationQueryDto,
  ): Promise<PaginatedResult<CommentRecord>> {
    return this.pagesService.listComments(identifier, postId, query);
  }

  @Get(':identifier/followers')
  @ApiOperation({ summary: 'Sampled followers of a page' })
  @ApiParam({ name: 'identifier', example: 'acme' })
  @ApiPaginatedResponse(PersonProfileResponseDto)
  @ApiNotFoundResponse({ type: ApiErrorResponseDto })
  listFollowers(
    @Param('identifier') identifier: string,
    @Query() query: PaginationQueryDto,
  ): Promise<PaginatedResult<PersonProfileRecord>> {
    return this.pagesService.listPeople(identifier, 'FOLLOWER', query);
  }

  @Get(':identifier/employees')
  @ApiOperation({ summary: 'Sampled employees of a page' })
  @ApiParam({ name: 'identifier', example: 'acme' })
  @ApiPaginatedResponse(PersonProfileResponseDto)
  @ApiNotFoundResponse({ type: ApiErrorResponseDto })
  listEmployees(
    @Param('identifier') identifier: string,
    @Query() query: PaginationQueryDto,
  ): Promise<PaginatedResult<PersonProfileRecord>> {
    return this.pagesService.listPeople(identifier, 'EMPLOYEE', query);
  }
}
