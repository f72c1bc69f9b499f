import { Inject, Injectable } from '@nestjs/common';
import { PaginatedResult, Pagination } from '../common/dtos/pagination.dto';
import {
  InvalidArgumentError,
  NotFoundError,
  PageNotFoundError,
} from '../common/errors/insights.errors';
import { parseFollowerRange } from '../common/utility/number.utils';
import { ListPagesDto } from './dto/request/list-pages.dto';
import { PageDetailQueryDto } from './dto/request/page-detail-query.dto';
import {
  CommentRecord,
  PageRecord,
  PersonProfileRecord,
  PersonRole,
  PostRecord,
} from './interfaces/page.interface';
import { PAGE_STORE, PageListFilter, PageStore, PostSort } from './storage/page-store.interface';

export const EMBEDDED_LIST_LIMIT = 10;

export interface PageDetail extends PageRecord {
  posts?: PostRecord[];
  followers?: PersonProfileRecord[];
  employees?: PersonProfileRecord[];
}

@Injectable()
export class PagesService {
  constructor(@Inject(PAGE_STORE) private readonly store: PageStore) {}

  listPages(query: ListPagesDto): Promise<PaginatedResult<PageRecord>> {
    const filter: PageListFilter = {
      minFollowers: query.minFollowers,
      maxFollowers: query.maxFollowers,
      industry: query.industry,
      name: query.name,
    };

    if (query.followerRange !== undefined) {
      const range = parseFollowerRange(query.followerRange);
      if (!range) {
        throw new InvalidArgumentError(`Invalid follower range '${query.followerRange}'`);
      }
      filter.minFollowers = range.min;
      filter.maxFollowers = range.max;
    }

    if (
      filter.minFollowers !== undefined &&
      filter.maxFollowers !== undefined &&
      filter.minFollowers > filter.maxFollowers
    ) {
      throw new InvalidArgumentError('minFollowers cannot be greater than maxFollowers');
    }

    return this.store.listPages(filter, { page: query.page, limit: query.limit });
  }

  async getPage(identifier: string, query: PageDetailQueryDto): Promise<PageDetail> {
    const page = await this.requirePage(identifier);
    const embedded: Pagination = { page: 1, limit: EMBEDDED_LIST_LIMIT };
    const detail: PageDetail = { ...page };

    if (query.includePosts) {
      detail.posts = (await this.store.listPosts(identifier, 'recent', embedded)).data;
    }
    if (query.includeFollowers) {
      detail.followers = (await this.store.listPeople(identifier, 'FOLLOWER', embedded)).data;
    }
    if (query.includeEmployees) {
      detail.employees = (await this.store.listPeople(identifier, 'EMPLOYEE', embedded)).data;
    }
    return detail;
  }

  async listPosts(
    identifier: string,
    sort: PostSort,
    pagination: Pagination,
  ): Promise<PaginatedResult<PostRecord>> {
    await this.requirePage(identifier);
    return this.store.listPosts(identifier, sort, pagination);
  }

  async listComments(
    identifier: string,
    postId: string,
    pagination: Pagination,
  ): Promise<PaginatedResult<CommentRecord>> {
    await this.requirePage(identifier);
    const comments = await this.store.listComments(identifier, postId, pagination);
    if (!comments) {
      throw new NotFoundError(`Post '${postId}' not found on page '${identifier}'`);
    }
    return comments;
  }

  async listPeople(
    identifier: string,
    role: PersonRole,
    pagination: Pagination,
  ): Promise<PaginatedResult<PersonProfileRecord>> {
    await this.requirePage(identifier);
    return this.store.listPeople(identifier, role, pagination);
  }

  private async requirePage(identifier: string): Promise<PageRecord> {
    const page = await this.store.getPage(identifier);
    if (!page) {
      throw new PageNotFoundError(identifier);
    }
    return page;
  }
}
