import { PaginatedResult, Pagination } from '../../common/dtos/pagination.dto';
import {
  CommentRecord,
  FollowerSample,
  PageRecord,
  PageWrite,
  PersonProfileRecord,
  PersonProfileWrite,
  PersonRole,
  PostRecord,
  PostWrite,
} from '../interfaces/page.interface';

export type PostSort = 'recent' | 'popular' | 'engagement';

export interface PageListFilter {
  minFollowers?: number;
  maxFollowers?: number;
  industry?: string;
  name?: string;
}

/**
 * Storage collaborator for acquired pages. Each method is one transaction;
 * failures surface as StorageFailureError.
 */
export interface PageStore {
  /**
   * Creates or updates the page keyed by `page.identifier`, replaces all of its
   * posts (with their comments) and people, and appends one follower sample.
   */
  upsertPage(page: PageWrite, posts: PostWrite[], people: PersonProfileWrite[]): Promise<PageRecord>;

  getPage(identifier: string): Promise<PageRecord | null>;

  /** Most recent first. */
  getPostsFor(identifier: string): Promise<PostRecord[]>;

  /** Oldest first. */
  getFollowerHistory(identifier: string): Promise<FollowerSample[]>;

  listPages(filter: PageListFilter, pagination: Pagination): Promise<PaginatedResult<PageRecord>>;

  listPosts(identifier: string, sort: PostSort, pagination: Pagination): Promise<PaginatedResult<PostRecord>>;

  listPeople(
    identifier: string,
    role: PersonRole,
    pagination: Pagination,
  ): Promise<PaginatedResult<PersonProfileRecord>>;

  /** Null when the post does not exist on that page. */
  listComments(
    identifier: string,
    postId: string,
    pagination: Pagination,
  ): Promise<PaginatedResult<CommentRecord> | null>;

  /** Identifiers whose last acquisition happened before `acquiredBefore`, oldest first. */
  findStalePages(acquiredBefore: Date, limit: number): Promise<string[]>;
}

export const PAGE_STORE = 'PAGE_STORE';
