import { Inject, Injectable } from '@nestjs/common';
import { PaginatedResult, Pagination, paginate } from '../../common/dtos/pagination.dto';
import { CLOCK, Clock } from '../../common/utility/clock';
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
import { PageListFilter, PageStore, PostSort } from './page-store.interface';

interface StoredPost {
  post: PostRecord;
  comments: CommentRecord[];
}

interface StoredPage {
  page: PageRecord;
  posts: StoredPost[];
  people: PersonProfileRecord[];
  history: FollowerSample[];
}

type Comparator<T> = (a: T, b: T) => number;

const byPostedAtDesc: Comparator<PostRecord> = (a, b) =>
  b.postedAt.getTime() - a.postedAt.getTime() || a.postId.localeCompare(b.postId);

const POST_COMPARATORS: Record<PostSort, Comparator<PostRecord>> = {
  recent: byPostedAtDesc,
  popular: (a, b) => b.likesCount - a.likesCount || byPostedAtDesc(a, b),
  engagement: (a, b) => b.engagementRate - a.engagementRate || byPostedAtDesc(a, b),
};

function slice<T>(items: T[], { page, limit }: Pagination): T[] {
  const start = (page - 1) * limit;
  return items.slice(start, start + limit);
}

function containsIgnoreCase(value: string | null, needle: string): boolean {
  return value !== null && value.toLowerCase().includes(needle.toLowerCase());
}

/** Process-local PageStore for development runs and tests. */
@Injectable()
export class InMemoryPageStore implements PageStore {
  private readonly pages = new Map<string, StoredPage>();

  constructor(@Inject(CLOCK) private readonly clock: Clock) {}

  async upsertPage(page: PageWrite, posts: PostWrite[], people: PersonProfileWrite[]): Promise<PageRecord> {
    const now = this.clock.now();
    const existing = this.pages.get(page.identifier);

    const record: PageRecord = {
      ...page,
      specialties: [...page.specialties],
      createdAt: existing?.page.createdAt ?? now,
      updatedAt: now,
    };

    this.pages.set(page.identifier, {
      page: record,
      posts: posts.map(({ comments, ...post }) => ({
        post: { ...post, pageIdentifier: page.identifier },
        comments: comments.map((comment) => ({ ...comment })),
      })),
      people: people.map((person) => ({ ...person, pageIdentifier: page.identifier })),
      history: [
        ...(existing?.history ?? []),
        { recordedAt: page.lastAcquiredAt, followers: page.followersCount },
      ],
    });

    return { ...record };
  }

  async getPage(identifier: string): Promise<PageRecord | null> {
    const stored = this.pages.get(identifier);
    return stored ? { ...stored.page } : null;
  }

  async getPostsFor(identifier: string): Promise<PostRecord[]> {
    const posts = this.pages.get(identifier)?.posts ?? [];
    return posts.map(({ post }) => ({ ...post })).sort(byPostedAtDesc);
  }

  async getFollowerHistory(identifier: string): Promise<FollowerSample[]> {
    const history = this.pages.get(identifier)?.history ?? [];
    // Stable sort keeps append order for equal timestamps.
    return history
      .map((sample) => ({ ...sample }))
      .sort((a, b) => a.recordedAt.getTime() - b.recordedAt.getTime());
  }

  async listPages(filter: PageListFilter, pagination: Pagination): Promise<PaginatedResult<PageRecord>> {
    const matches = [...this.pages.values()]
      .map(({ page }) => page)
      .filter((page) => filter.minFollowers === undefined || page.followersCount >= filter.minFollowers)
      .filter((page) => filter.maxFollowers === undefined || page.followersCount <= filter.maxFollowers)
      .filter((page) => !filter.industry || containsIgnoreCase(page.industry, filter.industry))
      .filter((page) => !filter.name || containsIgnoreCase(page.name, filter.name))
      .sort((a, b) => b.followersCount - a.followersCount || a.identifier.localeCompare(b.identifier));

    return paginate(
      slice(matches, pagination).map((page) => ({ ...page })),
      matches.length,
      pagination,
    );
  }

  async listPosts(
    identifier: string,
    sort: PostSort,
    pagination: Pagination,
  ): Promise<PaginatedResult<PostRecord>> {
    const posts = (this.pages.get(identifier)?.posts ?? [])
      .map(({ post }) => ({ ...post }))
      .sort(POST_COMPARATORS[sort]);
    return paginate(slice(posts, pagination), posts.length, pagination);
  }

  async listPeople(
    identifier: string,
    role: PersonRole,
    pagination: Pagination,
  ): Promise<PaginatedResult<PersonProfileRecord>> {
    const people = (this.pages.get(identifier)?.people ?? [])
      .filter((person) => person.role === role)
      .map((person) => ({ ...person }))
      .sort((a, b) => a.name.localeCompare(b.name) || a.profileId.localeCompare(b.profileId));
    return paginate(slice(people, pagination), people.length, pagination);
  }

  async listComments(
    identifier: string,
    postId: string,
    pagination: Pagination,
  ): Promise<PaginatedResult<CommentRecord> | null> {
    const stored = this.pages.get(identifier)?.posts.find(({ post }) => post.postId === postId);
    if (!stored) {
      return null;
    }
    const comments = stored.comments
      .map((comment) => ({ ...comment }))
      .sort(
        (a, b) =>
          b.createdAt.getTime() - a.createdAt.getTime() || a.commentId.localeCompare(b.commentId),
      );
    return paginate(slice(comments, pagination), comments.length, pagination);
  }

  async findStalePages(acquiredBefore: Date, limit: number): Promise<string[]> {
    return [...this.pages.values()]
      .map(({ page }) => page)
      .filter((page) => page.lastAcquiredAt.getTime() < acquiredBefore.getTime())
      .sort((a, b) => a.lastAcquiredAt.getTime() - b.lastAcquiredAt.getTime())
      .slice(0, limit)
      .map((page) => page.identifier);
  }
}
