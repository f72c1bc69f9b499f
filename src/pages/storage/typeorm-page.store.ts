import { Injectable, Logger } from '@nestjs/common';
import { DataSource, LessThan } from 'typeorm';
import { PaginatedResult, Pagination, paginate } from '../../common/dtos/pagination.dto';
import { InsightsError, StorageFailureError, describeError } from '../../common/errors/insights.errors';
import { hashIdentifier } from '../../common/utility/number.utils';
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
import {
  CommentEntity,
  FollowerSampleEntity,
  PageEntity,
  PersonProfileEntity,
  PostEntity,
} from './entities';
import { PageListFilter, PageStore, PostSort } from './page-store.interface';
import {
  toCommentRecord,
  toFollowerSample,
  toPageRecord,
  toPersonProfileRecord,
  toPostRecord,
} from './page-record.mapper';

const POST_ORDER: Record<PostSort, Record<string, 'ASC' | 'DESC'>> = {
  recent: { 'post.postedAt': 'DESC', 'post.postId': 'ASC' },
  popular: { 'post.likesCount': 'DESC', 'post.postedAt': 'DESC', 'post.postId': 'ASC' },
  engagement: { 'post.engagementRate': 'DESC', 'post.postedAt': 'DESC', 'post.postId': 'ASC' },
};

function likePattern(value: string): string {
  return `%${value.replace(/[\\%_]/g, (char) => `\\${char}`)}%`;
}

@Injectable()
export class TypeOrmPageStore implements PageStore {
  private readonly logger = new Logger(TypeOrmPageStore.name);

  constructor(private readonly dataSource: DataSource) {}

  upsertPage(page: PageWrite, posts: PostWrite[], people: PersonProfileWrite[]): Promise<PageRecord> {
    return this.run(`upsert page '${page.identifier}'`, () =>
      this.dataSource.transaction(async (manager) => {
        // Writers of the same page queue here until the holder commits, whichever process they run in.
        await manager.query('SELECT pg_advisory_xact_lock($1)', [hashIdentifier(page.identifier)]);

        const pages = manager.getRepository(PageEntity);
        await pages.save(pages.create(page));

        // Comments go with their posts through ON DELETE CASCADE.
        await manager.delete(PostEntity, { pageIdentifier: page.identifier });
        await manager.delete(PersonProfileEntity, { pageIdentifier: page.identifier });

        const postRepository = manager.getRepository(PostEntity);
        const commentRepository = manager.getRepository(CommentEntity);
        for (const { comments, ...post } of posts) {
          const saved = await postRepository.save(
            postRepository.create({ ...post, pageIdentifier: page.identifier }),
          );
          if (comments.length > 0) {
            await commentRepository.insert(
              comments.map((comment) => ({ ...comment, postRef: saved.id })),
            );
          }
        }

        if (people.length > 0) {
          await manager
            .getRepository(PersonProfileEntity)
            .insert(people.map((person) => ({ ...person, pageIdentifier: page.identifier })));
        }

        await manager.getRepository(FollowerSampleEntity).insert({
          pageIdentifier: page.identifier,
          followers: page.followersCount,
          recordedAt: page.lastAcquiredAt,
        });

        return toPageRecord(await pages.findOneByOrFail({ identifier: page.identifier }));
      }),
    );
  }

  getPage(identifier: string): Promise<PageRecord | null> {
    return this.run(`read page '${identifier}'`, async () => {
      const entity = await this.dataSource.getRepository(PageEntity).findOneBy({ identifier });
      return entity ? toPageRecord(entity) : null;
    });
  }

  getPostsFor(identifier: string): Promise<PostRecord[]> {
    return this.run(`read posts of '${identifier}'`, async () => {
      const posts = await this.dataSource.getRepository(PostEntity).find({
        where: { pageIdentifier: identifier },
        order: { postedAt: 'DESC', postId: 'ASC' },
      });
      return posts.map(toPostRecord);
    });
  }

  getFollowerHistory(identifier: string): Promise<FollowerSample[]> {
    return this.run(`read follower history of '${identifier}'`, async () => {
      const samples = await this.dataSource.getRepository(FollowerSampleEntity).find({
        where: { pageIdentifier: identifier },
        order: { recordedAt: 'ASC', id: 'ASC' },
      });
      return samples.map(toFollowerSample);
    });
  }

  listPages(filter: PageListFilter, pagination: Pagination): Promise<PaginatedResult<PageRecord>> {
    return this.run('list pages', async () => {
      const query = this.dataSource.getRepository(PageEntity).createQueryBuilder('page');

      if (filter.minFollowers !== undefined) {
        query.andWhere('page.followersCount >= :minFollowers', { minFollowers: filter.minFollowers });
      }
      if (filter.maxFollowers !== undefined) {
        query.andWhere('page.followersCount <= :maxFollowers', { maxFollowers: filter.maxFollowers });
      }
      if (filter.industry) {
        query.andWhere('page.industry ILIKE :industry', { industry: likePattern(filter.industry) });
      }
      if (filter.name) {
        query.andWhere('page.name ILIKE :name', { name: likePattern(filter.name) });
      }

      const [entities, total] = await query
        .orderBy('page.followersCount', 'DESC')
        .addOrderBy('page.identifier', 'ASC')
        .skip((pagination.page - 1) * pagination.limit)
        .take(pagination.limit)
        .getManyAndCount();

      return paginate(entities.map(toPageRecord), total, pagination);
    });
  }

  listPosts(identifier: string, sort: PostSort, pagination: Pagination): Promise<PaginatedResult<PostRecord>> {
    return this.run(`list posts of '${identifier}'`, async () => {
      const [entities, total] = await this.dataSource
        .getRepository(PostEntity)
        .createQueryBuilder('post')
        .where('post.pageIdentifier = :identifier', { identifier })
        .orderBy(POST_ORDER[sort])
        .skip((pagination.page - 1) * pagination.limit)
        .take(pagination.limit)
        .getManyAndCount();

      return paginate(entities.map(toPostRecord), total, pagination);
    });
  }

  listPeople(
    identifier: string,
    role: PersonRole,
    pagination: Pagination,
  ): Promise<PaginatedResult<PersonProfileRecord>> {
    return this.run(`list ${role.toLowerCase()}s of '${identifier}'`, async () => {
      const [entities, total] = await this.dataSource.getRepository(PersonProfileEntity).findAndCount({
        where: { pageIdentifier: identifier, role },
        order: { name: 'ASC', profileId: 'ASC' },
        skip: (pagination.page - 1) * pagination.limit,
        take: pagination.limit,
      });
      return paginate(entities.map(toPersonProfileRecord), total, pagination);
    });
  }

  listComments(
    identifier: string,
    postId: string,
    pagination: Pagination,
  ): Promise<PaginatedResult<CommentRecord> | null> {
    return this.run(`list comments of '${identifier}/${postId}'`, async () => {
      const post = await this.dataSource
        .getRepository(PostEntity)
        .findOneBy({ pageIdentifier: identifier, postId });
      if (!post) {
        return null;
      }

      const [entities, total] = await this.dataSource.getRepository(CommentEntity).findAndCount({
        where: { postRef: post.id },
        order: { createdAt: 'DESC', commentId: 'ASC' },
        skip: (pagination.page - 1) * pagination.limit,
        take: pagination.limit,
      });
      return paginate(entities.map(toCommentRecord), total, pagination);
    });
  }

  findStalePages(acquiredBefore: Date, limit: number): Promise<string[]> {
    return this.run('find stale pages', async () => {
      const pages = await this.dataSource.getRepository(PageEntity).find({
        select: { identifier: true },
        where: { lastAcquiredAt: LessThan(acquiredBefore) },
        order: { lastAcquiredAt: 'ASC' },
        take: limit,
      });
      return pages.map((page) => page.identifier);
    });
  }

  private async run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (error instanceof InsightsError) {
        throw error;
      }
      this.logger.error(
        `Failed to ${operation}: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new StorageFailureError(`Storage failed to ${operation}`, { cause: error });
    }
  }
}
