import { Inject, Injectable } from '@nestjs/common';
import { addMilliseconds } from 'date-fns';
import { InvalidArgumentError } from '../../common/errors/insights.errors';
import { formatCompactNumber } from '../../common/utility/number.utils';
import { RANDOM_SOURCE, RandomSource, pickOne, randomInt } from '../../common/utility/random';
import {
  CommentRecord,
  PageFacts,
  PersonProfileWrite,
  PersonRole,
} from '../../pages/interfaces/page.interface';
import { CONTENT_POOLS_TOKEN, ContentPools } from './content-pools';

export const DEFAULT_POSTS_COUNT = 15;
export const DEFAULT_FOLLOWERS_COUNT = 25;

/** Employee sample scales with company size: one per hundred, between 5 and 20. */
export function defaultEmployeeSampleSize(employeesCount: number): number {
  return Math.min(Math.max(Math.floor(employeesCount / 100), 5), 20);
}

function assertCount(label: string, count: number): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidArgumentError(`${label} must be a non-negative integer, got ${count}`);
  }
}

function slugify(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]+/g, '_').replace(/^_|_$/g, '');
}

@Injectable()
export class SyntheticContentGenerator {
  constructor(
    @Inject(RANDOM_SOURCE) private readonly random: RandomSource,
    @Inject(CONTENT_POOLS_TOKEN) private readonly pools: ContentPools,
  ) {}

  get templateCount(): number {
    return this.pools.postTemplates.length;
  }

  /** Same template index and facts always give the same text. */
  renderPost(
    templateIndex: number,
    facts: Pick<PageFacts, 'name' | 'industry' | 'headquarters' | 'followersCount'>,
  ): string {
    const template = this.pools.postTemplates[templateIndex];
    if (template === undefined) {
      throw new InvalidArgumentError(`No post template at index ${templateIndex}`);
    }
    const tokens: Record<string, string> = {
      name: facts.name,
      industry: facts.industry ?? 'technology',
      headquarters: facts.headquarters ?? 'multiple locations',
      followers: formatCompactNumber(facts.followersCount),
    };
    return template.replace(/\{(\w+)\}/g, (match, token: string) => tokens[token] ?? match);
  }

  generatePostBodies(facts: PageFacts, count: number): string[] {
    assertCount('Post count', count);
    return Array.from({ length: count }, () =>
      this.renderPost(randomInt(this.random, 0, this.templateCount - 1), facts),
    );
  }

  generatePeople(facts: PageFacts, role: PersonRole, count: number): PersonProfileWrite[] {
    assertCount(`${role === 'FOLLOWER' ? 'Follower' : 'Employee'} count`, count);
    return Array.from({ length: count }, (_, index) =>
      role === 'FOLLOWER' ? this.follower(index) : this.employee(facts, index),
    );
  }

  /** Comments spread between the post's publication and `now`. */
  generateComments(postId: string, count: number, postedAt: Date, now: Date): CommentRecord[] {
    assertCount('Comment count', count);
    const window = Math.max(now.getTime() - postedAt.getTime(), 0);
    return Array.from({ length: count }, (_, index) => ({
      commentId: `${postId}-c${index + 1}`,
      authorName: pickOne(this.random, this.pools.followerNames),
      content: pickOne(this.random, this.pools.commentTemplates),
      likesCount: randomInt(this.random, 0, 50),
      createdAt: addMilliseconds(postedAt, randomInt(this.random, 0, window)),
    }));
  }

  private follower(index: number): PersonProfileWrite {
    const name = pickOne(this.random, this.pools.followerNames);
    const position = pickOne(this.random, this.pools.positions);
    const company = pickOne(this.random, this.pools.companies);
    return {
      profileId: `follower-${index + 1}`,
      role: 'FOLLOWER',
      name,
      username: `${slugify(name)}_${index + 1}`,
      headline: `${position} at ${company}`,
      location: pickOne(this.random, this.pools.locations),
      connectionsCount: randomInt(this.random, 100, 2000),
      followersCount: randomInt(this.random, 0, 5000),
      currentPosition: position,
      currentCompany: company,
    };
  }

  private employee(facts: PageFacts, index: number): PersonProfileWrite {
    const name = pickOne(this.random, this.pools.employeeNames);
    const position = pickOne(this.random, this.pools.positions);
    return {
      profileId: `employee-${index + 1}`,
      role: 'EMPLOYEE',
      name,
      username: `${slugify(name)}_${index + 1}`,
      headline: `${position} at ${facts.name}`,
      location: facts.headquarters ?? pickOne(this.random, this.pools.locations),
      connectionsCount: randomInt(this.random, 200, 5000),
      followersCount: randomInt(this.random, 50, 10000),
      currentPosition: position,
      currentCompany: facts.name,
    };
  }
}
