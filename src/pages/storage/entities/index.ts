import { CommentEntity } from './comment.entity';
import { FollowerSampleEntity } from './follower-sample.entity';
import { PageEntity } from './page.entity';
import { PersonProfileEntity } from './person-profile.entity';
import { PostEntity } from './post.entity';

export { CommentEntity, FollowerSampleEntity, PageEntity, PersonProfileEntity, PostEntity };

export const PAGE_ENTITIES = [
  PageEntity,
  PostEntity,
  CommentEntity,
  PersonProfileEntity,
  FollowerSampleEntity,
];
