import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
  Unique,
} from 'typeorm';
import { CommentEntity } from './comment.entity';
import { PageEntity } from './page.entity';

@Entity({ name: 'posts' })
@Unique(['pageIdentifier', 'postId'])
export class PostEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ name: 'page_identifier', type: 'varchar', length: 100 })
  pageIdentifier!: string;

  @ManyToOne(() => PageEntity, (page) => page.posts, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'page_identifier' })
  page?: PageEntity;

  @Column({ name: 'post_id', type: 'varchar', length: 100 })
  postId!: string;

  @Column({ type: 'text' })
  content!: string;

  @Column({ name: 'image_url', type: 'varchar', length: 1000, nullable: true })
  imageUrl!: string | null;

  @Column({ name: 'likes_count', type: 'int', default: 0 })
  likesCount!: number;

  @Column({ name: 'comments_count', type: 'int', default: 0 })
  commentsCount!: number;

  @Column({ name: 'shares_count', type: 'int', default: 0 })
  sharesCount!: number;

  @Column({ name: 'views_count', type: 'int', default: 0 })
  viewsCount!: number;

  @Column({ name: 'engagement_rate', type: 'double precision', default: 0 })
  engagementRate!: number;

  @Index()
  @Column({ name: 'posted_at', type: 'timestamptz' })
  postedAt!: Date;

  @OneToMany(() => CommentEntity, (comment) => comment.post, { cascade: ['insert'] })
  comments?: CommentEntity[];
}
