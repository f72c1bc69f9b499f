import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { PageEntity } from './page.entity';

/** One row per acquisition; feeds the follower trend. */
@Entity({ name: 'follower_samples' })
@Index(['pageIdentifier', 'recordedAt'])
export class FollowerSampleEntity {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column({ name: 'page_identifier', type: 'varchar', length: 100 })
  pageIdentifier!: string;

  @ManyToOne(() => PageEntity, (page) => page.followerSamples, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'page_identifier' })
  page?: PageEntity;

  @Column({ type: 'int' })
  followers!: number;

  @Column({ name: 'recorded_at', type: 'timestamptz' })
  recordedAt!: Date;
}
