import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  OneToMany,
  PrimaryColumn,
  UpdateDateColumn,
} from 'typeorm';
import { AcquisitionDepth, AcquisitionSource } from '../../interfaces/page.interface';
import { FollowerSampleEntity } from './follower-sample.entity';
import { PersonProfileEntity } from './person-profile.entity';
import { PostEntity } from './post.entity';

@Entity({ name: 'pages' })
export class PageEntity {
  @PrimaryColumn({ type: 'varchar', length: 100 })
  identifier!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'varchar', length: 500 })
  url!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Index()
  @Column({ type: 'varchar', length: 255, nullable: true })
  industry!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  headquarters!: string | null;

  @Column({ type: 'varchar', length: 500, nullable: true })
  website!: string | null;

  @Column({ name: 'company_size', type: 'varchar', length: 100, nullable: true })
  companySize!: string | null;

  @Column({ name: 'founded_year', type: 'int', nullable: true })
  foundedYear!: number | null;

  @Column({ type: 'jsonb', default: () => "'[]'" })
  specialties!: string[];

  @Column({ name: 'profile_picture_url', type: 'varchar', length: 1000, nullable: true })
  profilePictureUrl!: string | null;

  @Index()
  @Column({ name: 'followers_count', type: 'int', default: 0 })
  followersCount!: number;

  @Column({ name: 'employees_count', type: 'int', default: 0 })
  employeesCount!: number;

  @Column({ name: 'last_source', type: 'varchar', length: 20 })
  lastSource!: AcquisitionSource;

  @Column({ name: 'last_depth', type: 'smallint' })
  lastDepth!: AcquisitionDepth;

  @Index()
  @Column({ name: 'last_acquired_at', type: 'timestamptz' })
  lastAcquiredAt!: Date;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;

  @OneToMany(() => PostEntity, (post) => post.page)
  posts?: PostEntity[];

  @OneToMany(() => PersonProfileEntity, (person) => person.page)
  people?: PersonProfileEntity[];

  @OneToMany(() => FollowerSampleEntity, (sample) => sample.page)
  followerSamples?: FollowerSampleEntity[];
}
