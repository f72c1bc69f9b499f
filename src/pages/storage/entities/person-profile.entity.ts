import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn, Unique } from 'typeorm';
import { PersonRole } from '../../interfaces/page.interface';
import { PageEntity } from './page.entity';

@Entity({ name: 'person_profiles' })
@Unique(['pageIdentifier', 'role', 'profileId'])
@Index(['pageIdentifier', 'role'])
export class PersonProfileEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'page_identifier', type: 'varchar', length: 100 })
  pageIdentifier!: string;

  @ManyToOne(() => PageEntity, (page) => page.people, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'page_identifier' })
  page?: PageEntity;

  @Column({ name: 'profile_id', type: 'varchar', length: 100 })
  profileId!: string;

  @Column({ type: 'varchar', length: 20 })
  role!: PersonRole;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  username!: string | null;

  @Column({ type: 'varchar', length: 500, nullable: true })
  headline!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  location!: string | null;

  @Column({ name: 'connections_count', type: 'int', default: 0 })
  connectionsCount!: number;

  @Column({ name: 'followers_count', type: 'int', default: 0 })
  followersCount!: number;

  @Column({ name: 'current_position', type: 'varchar', length: 255, nullable: true })
  currentPosition!: string | null;

  @Column({ name: 'current_company', type: 'varchar', length: 255, nullable: true })
  currentCompany!: string | null;
}
