import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
  Unique,
} from 'typeorm';
import { Commit } from './commit.entity';

/**
 * Source repository, identified by (owner, name). Created on first sighting of one of its
 * commits or seeded from TRACKED_REPOSITORIES; never deleted by the pipeline.
 */
@Entity('repositories')
@Unique(['owner', 'name'])
export class SourceRepository {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 255 })
  owner!: string;

  @Column({ length: 255 })
  name!: string;

  @Column('text', { nullable: true })
  description!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  language!: string | null;

  @Column({ type: 'varchar', length: 20, nullable: true })
  visibility!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  default_branch!: string | null;

  /** Tracked repositories are visited by the reconciliation poller. */
  @Column({ default: true })
  tracked!: boolean;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;

  @OneToMany(() => Commit, (commit) => commit.repository)
  commits!: Commit[];
}
