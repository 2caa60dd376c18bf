import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  OneToMany,
  Unique,
} from 'typeorm';
import { SourceRepository } from './source-repository.entity';
import { AnalysisResult } from './analysis-result.entity';
import type { ChangedFile } from '../../store/entity-store';

/**
 * One source-control change. (commit_hash, repository_id) is unique; the changed file list
 * lives on the row so a commit and its files are written in a single statement.
 */
@Entity('commits')
@Unique(['commit_hash', 'repository_id'])
export class Commit {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  repository_id!: string;

  @ManyToOne(() => SourceRepository, (repo) => repo.commits)
  @JoinColumn({ name: 'repository_id' })
  repository!: SourceRepository;

  @Column({ length: 64 })
  commit_hash!: string;

  @Column({ length: 255 })
  author!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  author_email!: string | null;

  @Column('text')
  message!: string;

  @Column({ type: 'timestamptz' })
  committed_at!: Date;

  @Column({ type: 'varchar', length: 255, nullable: true })
  branch!: string | null;

  @Column('jsonb', { default: () => "'[]'" })
  changed_files!: ChangedFile[];

  @Column('jsonb', { default: () => "'{}'" })
  metadata!: Record<string, unknown>;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @OneToMany(() => AnalysisResult, (result) => result.commit)
  analyses!: AnalysisResult[];
}
