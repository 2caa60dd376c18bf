import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Unique } from 'typeorm';
import { Commit } from './commit.entity';

/**
 * Output of one agent kind for one commit. At most one row per (commit, agent_kind):
 * a retry overwrites a failed row, a successful row is final.
 */
@Entity('analysis_results')
@Unique(['commit_id', 'agent_kind'])
export class AnalysisResult {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  commit_id!: string;

  @ManyToOne(() => Commit, (commit) => commit.analyses, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'commit_id' })
  commit!: Commit;

  @Column({ length: 50 })
  agent_kind!: string;

  @Column({ length: 20 })
  status!: string;

  @Column('text', { nullable: true })
  analysis!: string | null;

  @Column('text', { nullable: true })
  error!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  model!: string | null;

  /** Event whose processing wrote this row. */
  @Column({ type: 'uuid', nullable: true })
  event_id!: string | null;

  @Column({ type: 'timestamptz', default: () => 'CURRENT_TIMESTAMP' })
  analyzed_at!: Date;
}
