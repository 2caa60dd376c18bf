import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';

/**
 * Event queue: one unit of ingestion work (a webhook delivery or a poll-discovered commit).
 * Workers claim via FOR UPDATE SKIP LOCKED; claimed_by/heartbeat_at support dead-worker reclaim.
 * Rows are never deleted and double as the audit trail.
 */
@Entity('ingest_events')
@Index(['state', 'next_attempt_at'])
@Index(['heartbeat_at'])
@Index(['delivery_id'], { unique: true })
export class IngestEvent {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 20 })
  source!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  delivery_id!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  event_type!: string | null;

  /** Body exactly as received, so signature checks and normalization see the same bytes. */
  @Column('text')
  raw_payload!: string;

  @Column({ length: 30, default: 'PENDING' })
  state!: string;

  @Column({ default: 0 })
  attempt_count!: number;

  @Column({ default: 3 })
  max_attempts!: number;

  @Column({ type: 'timestamptz', default: () => 'CURRENT_TIMESTAMP' })
  next_attempt_at!: Date;

  @Column({ type: 'varchar', length: 100, nullable: true })
  claimed_by!: string | null;

  @Column({ type: 'timestamptz', nullable: true })
  claimed_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  heartbeat_at!: Date | null;

  @Column('text', { nullable: true })
  last_error!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  received_at!: Date;

  @Column({ type: 'timestamptz', nullable: true })
  processed_at!: Date | null;
}
