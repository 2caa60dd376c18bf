import type { AgentKind } from '../analysis/analysis-engine';

export type EventSource = 'webhook' | 'poll';

export const EVENT_STATES = [
  'PENDING',
  'IN_PROGRESS',
  'DONE',
  'FAILED_TRANSIENT',
  'FAILED_PERMANENT',
] as const;
export type EventState = (typeof EVENT_STATES)[number];

export const TERMINAL_STATES: readonly EventState[] = ['DONE', 'FAILED_PERMANENT'];
export const OPEN_STATES: readonly EventState[] = ['PENDING', 'IN_PROGRESS', 'FAILED_TRANSIENT'];

export type ChangeKind = 'added' | 'modified' | 'deleted' | 'renamed';

export interface ChangedFile {
  path: string;
  change: ChangeKind;
}

export type Visibility = 'public' | 'private';

/** Descriptive repository fields. Absent or null values never clear a stored one. */
export interface RepositoryAttrs {
  description?: string | null;
  language?: string | null;
  visibility?: Visibility | null;
  default_branch?: string | null;
  tracked?: boolean;
}

export interface CommitAttrs {
  author: string;
  author_email: string | null;
  message: string;
  committed_at: Date;
  branch: string | null;
  /** Ordered as the source reported them. */
  changed_files: ChangedFile[];
  metadata: Record<string, unknown>;
}

export interface TrackedRepository {
  id: string;
  owner: string;
  name: string;
}

export interface NewEventInput {
  source: EventSource;
  /** Notifier-provided idempotency key (delivery id), or a synthesized one for polls. */
  delivery_id: string | null;
  event_type: string | null;
  raw_payload: string;
  max_attempts: number;
}

/** One ingest_events row as the pipeline sees it. */
export interface IngestEventRecord {
  id: string;
  source: EventSource;
  delivery_id: string | null;
  event_type: string | null;
  raw_payload: string;
  state: EventState;
  attempt_count: number;
  max_attempts: number;
  next_attempt_at: Date;
  claimed_by: string | null;
  heartbeat_at: Date | null;
  last_error: string | null;
  received_at: Date;
  processed_at: Date | null;
}

export type AnalysisOutcome =
  | { status: 'ok'; analysis: string; model: string | null }
  | { status: 'failed'; error: string };

export interface AnalysisResultRecord {
  commit_id: string;
  agent_kind: AgentKind;
  status: 'ok' | 'failed';
  analysis: string | null;
  error: string | null;
  model: string | null;
  event_id: string | null;
  analyzed_at: Date;
}

export interface ReclaimReport {
  /** Stale claims put back to PENDING. */
  requeued: number;
  /** Stale claims whose attempt budget was already spent; moved to FAILED_PERMANENT. */
  abandoned: number;
}

export type EventStateCounts = Record<EventState, number>;

/**
 * Durable persistence for repositories, commits, analysis results and the event queue.
 *
 * Every method is individually atomic. The event claim (claimNextEvent) is the only
 * point of mutual exclusion; everything else is an idempotent upsert.
 * Implementations raise StoreUnavailableError when the backing store cannot be reached.
 */
export abstract class EntityStore {
  abstract upsertRepository(owner: string, name: string, attrs: RepositoryAttrs): Promise<string>;

  /**
   * Insert the commit unless `(hash, repositoryId)` already exists.
   * Exactly one concurrent caller observes `wasNew: true`.
   */
  abstract upsertCommit(
    repositoryId: string,
    hash: string,
    attrs: CommitAttrs,
  ): Promise<{ commitId: string; wasNew: boolean }>;

  /** Writes or overwrites a failed result; a successful result is never replaced. */
  abstract recordAnalysis(
    commitId: string,
    agentKind: AgentKind,
    outcome: AnalysisOutcome,
    eventId: string | null,
  ): Promise<void>;

  abstract findAnalysis(commitId: string, agentKind: AgentKind): Promise<AnalysisResultRecord | null>;

  abstract findExistingCommitHashes(repositoryId: string, hashes: string[]): Promise<Set<string>>;

  abstract listTrackedRepositories(): Promise<TrackedRepository[]>;

  /** Dedupes on delivery_id: a known id returns the existing event with `created: false`. */
  abstract insertEvent(input: NewEventInput): Promise<{ eventId: string; created: boolean }>;

  /**
   * Compare-and-set claim of the oldest claimable event (PENDING, or FAILED_TRANSIENT whose
   * backoff has expired). Moves it to IN_PROGRESS and increments attempt_count.
   */
  abstract claimNextEvent(workerId: string): Promise<IngestEventRecord | null>;

  abstract touchEvent(eventId: string, workerId: string): Promise<void>;

  // The transitions below apply only while `workerId` still holds the claim.

  abstract completeEvent(eventId: string, workerId: string): Promise<boolean>;

  abstract failEventTransient(
    eventId: string,
    workerId: string,
    error: string,
    retryDelayMs: number,
  ): Promise<boolean>;

  abstract failEventPermanent(eventId: string, workerId: string, error: string): Promise<boolean>;

  /** IN_PROGRESS events whose heartbeat is older than staleMs lose their claim. */
  abstract reclaimStaleEvents(staleMs: number): Promise<ReclaimReport>;

  abstract getEvent(eventId: string): Promise<IngestEventRecord | null>;

  /** Events from `source` not yet DONE or FAILED_PERMANENT, oldest first. */
  abstract listOpenEvents(source: EventSource): Promise<IngestEventRecord[]>;

  abstract listEvents(filter: { state?: EventState; limit: number }): Promise<IngestEventRecord[]>;

  abstract countEventsByState(): Promise<EventStateCounts>;
}

export function emptyStateCounts(): EventStateCounts {
  return {
    PENDING: 0,
    IN_PROGRESS: 0,
    DONE: 0,
    FAILED_TRANSIENT: 0,
    FAILED_PERMANENT: 0,
  };
}
