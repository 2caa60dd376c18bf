import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { IngestEvent } from '../database/entities';
import { StoreUnavailableError, errorMessage } from '../common/errors';
import type { AgentKind } from '../analysis/analysis-engine';
import {
  EntityStore,
  EVENT_STATES,
  OPEN_STATES,
  emptyStateCounts,
  type AnalysisOutcome,
  type AnalysisResultRecord,
  type CommitAttrs,
  type EventSource,
  type EventState,
  type EventStateCounts,
  type IngestEventRecord,
  type NewEventInput,
  type ReclaimReport,
  type RepositoryAttrs,
  type TrackedRepository,
} from './entity-store';

const EVENT_COLUMNS = `id, source, delivery_id, event_type, raw_payload, state, attempt_count,
  max_attempts, next_attempt_at, claimed_by, claimed_at, heartbeat_at, last_error,
  received_at, processed_at`;

// Node socket errors plus SQLSTATE codes for "server went away / is refusing work".
const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EPIPE',
  'EAI_AGAIN',
  '57P01',
  '57P02',
  '57P03',
  '53300',
]);

function errorCode(err: unknown): string | null {
  if (typeof err !== 'object' || err === null) return null;
  if ('code' in err && typeof err.code === 'string') return err.code;
  if ('driverError' in err) return errorCode(err.driverError);
  return null;
}

/** True for failures that say nothing about the query and everything about the connection. */
export function isConnectionFailure(err: unknown): boolean {
  const code = errorCode(err);
  if (code && (CONNECTION_ERROR_CODES.has(code) || code.startsWith('08'))) return true;
  if (!(err instanceof Error)) return false;
  return (
    err.name === 'CannotExecuteNotConnectedError' ||
    /Connection terminated|timeout exceeded when trying to connect/i.test(err.message)
  );
}

function toEventState(value: string): EventState {
  const state = EVENT_STATES.find((known) => known === value);
  if (!state) throw new Error(`Unknown event state in ingest_events: ${value}`);
  return state;
}

function toEventRecord(row: IngestEvent): IngestEventRecord {
  return {
    id: row.id,
    source: row.source === 'poll' ? 'poll' : 'webhook',
    delivery_id: row.delivery_id,
    event_type: row.event_type,
    raw_payload: row.raw_payload,
    state: toEventState(row.state),
    attempt_count: Number(row.attempt_count),
    max_attempts: Number(row.max_attempts),
    next_attempt_at: row.next_attempt_at,
    claimed_by: row.claimed_by,
    heartbeat_at: row.heartbeat_at,
    last_error: row.last_error,
    received_at: row.received_at,
    processed_at: row.processed_at,
  };
}

/**
 * EntityStore on PostgreSQL. Queue transitions and upserts are single raw statements so
 * each one is atomic on its own; reads go through TypeORM repositories.
 */
@Injectable()
export class PostgresEntityStore extends EntityStore {
  private readonly logger = new Logger(PostgresEntityStore.name);

  constructor(private readonly dataSource: DataSource) {
    super();
  }

  async upsertRepository(owner: string, name: string, attrs: RepositoryAttrs): Promise<string> {
    const { rows } = await this.execute<{ id: string }>(
      'upsertRepository',
      `INSERT INTO repositories (owner, name, description, language, visibility, default_branch, tracked)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT (owner, name) DO UPDATE SET
         description = COALESCE(EXCLUDED.description, repositories.description),
         language = COALESCE(EXCLUDED.language, repositories.language),
         visibility = COALESCE(EXCLUDED.visibility, repositories.visibility),
         default_branch = COALESCE(EXCLUDED.default_branch, repositories.default_branch),
         tracked = repositories.tracked OR EXCLUDED.tracked,
         updated_at = NOW()
       RETURNING id`,
      [
        owner,
        name,
        attrs.description ?? null,
        attrs.language ?? null,
        attrs.visibility ?? null,
        attrs.default_branch ?? null,
        attrs.tracked ?? true,
      ],
    );
    const id = rows[0]?.id;
    if (!id) throw new Error(`upsertRepository returned no row for ${owner}/${name}`);
    return id;
  }

  async upsertCommit(
    repositoryId: string,
    hash: string,
    attrs: CommitAttrs,
  ): Promise<{ commitId: string; wasNew: boolean }> {
    const inserted = await this.execute<{ id: string }>(
      'upsertCommit',
      `INSERT INTO commits (
         repository_id, commit_hash, author, author_email, message,
         committed_at, branch, changed_files, metadata
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8::jsonb, $9::jsonb)
       ON CONFLICT (commit_hash, repository_id) DO NOTHING
       RETURNING id`,
      [
        repositoryId,
        hash,
        attrs.author,
        attrs.author_email,
        attrs.message,
        attrs.committed_at,
        attrs.branch,
        JSON.stringify(attrs.changed_files),
        JSON.stringify(attrs.metadata),
      ],
    );
    const newId = inserted.rows[0]?.id;
    if (newId) return { commitId: newId, wasNew: true };

    const existing = await this.execute<{ id: string }>(
      'upsertCommit',
      `SELECT id FROM commits WHERE commit_hash = $1 AND repository_id = $2`,
      [hash, repositoryId],
    );
    const existingId = existing.rows[0]?.id;
    if (!existingId) throw new Error(`Commit ${hash} conflicted but could not be read back`);
    return { commitId: existingId, wasNew: false };
  }

  async recordAnalysis(
    commitId: string,
    agentKind: AgentKind,
    outcome: AnalysisOutcome,
    eventId: string | null,
  ): Promise<void> {
    const ok = outcome.status === 'ok';
    await this.execute(
      'recordAnalysis',
      `INSERT INTO analysis_results (commit_id, agent_kind, status, analysis, error, model, event_id, analyzed_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, NOW())
       ON CONFLICT (commit_id, agent_kind) DO UPDATE SET
         status = EXCLUDED.status,
         analysis = EXCLUDED.analysis,
         error = EXCLUDED.error,
         model = EXCLUDED.model,
         event_id = EXCLUDED.event_id,
         analyzed_at = EXCLUDED.analyzed_at
       WHERE analysis_results.status <> 'ok'`,
      [
        commitId,
        agentKind,
        outcome.status,
        ok ? outcome.analysis : null,
        ok ? null : outcome.error,
        ok ? outcome.model : null,
        eventId,
      ],
    );
  }

  async findAnalysis(commitId: string, agentKind: AgentKind): Promise<AnalysisResultRecord | null> {
    const { rows } = await this.execute<AnalysisResultRecord>(
      'findAnalysis',
      `SELECT commit_id, agent_kind, status, analysis, error, model, event_id, analyzed_at
       FROM analysis_results
       WHERE commit_id = $1 AND agent_kind = $2`,
      [commitId, agentKind],
    );
    return rows[0] ?? null;
  }

  async findExistingCommitHashes(repositoryId: string, hashes: string[]): Promise<Set<string>> {
    if (hashes.length === 0) return new Set();
    const { rows } = await this.execute<{ commit_hash: string }>(
      'findExistingCommitHashes',
      `SELECT commit_hash FROM commits WHERE repository_id = $1 AND commit_hash = ANY($2::text[])`,
      [repositoryId, hashes],
    );
    return new Set(rows.map((row) => row.commit_hash));
  }

  async listTrackedRepositories(): Promise<TrackedRepository[]> {
    const { rows } = await this.execute<TrackedRepository>(
      'listTrackedRepositories',
      `SELECT id, owner, name FROM repositories WHERE tracked ORDER BY owner, name`,
    );
    return rows;
  }

  async insertEvent(input: NewEventInput): Promise<{ eventId: string; created: boolean }> {
    const inserted = await this.execute<{ id: string }>(
      'insertEvent',
      `INSERT INTO ingest_events (
         source, delivery_id, event_type, raw_payload, state, attempt_count, max_attempts, next_attempt_at
       ) VALUES ($1, $2, $3, $4, 'PENDING', 0, $5, NOW())
       ON CONFLICT (delivery_id) DO NOTHING
       RETURNING id`,
      [input.source, input.delivery_id, input.event_type, input.raw_payload, input.max_attempts],
    );
    const newId = inserted.rows[0]?.id;
    if (newId) return { eventId: newId, created: true };

    const existing = await this.execute<{ id: string }>(
      'insertEvent',
      `SELECT id FROM ingest_events WHERE delivery_id = $1`,
      [input.delivery_id],
    );
    const existingId = existing.rows[0]?.id;
    if (!existingId) throw new Error(`Event ${input.delivery_id} conflicted but could not be read back`);
    return { eventId: existingId, created: false };
  }

  /**
   * Claims the oldest due event. SKIP LOCKED keeps concurrent claimers from blocking on
   * (or double-claiming) the same row.
   */
  async claimNextEvent(workerId: string): Promise<IngestEventRecord | null> {
    const { rows } = await this.execute<IngestEvent>(
      'claimNextEvent',
      `UPDATE ingest_events
       SET state = 'IN_PROGRESS',
           claimed_by = $1,
           claimed_at = NOW(),
           heartbeat_at = NOW(),
           attempt_count = attempt_count + 1
       WHERE id = (
         SELECT id FROM ingest_events
         WHERE state = 'PENDING'
            OR (state = 'FAILED_TRANSIENT' AND next_attempt_at <= NOW())
         ORDER BY next_attempt_at ASC, received_at ASC
         LIMIT 1
         FOR UPDATE SKIP LOCKED
       )
       RETURNING ${EVENT_COLUMNS}`,
      [workerId],
    );
    const row = rows[0];
    return row ? toEventRecord(row) : null;
  }

  async touchEvent(eventId: string, workerId: string): Promise<void> {
    await this.execute(
      'touchEvent',
      `UPDATE ingest_events SET heartbeat_at = NOW()
       WHERE id = $1 AND claimed_by = $2 AND state = 'IN_PROGRESS'`,
      [eventId, workerId],
    );
  }

  async completeEvent(eventId: string, workerId: string): Promise<boolean> {
    const { affected } = await this.execute(
      'completeEvent',
      `UPDATE ingest_events
       SET state = 'DONE', processed_at = NOW(), heartbeat_at = NULL
       WHERE id = $1 AND claimed_by = $2 AND state = 'IN_PROGRESS'`,
      [eventId, workerId],
    );
    return affected > 0;
  }

  async failEventTransient(
    eventId: string,
    workerId: string,
    error: string,
    retryDelayMs: number,
  ): Promise<boolean> {
    const { affected } = await this.execute(
      'failEventTransient',
      `UPDATE ingest_events
       SET state = 'FAILED_TRANSIENT',
           last_error = $3,
           next_attempt_at = NOW() + ($4::int * interval '1 millisecond'),
           claimed_by = NULL,
           heartbeat_at = NULL
       WHERE id = $1 AND claimed_by = $2 AND state = 'IN_PROGRESS'`,
      [eventId, workerId, error, retryDelayMs],
    );
    return affected > 0;
  }

  async failEventPermanent(eventId: string, workerId: string, error: string): Promise<boolean> {
    const { affected } = await this.execute(
      'failEventPermanent',
      `UPDATE ingest_events
       SET state = 'FAILED_PERMANENT', last_error = $3, processed_at = NOW(), heartbeat_at = NULL
       WHERE id = $1 AND claimed_by = $2 AND state = 'IN_PROGRESS'`,
      [eventId, workerId, error],
    );
    return affected > 0;
  }

  /**
   * A claim is stale when its heartbeat is older than staleMs (worker died or hung).
   * Events with attempts left go back to PENDING; the rest are surfaced as FAILED_PERMANENT.
   */
  async reclaimStaleEvents(staleMs: number): Promise<ReclaimReport> {
    const { rows } = await this.execute<{ state: string }>(
      'reclaimStaleEvents',
      `UPDATE ingest_events
       SET state = CASE WHEN attempt_count >= max_attempts THEN 'FAILED_PERMANENT' ELSE 'PENDING' END,
           last_error = 'claim held by ' || COALESCE(claimed_by, 'unknown worker') || CASE
             WHEN attempt_count >= max_attempts THEN ' went stale with no attempts left'
             ELSE ' went stale; requeued'
           END,
           processed_at = CASE WHEN attempt_count >= max_attempts THEN NOW() ELSE processed_at END,
           claimed_by = NULL,
           heartbeat_at = NULL
       WHERE state = 'IN_PROGRESS'
         AND heartbeat_at < NOW() - ($1::int * interval '1 millisecond')
       RETURNING state`,
      [staleMs],
    );
    const report = {
      requeued: rows.filter((row) => row.state === 'PENDING').length,
      abandoned: rows.filter((row) => row.state === 'FAILED_PERMANENT').length,
    };
    if (rows.length > 0) {
      this.logger.warn(`Reclaimed stale claims: ${report.requeued} requeued, ${report.abandoned} abandoned`);
    }
    return report;
  }

  async getEvent(eventId: string): Promise<IngestEventRecord | null> {
    const row = await this.guard('getEvent', () =>
      this.dataSource.getRepository(IngestEvent).findOne({ where: { id: eventId } }),
    );
    return row ? toEventRecord(row) : null;
  }

  async listOpenEvents(source: EventSource): Promise<IngestEventRecord[]> {
    const { rows } = await this.execute<IngestEvent>(
      'listOpenEvents',
      `SELECT ${EVENT_COLUMNS} FROM ingest_events
       WHERE source = $1 AND state = ANY($2::text[])
       ORDER BY received_at ASC`,
      [source, [...OPEN_STATES]],
    );
    return rows.map(toEventRecord);
  }

  async listEvents(filter: { state?: EventState; limit: number }): Promise<IngestEventRecord[]> {
    const rows = await this.guard('listEvents', () =>
      this.dataSource.getRepository(IngestEvent).find({
        where: filter.state ? { state: filter.state } : undefined,
        order: { received_at: 'DESC' },
        take: filter.limit,
      }),
    );
    return rows.map(toEventRecord);
  }

  async countEventsByState(): Promise<EventStateCounts> {
    const { rows } = await this.execute<{ state: string; count: number }>(
      'countEventsByState',
      `SELECT state, COUNT(*)::int AS count FROM ingest_events GROUP BY state`,
    );
    const counts = emptyStateCounts();
    for (const row of rows) {
      counts[toEventState(row.state)] = Number(row.count);
    }
    return counts;
  }

  /**
   * Runs one statement on its own query runner. The structured result is needed because the
   * driver reports UPDATE results as [rows, rowCount] rather than plain rows.
   */
  private async execute<T>(
    operation: string,
    sql: string,
    params: unknown[] = [],
  ): Promise<{ rows: T[]; affected: number }> {
    return this.guard(operation, async () => {
      const runner = this.dataSource.createQueryRunner();
      try {
        const result = await runner.query(sql, params, true);
        return { rows: result.records, affected: result.affected ?? 0 };
      } finally {
        await runner.release();
      }
    });
  }

  private async guard<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (err) {
      if (isConnectionFailure(err)) {
        throw new StoreUnavailableError(`${operation} failed: ${errorMessage(err)}`, { cause: err });
      }
      throw err;
    }
  }
}
