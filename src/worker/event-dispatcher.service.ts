import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  AnalysisEngine,
  summarizeDiff,
  type AgentKind,
  type AnalysisReply,
  type CommitMetadata,
} from '../analysis/analysis-engine';
import { withTimeout } from '../analysis/with-timeout';
import {
  AnalysisPermanentError,
  AnalysisTransientError,
  MalformedPayloadError,
  errorMessage,
} from '../common/errors';
import { PIPELINE_OPTIONS, type PipelineOptions } from '../config/pipeline-options';
import { normalizeEvent, type NormalizedChange } from '../queue/event-normalizer';
import { EntityStore, type IngestEventRecord } from '../store/entity-store';
import { retryDelayMs } from './backoff';

export type DispatchState = 'DONE' | 'FAILED_TRANSIENT' | 'FAILED_PERMANENT';

export interface AnalysisTally {
  ok: number;
  failed: number;
  skipped: number;
  /** Analyses that hit a retryable failure and still need another attempt. */
  pending: number;
}

export interface DispatchOutcome {
  eventId: string;
  state: DispatchState;
  attempt: number;
  commits: number;
  newCommits: number;
  analyses: AnalysisTally;
  retryDelayMs: number | null;
  error: string | null;
  /** False when the claim was lost before the transition could be written. */
  applied: boolean;
}

type AnalysisStep =
  | { kind: 'ok' | 'failed' | 'skipped' }
  | { kind: 'pending'; error: AnalysisTransientError };

interface PendingAnalysis {
  commitId: string;
  agentKind: AgentKind;
  error: AnalysisTransientError;
}

/**
 * Drives one claimed event through normalize -> store -> analyze and writes its next state.
 *
 * Analysis failures are scoped to the commit: a permanent one is recorded as a failed result,
 * a retryable one leaves that commit pending and makes the whole event FAILED_TRANSIENT.
 * Store failures retry the whole event. Malformed payloads fail permanently on the first attempt.
 */
@Injectable()
export class EventDispatcherService {
  private readonly logger = new Logger(EventDispatcherService.name);

  constructor(
    private readonly store: EntityStore,
    private readonly engine: AnalysisEngine,
    @Inject(PIPELINE_OPTIONS) private readonly options: PipelineOptions,
  ) {}

  async processEvent(event: IngestEventRecord, workerId: string): Promise<DispatchOutcome> {
    const outcome: DispatchOutcome = {
      eventId: event.id,
      state: 'DONE',
      attempt: event.attempt_count,
      commits: 0,
      newCommits: 0,
      analyses: { ok: 0, failed: 0, skipped: 0, pending: 0 },
      retryDelayMs: null,
      error: null,
      applied: false,
    };

    let changes: NormalizedChange[];
    try {
      changes = normalizeEvent(event);
    } catch (err) {
      if (err instanceof MalformedPayloadError) {
        return this.failPermanently(event, workerId, outcome, errorMessage(err));
      }
      return this.failRetryable(event, workerId, outcome, errorMessage(err));
    }
    outcome.commits = changes.length;

    const pending: PendingAnalysis[] = [];
    try {
      // Payload order: later commits may touch files earlier ones changed.
      for (const change of changes) {
        const repositoryId = await this.store.upsertRepository(
          change.repository.owner,
          change.repository.name,
          change.repository.attrs,
        );
        const { commitId, wasNew } = await this.store.upsertCommit(
          repositoryId,
          change.commit.hash,
          change.commit.attrs,
        );
        if (wasNew) outcome.newCommits += 1;

        for (const agentKind of this.options.agentKinds) {
          const step = await this.analyzeCommit(event, change, commitId, agentKind);
          if (step.kind === 'pending') {
            pending.push({ commitId, agentKind, error: step.error });
          }
          outcome.analyses[step.kind] += 1;
        }
      }
    } catch (err) {
      // Store unavailable (or anything unexpected): the whole event goes around again.
      return this.failRetryable(event, workerId, outcome, errorMessage(err));
    }

    if (pending.length > 0) {
      const summary = pending.map((item) => errorMessage(item.error)).join('; ');
      if (this.attemptsExhausted(event)) {
        for (const item of pending) {
          await this.store.recordAnalysis(
            item.commitId,
            item.agentKind,
            { status: 'failed', error: `retries exhausted: ${item.error.message}` },
            event.id,
          );
        }
      }
      return this.failRetryable(event, workerId, outcome, summary);
    }

    outcome.applied = await this.store.completeEvent(event.id, workerId);
    this.reportLostClaim(event, workerId, outcome);
    this.logger.log(
      `Event ${event.id} done: ${outcome.commits} commits (${outcome.newCommits} new), ` +
        `${outcome.analyses.ok} analyses ok, ${outcome.analyses.failed} failed, ${outcome.analyses.skipped} skipped`,
    );
    return outcome;
  }

  private async analyzeCommit(
    event: IngestEventRecord,
    change: NormalizedChange,
    commitId: string,
    agentKind: AgentKind,
  ): Promise<AnalysisStep> {
    const existing = await this.store.findAnalysis(commitId, agentKind);
    // A success is final. A failure written by this same event was permanent: don't ask again.
    if (existing && (existing.status === 'ok' || existing.event_id === event.id)) {
      return { kind: 'skipped' };
    }

    const { repository, commit } = change;
    const metadata: CommitMetadata = {
      repository: `${repository.owner}/${repository.name}`,
      commit_hash: commit.hash,
      author: commit.attrs.author,
      message: commit.attrs.message,
      branch: commit.attrs.branch,
      committed_at: commit.attrs.committed_at,
      changed_files: commit.attrs.changed_files,
    };
    const label = `${agentKind} of ${metadata.repository}@${commit.hash}`;

    let reply: AnalysisReply;
    try {
      reply = await withTimeout(
        this.engine.analyze(metadata, summarizeDiff(commit.attrs.changed_files), agentKind),
        this.options.analysisTimeoutMs,
        'analysis',
      );
    } catch (err) {
      reply = { status: 'error', retryable: true, message: err instanceof Error ? err.message : String(err) };
    }

    if (reply.status === 'ok') {
      await this.store.recordAnalysis(
        commitId,
        agentKind,
        { status: 'ok', analysis: reply.text, model: reply.model },
        event.id,
      );
      return { kind: 'ok' };
    }

    if (reply.retryable) {
      this.logger.warn(`${label} will be retried: ${reply.message}`);
      return { kind: 'pending', error: new AnalysisTransientError(`${label}: ${reply.message}`) };
    }

    const failure = new AnalysisPermanentError(`${label}: ${reply.message}`);
    this.logger.warn(errorMessage(failure));
    await this.store.recordAnalysis(
      commitId,
      agentKind,
      { status: 'failed', error: reply.message },
      event.id,
    );
    return { kind: 'failed' };
  }

  private attemptsExhausted(event: IngestEventRecord): boolean {
    return event.attempt_count >= event.max_attempts;
  }

  /** Schedules another attempt, or fails permanently once the attempt cap is reached. */
  private async failRetryable(
    event: IngestEventRecord,
    workerId: string,
    outcome: DispatchOutcome,
    error: string,
  ): Promise<DispatchOutcome> {
    if (this.attemptsExhausted(event)) {
      return this.failPermanently(
        event,
        workerId,
        outcome,
        `gave up after ${event.attempt_count} attempts: ${error}`,
      );
    }
    const delay = retryDelayMs(event.attempt_count, this.options.backoffBaseMs, this.options.backoffMaxMs);
    outcome.state = 'FAILED_TRANSIENT';
    outcome.error = error;
    outcome.retryDelayMs = delay;
    outcome.applied = await this.store.failEventTransient(event.id, workerId, error, delay);
    this.reportLostClaim(event, workerId, outcome);
    this.logger.warn(
      `Event ${event.id} attempt ${event.attempt_count}/${event.max_attempts} failed, retry in ${delay}ms: ${error}`,
    );
    return outcome;
  }

  private async failPermanently(
    event: IngestEventRecord,
    workerId: string,
    outcome: DispatchOutcome,
    error: string,
  ): Promise<DispatchOutcome> {
    outcome.state = 'FAILED_PERMANENT';
    outcome.error = error;
    outcome.applied = await this.store.failEventPermanent(event.id, workerId, error);
    this.reportLostClaim(event, workerId, outcome);
    this.logger.error(`Event ${event.id} failed permanently: ${error}`);
    return outcome;
  }

  private reportLostClaim(event: IngestEventRecord, workerId: string, outcome: DispatchOutcome): void {
    if (outcome.applied) return;
    this.logger.warn(
      `Worker ${workerId} lost its claim on event ${event.id}; ${outcome.state} was not written`,
    );
  }
}
