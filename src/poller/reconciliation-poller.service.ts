import { Inject, Injectable, Logger } from '@nestjs/common';
import { EntityStore, type TrackedRepository } from '../store/entity-store';
import { PIPELINE_OPTIONS, type PipelineOptions } from '../config/pipeline-options';
import { MalformedPayloadError, errorMessage } from '../common/errors';
import type { PollEventPayload } from '../queue/dto';
import { normalizeEvent } from '../queue/event-normalizer';
import { UpstreamSource } from './upstream-source';

export interface PollReport {
  repositories: number;
  /** Commits listed upstream across all repositories. */
  fetched: number;
  /** Listed commits already in the store. */
  known: number;
  enqueued: number;
  /** Listed commits an unfinished webhook event will store; left to that event. */
  inFlight: number;
  /** Commits that already had a poll event queued from an earlier pass. */
  duplicates: number;
  failures: Array<{ repository: string; error: string }>;
}

export function pollDeliveryId(owner: string, name: string, sha: string): string {
  return `poll:${owner}/${name}:${sha}`;
}

function commitKey(owner: string, name: string, sha: string): string {
  return `${owner}/${name}@${sha}`;
}

/**
 * Catches commits whose notification never arrived: lists the most recent commits of every
 * tracked repository and queues a `poll` event for each hash the store has not seen.
 * Those events go through the same dispatcher and idempotency rules as webhooks.
 */
@Injectable()
export class ReconciliationPollerService {
  private readonly logger = new Logger(ReconciliationPollerService.name);

  constructor(
    private readonly store: EntityStore,
    private readonly upstream: UpstreamSource,
    @Inject(PIPELINE_OPTIONS) private readonly options: PipelineOptions,
  ) {}

  async pollOnce(): Promise<PollReport> {
    const report: PollReport = {
      repositories: 0,
      fetched: 0,
      known: 0,
      enqueued: 0,
      inFlight: 0,
      duplicates: 0,
      failures: [],
    };

    const repositories = await this.store.listTrackedRepositories();
    if (repositories.length === 0) return report;
    const awaited = await this.commitsAwaitingWebhooks();
    for (const repo of repositories) {
      report.repositories += 1;
      try {
        await this.pollRepository(repo, awaited, report);
      } catch (err) {
        const error = errorMessage(err);
        report.failures.push({ repository: `${repo.owner}/${repo.name}`, error });
        this.logger.warn(`Reconciliation of ${repo.owner}/${repo.name} failed: ${error}`);
      }
    }

    if (report.enqueued > 0 || report.failures.length > 0) {
      this.logger.log(
        `Reconciliation: ${report.enqueued} missed commits queued across ${report.repositories} repositories` +
          (report.failures.length > 0 ? `, ${report.failures.length} failed` : ''),
      );
    }
    return report;
  }

  /**
   * Commits named by webhook events that are queued, claimed or waiting on a retry. Their
   * commit rows may not exist yet, so the commits table alone would report them missing.
   */
  private async commitsAwaitingWebhooks(): Promise<Set<string>> {
    const keys = new Set<string>();
    for (const event of await this.store.listOpenEvents('webhook')) {
      try {
        for (const { repository, commit } of normalizeEvent(event)) {
          keys.add(commitKey(repository.owner, repository.name, commit.hash));
        }
      } catch (err) {
        // Unreadable payloads store nothing; the dispatcher fails them on their own.
        if (!(err instanceof MalformedPayloadError)) throw err;
      }
    }
    return keys;
  }

  private async pollRepository(
    repo: TrackedRepository,
    awaited: Set<string>,
    report: PollReport,
  ): Promise<void> {
    const hashes = await this.upstream.listRecentCommits(
      repo.owner,
      repo.name,
      this.options.pollCommitLimit,
    );
    report.fetched += hashes.length;
    if (hashes.length === 0) return;

    const known = await this.store.findExistingCommitHashes(repo.id, hashes);
    report.known += known.size;
    const unknown = hashes.filter((sha) => !known.has(sha));
    const missing = unknown.filter((sha) => !awaited.has(commitKey(repo.owner, repo.name, sha)));
    report.inFlight += unknown.length - missing.length;
    // Upstream lists newest first; queue oldest first so events follow commit order.
    missing.reverse();
    if (missing.length === 0) return;

    const info = await this.upstream.getRepository(repo.owner, repo.name);
    for (const sha of missing) {
      const commit = await this.upstream.getCommit(repo.owner, repo.name, sha);
      const payload: PollEventPayload = {
        repository: { owner: repo.owner, name: repo.name, ...info },
        commit: {
          hash: commit.sha,
          author: commit.author,
          author_email: commit.author_email,
          message: commit.message,
          committed_at: commit.committed_at,
          branch: info.default_branch,
          changed_files: commit.files,
          metadata: { url: commit.url, discovered_by: 'reconciliation' },
        },
      };
      const { created } = await this.store.insertEvent({
        source: 'poll',
        delivery_id: pollDeliveryId(repo.owner, repo.name, sha),
        event_type: 'commit',
        raw_payload: JSON.stringify(payload),
        max_attempts: this.options.maxAttempts,
      });
      if (created) report.enqueued += 1;
      else report.duplicates += 1;
    }
  }
}
