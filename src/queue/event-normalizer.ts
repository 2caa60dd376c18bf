import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import { MalformedPayloadError } from '../common/errors';
import type {
  ChangedFile,
  CommitAttrs,
  IngestEventRecord,
  RepositoryAttrs,
} from '../store/entity-store';
import {
  PollEventPayloadSchema,
  PullRequestPayloadSchema,
  PushPayloadSchema,
  type PushCommit,
  type PushRepository,
} from './dto';

/** One (repository, commit) pair extracted from an event, ready for the entity store. */
export interface NormalizedChange {
  repository: { owner: string; name: string; attrs: RepositoryAttrs };
  commit: { hash: string; attrs: CommitAttrs };
}

export type NormalizableEvent = Pick<IngestEventRecord, 'source' | 'event_type' | 'raw_payload'>;

const BRANCH_PREFIX = 'refs/heads/';

// GitHub deliveries that carry no commits; they complete without touching the store.
const IGNORED_WEBHOOK_TYPES = new Set([
  'ping',
  'create',
  'delete',
  'fork',
  'watch',
  'star',
  'issues',
  'issue_comment',
  'label',
  'release',
  'status',
  'check_run',
  'check_suite',
  'workflow_run',
  'workflow_job',
  'pull_request_review',
  'pull_request_review_comment',
  'member',
  'repository',
]);

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedPayloadError(`payload is not valid JSON (${reason})`);
  }
}

function parseWith<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown, label: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new MalformedPayloadError(`${label} payload rejected: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function parseTimestamp(value: string, hash: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new MalformedPayloadError(`commit ${hash} has an invalid timestamp: ${value}`);
  }
  return date;
}

function branchFromRef(ref: string): string {
  return ref.startsWith(BRANCH_PREFIX) ? ref.slice(BRANCH_PREFIX.length) : ref;
}

/** Added, then modified, then removed, each in payload order. */
function changedFilesOf(commit: PushCommit): ChangedFile[] {
  return [
    ...commit.added.map((path): ChangedFile => ({ path, change: 'added' })),
    ...commit.modified.map((path): ChangedFile => ({ path, change: 'modified' })),
    ...commit.removed.map((path): ChangedFile => ({ path, change: 'deleted' })),
  ];
}

function repositoryOwner(repo: PushRepository): string {
  const owner = repo.owner?.login ?? repo.owner?.name ?? repo.full_name?.split('/')[0];
  if (!owner) throw new MalformedPayloadError('repository owner is missing');
  return owner;
}

function repositoryOf(repo: PushRepository): NormalizedChange['repository'] {
  const attrs: RepositoryAttrs = {
    description: repo.description ?? null,
    language: repo.language ?? null,
    visibility: repo.private === undefined ? null : repo.private ? 'private' : 'public',
    default_branch: repo.default_branch ?? null,
  };
  return { owner: repositoryOwner(repo), name: repo.name, attrs };
}

function normalizePush(raw: unknown): NormalizedChange[] {
  const payload = parseWith(PushPayloadSchema, raw, 'push');
  const repository = repositoryOf(payload.repository);
  const branch = branchFromRef(payload.ref);

  return payload.commits.map((commit) => ({
    repository,
    commit: {
      hash: commit.id,
      attrs: {
        author: commit.author.name ?? commit.author.username ?? 'unknown',
        author_email: commit.author.email ?? null,
        message: commit.message,
        committed_at: parseTimestamp(commit.timestamp, commit.id),
        branch,
        changed_files: changedFilesOf(commit),
        metadata: {
          url: commit.url ?? null,
          distinct: commit.distinct ?? true,
          pusher: payload.pusher?.name ?? null,
        },
      },
    },
  }));
}

/** The pull request's head commit, described by the pull request itself. */
function normalizePullRequest(raw: unknown): NormalizedChange[] {
  const payload = parseWith(PullRequestPayloadSchema, raw, 'pull_request');
  const pr = payload.pull_request;
  const hash = pr.head.sha;
  return [
    {
      repository: repositoryOf(payload.repository),
      commit: {
        hash,
        attrs: {
          author: pr.user?.login ?? 'unknown',
          author_email: null,
          message: pr.title,
          committed_at: parseTimestamp(pr.updated_at, hash),
          branch: pr.head.ref,
          changed_files: [],
          metadata: {
            pull_request: payload.number,
            action: payload.action,
            state: pr.state ?? null,
            base_branch: pr.base.ref,
            base_sha: pr.base.sha ?? null,
            url: pr.html_url ?? null,
          },
        },
      },
    },
  ];
}

function normalizePoll(raw: unknown): NormalizedChange[] {
  const payload = parseWith(PollEventPayloadSchema, raw, 'poll');
  const { repository, commit } = payload;
  return [
    {
      repository: {
        owner: repository.owner,
        name: repository.name,
        attrs: {
          description: repository.description ?? null,
          language: repository.language ?? null,
          visibility: repository.visibility ?? null,
          default_branch: repository.default_branch ?? null,
        },
      },
      commit: {
        hash: commit.hash,
        attrs: {
          author: commit.author,
          author_email: commit.author_email,
          message: commit.message,
          committed_at: parseTimestamp(commit.committed_at, commit.hash),
          branch: commit.branch,
          changed_files: commit.changed_files,
          metadata: commit.metadata,
        },
      },
    },
  ];
}

function normalizeWebhook(eventType: string | null, raw: unknown): NormalizedChange[] {
  const type = eventType ?? 'push';
  if (type === 'push') return normalizePush(raw);
  if (type === 'pull_request') return normalizePullRequest(raw);
  if (IGNORED_WEBHOOK_TYPES.has(type)) return [];
  throw new MalformedPayloadError(`unsupported webhook event type "${type}"`);
}

/**
 * Turns an event's raw payload into (repository, commit) pairs in payload order.
 * Pure and deterministic; throws MalformedPayloadError for anything it cannot read.
 */
export function normalizeEvent(event: NormalizableEvent): NormalizedChange[] {
  const raw = parseJson(event.raw_payload);
  return event.source === 'poll' ? normalizePoll(raw) : normalizeWebhook(event.event_type, raw);
}
