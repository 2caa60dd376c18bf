import { Logger } from '@nestjs/common';
import { z } from 'zod';
import type { ChangeKind } from '../store/entity-store';
import { UpstreamError, UpstreamSource, type UpstreamCommit, type UpstreamRepository } from './upstream-source';

export interface GitHubClientOptions {
  baseUrl: string;
  token: string;
  timeoutMs: number;
}

const RepositorySchema = z.object({
  description: z.string().nullable().optional(),
  language: z.string().nullable().optional(),
  private: z.boolean().optional(),
  default_branch: z.string().optional(),
});

const CommitSummarySchema = z.object({ sha: z.string() });

const CommitDetailSchema = z.object({
  sha: z.string(),
  html_url: z.string().optional(),
  commit: z.object({
    message: z.string(),
    author: z
      .object({
        name: z.string().optional(),
        email: z.string().optional(),
        date: z.string().optional(),
      })
      .nullable(),
  }),
  author: z.object({ login: z.string() }).nullable().optional(),
  files: z
    .array(z.object({ filename: z.string(), status: z.string() }))
    .optional()
    .default([]),
});

const FILE_STATUS: Record<string, ChangeKind> = {
  added: 'added',
  modified: 'modified',
  removed: 'deleted',
  renamed: 'renamed',
};

export function changeKindOf(status: string): ChangeKind {
  return FILE_STATUS[status] ?? 'modified';
}

/**
 * Read-only GitHub REST client for the reconciliation poller.
 * 429/5xx and network failures are retryable UpstreamErrors; 404 on a commit list is empty.
 */
export class GitHubClient extends UpstreamSource {
  private readonly logger = new Logger(GitHubClient.name);

  constructor(private readonly options: GitHubClientOptions) {
    super();
  }

  async getRepository(owner: string, name: string): Promise<UpstreamRepository> {
    const body = await this.get(`/repos/${owner}/${name}`);
    const repo = this.parse(RepositorySchema, body, `repository ${owner}/${name}`);
    return {
      description: repo.description ?? null,
      language: repo.language ?? null,
      visibility: repo.private === undefined ? null : repo.private ? 'private' : 'public',
      default_branch: repo.default_branch ?? null,
    };
  }

  async listRecentCommits(owner: string, name: string, limit: number): Promise<string[]> {
    const perPage = Math.min(Math.max(limit, 1), 100);
    const body = await this.get(`/repos/${owner}/${name}/commits?per_page=${perPage}`, {
      allowNotFound: true,
    });
    if (body === null) {
      this.logger.debug(`Repository ${owner}/${name} has no commits or is not visible`);
      return [];
    }
    const commits = this.parse(z.array(CommitSummarySchema), body, `commits of ${owner}/${name}`);
    return commits.slice(0, limit).map((commit) => commit.sha);
  }

  async getCommit(owner: string, name: string, sha: string): Promise<UpstreamCommit> {
    const body = await this.get(`/repos/${owner}/${name}/commits/${sha}`);
    const detail = this.parse(CommitDetailSchema, body, `commit ${sha}`);
    const author = detail.commit.author;
    return {
      sha: detail.sha,
      author: detail.author?.login ?? author?.name ?? 'unknown',
      author_email: author?.email ?? null,
      message: detail.commit.message,
      committed_at: author?.date ?? new Date(0).toISOString(),
      url: detail.html_url ?? null,
      files: detail.files.map((file) => ({ path: file.filename, change: changeKindOf(file.status) })),
    };
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'User-Agent': 'commit-ingest',
    };
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }
    return headers;
  }

  private async get(path: string, opts: { allowNotFound?: boolean } = {}): Promise<unknown> {
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}${path}`;
    let res: Response;
    try {
      res = await fetch(url, {
        headers: this.headers(),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new UpstreamError(`GET ${path} failed: ${message}`, true);
    }

    if (res.status === 404 && opts.allowNotFound) return null;
    if (!res.ok) {
      const retryable = res.status === 429 || res.status >= 500;
      throw new UpstreamError(`GET ${path} answered HTTP ${res.status}`, retryable);
    }
    return res.json();
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, what: string): T {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamError(`Unexpected GitHub response for ${what}: ${parsed.error.message}`, false);
    }
    return parsed.data;
  }
}
