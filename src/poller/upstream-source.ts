import { PipelineError } from '../common/errors';
import type { ChangedFile, Visibility } from '../store/entity-store';

export interface UpstreamRepository {
  description: string | null;
  language: string | null;
  visibility: Visibility | null;
  default_branch: string | null;
}

export interface UpstreamCommit {
  sha: string;
  author: string;
  author_email: string | null;
  message: string;
  /** ISO-8601 */
  committed_at: string;
  url: string | null;
  files: ChangedFile[];
}

export class UpstreamError extends PipelineError {
  constructor(
    message: string,
    readonly retryable: boolean,
  ) {
    super(message);
  }
}

/** Where the reconciliation poller reads commits directly, bypassing notifications. */
export abstract class UpstreamSource {
  abstract getRepository(owner: string, name: string): Promise<UpstreamRepository>;

  /** Most recent commit hashes on the default branch, newest first. */
  abstract listRecentCommits(owner: string, name: string, limit: number): Promise<string[]>;

  abstract getCommit(owner: string, name: string, sha: string): Promise<UpstreamCommit>;
}
