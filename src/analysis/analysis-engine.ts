import type { ChangedFile } from '../store/entity-store';

export const AGENT_KINDS = ['commit_analysis', 'code_analysis'] as const;
export type AgentKind = (typeof AGENT_KINDS)[number];

/** What the engine is told about a commit; the diff travels separately as a summary. */
export interface CommitMetadata {
  repository: string;
  commit_hash: string;
  author: string;
  message: string;
  branch: string | null;
  committed_at: Date;
  changed_files: ChangedFile[];
}

export type AnalysisReply =
  | { status: 'ok'; text: string; model: string | null }
  | { status: 'error'; retryable: boolean; message: string };

/**
 * Black-box analysis capability. Implementations report failures in the reply;
 * a thrown error is treated by callers as retryable.
 * Latency is unbounded: callers impose their own timeout.
 */
export abstract class AnalysisEngine {
  abstract analyze(
    commit: CommitMetadata,
    diffSummary: string,
    agentKind: AgentKind,
  ): Promise<AnalysisReply>;
}

/** One line per file, in commit order: `<change> <path>`. */
export function summarizeDiff(files: ChangedFile[]): string {
  if (files.length === 0) return '(no file changes)';
  return files.map((file) => `${file.change} ${file.path}`).join('\n');
}
