import { Logger } from '@nestjs/common';
import {
  AnalysisEngine,
  type AgentKind,
  type AnalysisReply,
  type CommitMetadata,
} from './analysis-engine';

export interface OllamaOptions {
  baseUrl: string;
  models: Record<AgentKind, string>;
  /** Per-request ceiling; the dispatcher applies its own timeout on top. */
  requestTimeoutMs: number;
}

const SYSTEM_PROMPTS: Record<AgentKind, string> = {
  commit_analysis: `You are a commit analysis agent. Given a commit message and the list of changed files, describe:
- what the commit does and why, as far as the message tells
- whether the message matches the changes
- the likely impact on the rest of the codebase
Answer in a few short paragraphs.`,
  code_analysis: `You are a code analysis agent. Given the files a commit touched, describe:
- the kind of change (feature, fix, refactor, configuration, tests)
- possible bugs, security or performance concerns
- follow-up work a reviewer should ask for
Answer in a few short paragraphs.`,
};

// Statuses where asking again later can succeed.
const RETRYABLE_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);

export function buildPrompt(commit: CommitMetadata, diffSummary: string): string {
  return [
    `Repository: ${commit.repository}`,
    `Commit: ${commit.commit_hash}`,
    `Author: ${commit.author}`,
    `Branch: ${commit.branch ?? 'unknown'}`,
    `Date: ${commit.committed_at.toISOString()}`,
    '',
    'Message:',
    commit.message,
    '',
    'Changed files:',
    diffSummary,
  ].join('\n');
}

/**
 * Analysis engine backed by an Ollama server (`POST /api/generate`, non-streaming).
 */
export class OllamaAnalysisEngine extends AnalysisEngine {
  private readonly logger = new Logger(OllamaAnalysisEngine.name);

  constructor(private readonly options: OllamaOptions) {
    super();
  }

  async analyze(
    commit: CommitMetadata,
    diffSummary: string,
    agentKind: AgentKind,
  ): Promise<AnalysisReply> {
    const model = this.options.models[agentKind];
    let res: Response;
    try {
      res = await fetch(`${this.options.baseUrl.replace(/\/+$/, '')}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model,
          system: SYSTEM_PROMPTS[agentKind],
          prompt: buildPrompt(commit, diffSummary),
          stream: false,
        }),
        signal: AbortSignal.timeout(this.options.requestTimeoutMs),
      });
    } catch (err) {
      // Network failure or our own timeout
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Model server unreachable for ${commit.commit_hash}: ${message}`);
      return { status: 'error', retryable: true, message: `model server unreachable: ${message}` };
    }

    if (!res.ok) {
      return {
        status: 'error',
        retryable: RETRYABLE_STATUSES.has(res.status),
        message: `model server answered HTTP ${res.status}`,
      };
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch {
      return { status: 'error', retryable: false, message: 'model server returned invalid JSON' };
    }
    const text =
      typeof body === 'object' && body !== null && 'response' in body && typeof body.response === 'string'
        ? body.response.trim()
        : '';
    if (text.length === 0) {
      return { status: 'error', retryable: false, message: `model ${model} returned an empty analysis` };
    }
    return { status: 'ok', text, model };
  }
}
