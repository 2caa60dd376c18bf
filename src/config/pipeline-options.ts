import { ConfigService } from '@nestjs/config';
import type { AgentKind } from '../analysis/analysis-engine';
import type { Env } from './env.validation';

export const PIPELINE_OPTIONS = Symbol('PIPELINE_OPTIONS');

/**
 * Tunables shared by the dispatcher, worker pool, poller and orchestrator.
 * Built once from the validated env; tests pass a literal.
 */
export interface PipelineOptions {
  workerPoolSize: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  analysisTimeoutMs: number;
  agentKinds: AgentKind[];
  pollCommitLimit: number;
  cycleIntervalMs: number;
  staleClaimMs: number;
  heartbeatIntervalMs: number;
  trackedRepositories: string[];
  runMonitor: boolean;
}

export function pipelineOptionsFromEnv(config: ConfigService<Env, true>): PipelineOptions {
  return {
    workerPoolSize: config.get('WORKER_POOL_SIZE', { infer: true }),
    maxAttempts: config.get('MAX_ATTEMPTS', { infer: true }),
    backoffBaseMs: config.get('BACKOFF_BASE_MS', { infer: true }),
    backoffMaxMs: config.get('BACKOFF_MAX_MS', { infer: true }),
    analysisTimeoutMs: config.get('ANALYSIS_TIMEOUT_MS', { infer: true }),
    agentKinds: config.get('ANALYSIS_AGENTS', { infer: true }),
    pollCommitLimit: config.get('POLL_COMMIT_LIMIT', { infer: true }),
    cycleIntervalMs: config.get('CYCLE_INTERVAL_MS', { infer: true }),
    staleClaimMs: config.get('STALE_CLAIM_MS', { infer: true }),
    heartbeatIntervalMs: config.get('HEARTBEAT_INTERVAL_MS', { infer: true }),
    trackedRepositories: config.get('TRACKED_REPOSITORIES', { infer: true }),
    runMonitor: config.get('RUN_MONITOR', { infer: true }),
  };
}
