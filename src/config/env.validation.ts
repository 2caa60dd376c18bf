import { z } from 'zod';
import { AGENT_KINDS } from '../analysis/analysis-engine';

const intFromEnv = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

const listFromEnv = (fallback = '') =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0),
    );

const flagFromEnv = (fallback: boolean) =>
  z
    .string()
    .default(String(fallback))
    .transform((value) => value.toLowerCase() === 'true');

/**
 * Environment schema. ConfigModule runs it once at boot; a failure aborts startup.
 */
export const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  // Only one process should synchronize the database
  SYNC_DATABASE: flagFromEnv(true),
  PORT: intFromEnv(3000, 1),
  SWAGGER_PATH: z.string().default('docs'),

  GITHUB_WEBHOOK_SECRET: z.string().min(1, 'GitHub webhook secret is required'),
  GITHUB_API_TOKEN: z.string().default(''),
  GITHUB_API_URL: z.string().url().default('https://api.github.com'),
  TRACKED_REPOSITORIES: listFromEnv().pipe(
    z.array(z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'expected owner/name')),
  ),
  POLL_COMMIT_LIMIT: intFromEnv(20, 1),

  WORKER_POOL_SIZE: intFromEnv(4, 1),
  MAX_ATTEMPTS: intFromEnv(3, 1),
  BACKOFF_BASE_MS: intFromEnv(1000, 1),
  BACKOFF_MAX_MS: intFromEnv(300_000, 1),
  ANALYSIS_TIMEOUT_MS: intFromEnv(60_000, 1),
  ANALYSIS_AGENTS: listFromEnv('commit_analysis,code_analysis').pipe(
    z.array(z.enum(AGENT_KINDS)).min(1),
  ),
  OLLAMA_BASE_URL: z.string().url().default('http://localhost:11434'),
  OLLAMA_MODEL: z.string().default('llama2:7b'),
  CODE_MODEL: z.string().default('codellama:7b'),

  CYCLE_INTERVAL_MS: intFromEnv(30_000, 1),
  STALE_CLAIM_MS: intFromEnv(120_000, 1),
  HEARTBEAT_INTERVAL_MS: intFromEnv(10_000, 1),
  RUN_MONITOR: flagFromEnv(false),
}).refine((env) => env.BACKOFF_MAX_MS >= env.BACKOFF_BASE_MS, {
  message: 'must be at least BACKOFF_BASE_MS',
  path: ['BACKOFF_MAX_MS'],
});

export type Env = z.infer<typeof EnvSchema>;

/** `validate` hook for ConfigModule.forRoot. */
export function validateEnv(raw: Record<string, unknown>): Env {
  const parsed = EnvSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${issues}`);
  }
  return parsed.data;
}
