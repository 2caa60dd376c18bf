import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { EntityStore } from '../store/entity-store';
import { PIPELINE_OPTIONS, type PipelineOptions } from '../config/pipeline-options';

/**
 * Parses TRACKED_REPOSITORIES entries (`owner/name`). Invalid entries are skipped;
 * env validation already rejects them at boot.
 */
export function parseRepositoryList(entries: string[]): Array<{ owner: string; name: string }> {
  const seen = new Set<string>();
  const result: Array<{ owner: string; name: string }> = [];
  for (const entry of entries) {
    const [owner, name, ...rest] = entry.trim().split('/');
    if (!owner || !name || rest.length > 0) continue;
    const key = `${owner}/${name}`.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    result.push({ owner, name });
  }
  return result;
}

/**
 * Seeds the repositories the reconciliation poller should visit. Runs on every boot;
 * the upsert keeps it idempotent.
 */
@Injectable()
export class DatabaseSeedService implements OnModuleInit {
  private readonly logger = new Logger(DatabaseSeedService.name);

  constructor(
    private readonly store: EntityStore,
    @Inject(PIPELINE_OPTIONS) private readonly options: PipelineOptions,
  ) {}

  async onModuleInit(): Promise<void> {
    await this.seedTrackedRepositories();
  }

  async seedTrackedRepositories(): Promise<number> {
    const repositories = parseRepositoryList(this.options.trackedRepositories);
    for (const repo of repositories) {
      await this.store.upsertRepository(repo.owner, repo.name, { tracked: true });
    }
    if (repositories.length > 0) {
      this.logger.log(`Tracking ${repositories.length} configured repositories`);
    }
    return repositories.length;
  }
}
