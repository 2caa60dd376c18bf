import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DatabaseModule } from '../database/database.module';
import { GitHubClient } from './github.client';
import { UpstreamSource } from './upstream-source';
import { ReconciliationPollerService } from './reconciliation-poller.service';
import type { Env } from '../config/env.validation';

const GITHUB_TIMEOUT_MS = 10_000;

@Module({
  imports: [DatabaseModule],
  providers: [
    ReconciliationPollerService,
    {
      provide: UpstreamSource,
      useFactory: (config: ConfigService<Env, true>) =>
        new GitHubClient({
          baseUrl: config.get('GITHUB_API_URL', { infer: true }),
          token: config.get('GITHUB_API_TOKEN', { infer: true }),
          timeoutMs: GITHUB_TIMEOUT_MS,
        }),
      inject: [ConfigService],
    },
  ],
  exports: [ReconciliationPollerService],
})
export class PollerModule {}
