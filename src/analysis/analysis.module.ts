import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AnalysisEngine } from './analysis-engine';
import { OllamaAnalysisEngine } from './ollama-analysis.engine';
import type { Env } from '../config/env.validation';

@Module({
  providers: [
    {
      provide: AnalysisEngine,
      useFactory: (config: ConfigService<Env, true>) =>
        new OllamaAnalysisEngine({
          baseUrl: config.get('OLLAMA_BASE_URL', { infer: true }),
          models: {
            commit_analysis: config.get('OLLAMA_MODEL', { infer: true }),
            code_analysis: config.get('CODE_MODEL', { infer: true }),
          },
          requestTimeoutMs: config.get('ANALYSIS_TIMEOUT_MS', { infer: true }),
        }),
      inject: [ConfigService],
    },
  ],
  exports: [AnalysisEngine],
})
export class AnalysisModule {}
