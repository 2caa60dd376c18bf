import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { validateEnv, type Env } from './env.validation';
import { PIPELINE_OPTIONS, pipelineOptionsFromEnv } from './pipeline-options';

@Global()
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, validate: validateEnv })],
  providers: [
    {
      provide: PIPELINE_OPTIONS,
      useFactory: (config: ConfigService<Env, true>) => pipelineOptionsFromEnv(config),
      inject: [ConfigService],
    },
  ],
  exports: [PIPELINE_OPTIONS],
})
export class PipelineConfigModule {}
