import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { SourceRepository, Commit, AnalysisResult, IngestEvent } from './entities';
import { DatabaseSeedService } from './database-seed.service';
import { StoreModule } from '../store/store.module';
import type { Env } from '../config/env.validation';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (config: ConfigService<Env, true>) => ({
        type: 'postgres',
        url: config.get('DATABASE_URL', { infer: true }),
        entities: [SourceRepository, Commit, AnalysisResult, IngestEvent],
        // Only one process should synchronize the database (SYNC_DATABASE=false elsewhere)
        synchronize: config.get('SYNC_DATABASE', { infer: true }),
      }),
      inject: [ConfigService],
    }),
    StoreModule,
  ],
  providers: [DatabaseSeedService],
  exports: [StoreModule],
})
export class DatabaseModule {}
