import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database/database.module';
import { WorkerModule } from '../worker/worker.module';
import { PollerModule } from '../poller/poller.module';
import { OrchestratorService } from './orchestrator.service';

@Module({
  imports: [DatabaseModule, WorkerModule, PollerModule],
  providers: [OrchestratorService],
  exports: [OrchestratorService],
})
export class OrchestratorModule {}
