import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database/database.module';
import { AnalysisModule } from '../analysis/analysis.module';
import { HeartbeatService } from './heartbeat.service';
import { EventDispatcherService } from './event-dispatcher.service';
import { WorkerPoolService } from './worker-pool.service';

@Module({
  imports: [DatabaseModule, AnalysisModule],
  providers: [HeartbeatService, EventDispatcherService, WorkerPoolService],
  exports: [HeartbeatService, EventDispatcherService, WorkerPoolService],
})
export class WorkerModule {}
