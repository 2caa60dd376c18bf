import { Module } from '@nestjs/common';
import { PipelineConfigModule } from './config/config.module';
import { DatabaseModule } from './database/database.module';
import { WebhooksModule } from './api/webhooks/webhooks.module';
import { WorkerModule } from './worker/worker.module';
import { PollerModule } from './poller/poller.module';
import { OrchestratorModule } from './orchestrator/orchestrator.module';
import { MonitorModule } from './api/monitor/monitor.module';
import { EventsModule } from './api/events/events.module';

@Module({
  imports: [
    PipelineConfigModule,
    DatabaseModule,
    WebhooksModule,
    WorkerModule,
    PollerModule,
    OrchestratorModule,
    MonitorModule,
    EventsModule,
  ],
})
export class AppModule {}
