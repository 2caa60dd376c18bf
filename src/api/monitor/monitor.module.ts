import { Module } from '@nestjs/common';
import { OrchestratorModule } from '../../orchestrator/orchestrator.module';
import { MonitorController } from './monitor.controller';

@Module({
  imports: [OrchestratorModule],
  controllers: [MonitorController],
})
export class MonitorModule {}
