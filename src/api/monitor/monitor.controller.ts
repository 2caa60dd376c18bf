import { BadRequestException, Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { OrchestratorService, type CycleReport, type MonitorStatus } from '../../orchestrator/orchestrator.service';
import { StartMonitorDto } from '../../dto/start-monitor.dto';

@ApiTags('monitor')
@Controller('monitor')
export class MonitorController {
  constructor(private readonly orchestrator: OrchestratorService) {}

  @Get('status')
  @ApiOperation({ summary: 'Monitor state and event counts per state' })
  async status(): Promise<MonitorStatus> {
    return this.orchestrator.status();
  }

  @Post('start')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Start the periodic cycle (reclaim, reconcile, drain)' })
  async start(@Body() body?: StartMonitorDto): Promise<MonitorStatus> {
    const intervalMs = body?.intervalMs;
    if (intervalMs !== undefined && (!Number.isInteger(intervalMs) || intervalMs < 1)) {
      throw new BadRequestException('intervalMs must be a positive integer');
    }
    this.orchestrator.start(intervalMs);
    return this.orchestrator.status();
  }

  @Post('stop')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Stop the cycle; waits for in-progress events to finish' })
  async stop(): Promise<MonitorStatus> {
    await this.orchestrator.stop();
    return this.orchestrator.status();
  }

  @Post('run-once')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Run one reconciliation pass and one drain now' })
  async runOnce(): Promise<CycleReport> {
    return this.orchestrator.runOnce();
  }
}
