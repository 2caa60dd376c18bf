import { ApiPropertyOptional } from '@nestjs/swagger';

export class StartMonitorDto {
  @ApiPropertyOptional({
    description: 'Milliseconds between cycles (default: CYCLE_INTERVAL_MS)',
    example: 30000,
  })
  intervalMs?: number;
}
