import { Inject, Injectable, Logger } from '@nestjs/common';
import { EntityStore, type ReclaimReport } from '../store/entity-store';
import { PIPELINE_OPTIONS, type PipelineOptions } from '../config/pipeline-options';
import { errorMessage } from '../common/errors';

/**
 * Heartbeat: workers keep heartbeat_at fresh while processing an event;
 * reclaim puts events whose heartbeat went stale back in the queue.
 */
@Injectable()
export class HeartbeatService {
  private readonly logger = new Logger(HeartbeatService.name);

  constructor(
    private readonly store: EntityStore,
    @Inject(PIPELINE_OPTIONS) private readonly options: PipelineOptions,
  ) {}

  async tick(eventId: string, workerId: string): Promise<void> {
    await this.store.touchEvent(eventId, workerId);
  }

  /**
   * Ticks every heartbeatIntervalMs until the returned function is called.
   * A failed tick is logged; if ticks keep failing the claim goes stale and is reclaimed.
   */
  keepAlive(eventId: string, workerId: string): () => void {
    const timer = setInterval(() => {
      this.tick(eventId, workerId).catch((err: unknown) => {
        this.logger.warn(`Heartbeat for event ${eventId} failed: ${errorMessage(err)}`);
      });
    }, this.options.heartbeatIntervalMs);
    return () => clearInterval(timer);
  }

  /** Claims with a heartbeat older than staleClaimMs are released (or abandoned when out of attempts). */
  async reclaimStale(): Promise<ReclaimReport> {
    return this.store.reclaimStaleEvents(this.options.staleClaimMs);
  }
}
