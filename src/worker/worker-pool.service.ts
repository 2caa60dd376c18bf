import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { EntityStore, type IngestEventRecord } from '../store/entity-store';
import { PIPELINE_OPTIONS, type PipelineOptions } from '../config/pipeline-options';
import { errorMessage } from '../common/errors';
import { EventDispatcherService } from './event-dispatcher.service';
import { HeartbeatService } from './heartbeat.service';

export interface DrainReport {
  claimed: number;
  done: number;
  retrying: number;
  failed: number;
  /** Claims or dispatches that threw (typically the store going away mid-drain). */
  errors: number;
}

/**
 * Bounded pool of workers draining the event queue:
 * - each worker claims the next due event, processes it with a live heartbeat, and repeats
 * - a worker exits when nothing is claimable, when the store fails, or when `signal` aborts
 * Aborting never interrupts an event in progress; the worker just does not claim another.
 */
@Injectable()
export class WorkerPoolService {
  private readonly logger = new Logger(WorkerPoolService.name);

  private readonly instanceId =
    process.env.WORKER_ID || process.env.HOSTNAME || `worker-${randomUUID().slice(0, 8)}`;

  constructor(
    private readonly store: EntityStore,
    private readonly dispatcher: EventDispatcherService,
    private readonly heartbeat: HeartbeatService,
    @Inject(PIPELINE_OPTIONS) private readonly options: PipelineOptions,
  ) {}

  async drain(signal?: AbortSignal): Promise<DrainReport> {
    const report: DrainReport = { claimed: 0, done: 0, retrying: 0, failed: 0, errors: 0 };
    const workers = Array.from({ length: this.options.workerPoolSize }, (_, index) =>
      this.runWorker(`${this.instanceId}-${index + 1}`, report, signal),
    );
    await Promise.all(workers);
    return report;
  }

  private async runWorker(workerId: string, report: DrainReport, signal?: AbortSignal): Promise<void> {
    while (!signal?.aborted) {
      let event: IngestEventRecord | null;
      try {
        event = await this.store.claimNextEvent(workerId);
      } catch (err) {
        report.errors += 1;
        this.logger.error(`Worker ${workerId} could not claim: ${errorMessage(err)}`);
        return;
      }
      if (!event) return;
      report.claimed += 1;

      const stopHeartbeat = this.heartbeat.keepAlive(event.id, workerId);
      try {
        const outcome = await this.dispatcher.processEvent(event, workerId);
        if (outcome.state === 'DONE') report.done += 1;
        else if (outcome.state === 'FAILED_TRANSIENT') report.retrying += 1;
        else report.failed += 1;
      } catch (err) {
        // Left IN_PROGRESS; the stale-claim reclaim hands it back to the queue.
        report.errors += 1;
        this.logger.error(`Worker ${workerId} failed on event ${event.id}: ${errorMessage(err)}`);
        return;
      } finally {
        stopHeartbeat();
      }
    }
  }
}
