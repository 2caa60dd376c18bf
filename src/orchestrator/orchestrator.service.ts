import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { EntityStore, type EventStateCounts, type ReclaimReport } from '../store/entity-store';
import { PIPELINE_OPTIONS, type PipelineOptions } from '../config/pipeline-options';
import { StoreUnavailableError, errorMessage } from '../common/errors';
import { HeartbeatService } from '../worker/heartbeat.service';
import { WorkerPoolService, type DrainReport } from '../worker/worker-pool.service';
import { ReconciliationPollerService, type PollReport } from '../poller/reconciliation-poller.service';

export interface CycleReport {
  startedAt: Date;
  finishedAt: Date;
  reclaimed: ReclaimReport;
  poll: PollReport | null;
  /** Set when the reconciliation pass as a whole failed; the drain still ran. */
  pollError: string | null;
  drain: DrainReport;
  /** True when stop() cut the cycle short (before the poll or between events). */
  interrupted: boolean;
}

export interface MonitorStatus {
  running: boolean;
  intervalMs: number | null;
  lastCycleAt: Date | null;
  /** The counts below are null while the store is unreachable. */
  store: 'ok' | 'unavailable';
  pendingCount: number | null;
  inProgressCount: number | null;
  failedTransientCount: number | null;
  failedPermanentCount: number | null;
  doneCount: number | null;
  lastCycle: CycleReport | null;
}

const EMPTY_DRAIN: DrainReport = { claimed: 0, done: 0, retrying: 0, failed: 0, errors: 0 };

/**
 * Owns the pipeline lifecycle. One cycle = reclaim stale claims, one reconciliation pass,
 * one drain of the event queue. Cycles never overlap: runOnce() queues behind a cycle in
 * flight. stop() lets in-progress events finish their attempt before it resolves.
 */
@Injectable()
export class OrchestratorService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(OrchestratorService.name);

  private running = false;
  private intervalMs: number | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  /** Bumped by every start(); a timed cycle only reschedules for the start that created it. */
  private generation = 0;
  private cycles: Promise<unknown> = Promise.resolve();
  private activeCycle: AbortController | null = null;
  private lastCycle: CycleReport | null = null;

  constructor(
    private readonly store: EntityStore,
    private readonly heartbeat: HeartbeatService,
    private readonly poller: ReconciliationPollerService,
    private readonly pool: WorkerPoolService,
    @Inject(PIPELINE_OPTIONS) private readonly options: PipelineOptions,
  ) {}

  async onModuleInit(): Promise<void> {
    // Claims left behind by a previous process are released before any worker starts.
    const reclaimed = await this.heartbeat.reclaimStale();
    if (reclaimed.requeued + reclaimed.abandoned > 0) {
      this.logger.warn(
        `Recovered ${reclaimed.requeued} stale events (${reclaimed.abandoned} out of attempts)`,
      );
    }
    if (this.options.runMonitor) this.start();
  }

  async onModuleDestroy(): Promise<void> {
    await this.stop();
  }

  /** Runs a cycle now and then every intervalMs until stop(). No-op if already running. */
  start(intervalMs = this.options.cycleIntervalMs): void {
    if (this.running) {
      this.logger.warn('Monitor is already running');
      return;
    }
    this.running = true;
    this.intervalMs = intervalMs;
    this.generation += 1;
    this.logger.log(`Monitor started (interval ${intervalMs}ms)`);
    this.scheduleNext(this.generation, 0);
  }

  /** Stops the timer and waits for the cycle in flight; its workers claim nothing new. */
  async stop(): Promise<void> {
    const wasRunning = this.running;
    this.running = false;
    this.intervalMs = null;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.activeCycle?.abort();
    await this.cycles;
    if (wasRunning) this.logger.log('Monitor stopped');
  }

  /** Exactly one reconciliation pass and one drain, after any cycle already in flight. */
  async runOnce(): Promise<CycleReport> {
    return this.enqueueCycle();
  }

  async status(): Promise<MonitorStatus> {
    let counts: EventStateCounts | null = null;
    try {
      counts = await this.store.countEventsByState();
    } catch (err) {
      if (!(err instanceof StoreUnavailableError)) throw err;
      this.logger.warn(`Event counts unavailable: ${errorMessage(err)}`);
    }
    return {
      running: this.running,
      intervalMs: this.intervalMs,
      lastCycleAt: this.lastCycle?.finishedAt ?? null,
      store: counts ? 'ok' : 'unavailable',
      pendingCount: counts?.PENDING ?? null,
      inProgressCount: counts?.IN_PROGRESS ?? null,
      failedTransientCount: counts?.FAILED_TRANSIENT ?? null,
      failedPermanentCount: counts?.FAILED_PERMANENT ?? null,
      doneCount: counts?.DONE ?? null,
      lastCycle: this.lastCycle,
    };
  }

  private scheduleNext(generation: number, delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runTimedCycle(generation).catch((err: unknown) => {
        this.logger.error(`Monitor loop failed: ${errorMessage(err)}`);
      });
    }, delayMs);
  }

  private async runTimedCycle(generation: number): Promise<void> {
    try {
      await this.enqueueCycle();
    } catch (err) {
      this.logger.error(`Cycle failed: ${errorMessage(err)}`);
    }
    // A stop() followed by a new start() while this cycle ran hands the loop to that start.
    if (!this.running || generation !== this.generation || this.intervalMs === null) return;
    this.scheduleNext(generation, this.intervalMs);
  }

  private enqueueCycle(): Promise<CycleReport> {
    const cycle = this.cycles.then(() => this.executeCycle());
    this.cycles = cycle.catch(() => undefined);
    return cycle;
  }

  private async executeCycle(): Promise<CycleReport> {
    const abort = new AbortController();
    this.activeCycle = abort;
    const startedAt = new Date();
    try {
      const reclaimed = await this.heartbeat.reclaimStale();

      let poll: PollReport | null = null;
      let pollError: string | null = null;
      if (!abort.signal.aborted) {
        try {
          poll = await this.poller.pollOnce();
        } catch (err) {
          pollError = errorMessage(err);
          this.logger.warn(`Reconciliation pass failed: ${pollError}`);
        }
      }

      const drain = abort.signal.aborted ? { ...EMPTY_DRAIN } : await this.pool.drain(abort.signal);

      const report: CycleReport = {
        startedAt,
        finishedAt: new Date(),
        reclaimed,
        poll,
        pollError,
        drain,
        interrupted: abort.signal.aborted,
      };
      this.lastCycle = report;
      if (drain.claimed > 0) {
        this.logger.log(
          `Cycle: ${drain.claimed} events claimed, ${drain.done} done, ${drain.retrying} retrying, ${drain.failed} failed`,
        );
      }
      return report;
    } finally {
      if (this.activeCycle === abort) this.activeCycle = null;
    }
  }
}
