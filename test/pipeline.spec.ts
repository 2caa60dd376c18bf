import { WebhookReceiverService } from '../src/api/webhooks/webhook-receiver.service';
import { signPayload } from '../src/api/webhooks/signature';
import type { PipelineOptions } from '../src/config/pipeline-options';
import { OrchestratorService } from '../src/orchestrator/orchestrator.service';
import { ReconciliationPollerService } from '../src/poller/reconciliation-poller.service';
import { EventDispatcherService } from '../src/worker/event-dispatcher.service';
import { HeartbeatService } from '../src/worker/heartbeat.service';
import { WorkerPoolService } from '../src/worker/worker-pool.service';
import { FakeUpstreamSource } from './fakes/fake-upstream.source';
import { InMemoryEntityStore } from './fakes/in-memory-entity.store';
import { ScriptedAnalysisEngine } from './fakes/scripted-analysis.engine';
import { testOptions } from './fixtures/options';
import { pushPayload } from './fixtures/push-payloads';

const SECRET = 'test-secret';

interface Pipeline {
  receiver: WebhookReceiverService;
  pool: WorkerPoolService;
  orchestrator: OrchestratorService;
}

describe('commit ingestion pipeline', () => {
  let store: InMemoryEntityStore;
  let engine: ScriptedAnalysisEngine;
  let upstream: FakeUpstreamSource;
  const running: OrchestratorService[] = [];

  function pipeline(overrides: Partial<PipelineOptions> = {}): Pipeline {
    const options = testOptions({ analysisTimeoutMs: 20, ...overrides });
    const heartbeat = new HeartbeatService(store, options);
    const dispatcher = new EventDispatcherService(store, engine, options);
    const pool = new WorkerPoolService(store, dispatcher, heartbeat, options);
    const poller = new ReconciliationPollerService(store, upstream, options);
    const orchestrator = new OrchestratorService(store, heartbeat, poller, pool, options);
    running.push(orchestrator);
    return { receiver: new WebhookReceiverService(store, SECRET, options), pool, orchestrator };
  }

  function deliver(receiver: WebhookReceiverService, payload: unknown, deliveryId: string) {
    const body = JSON.stringify(payload);
    return receiver.receive({
      signature: signPayload(SECRET, body),
      rawBody: Buffer.from(body),
      deliveryId,
      eventType: 'push',
    });
  }

  beforeEach(() => {
    store = new InMemoryEntityStore();
    engine = new ScriptedAnalysisEngine();
    upstream = new FakeUpstreamSource();
  });

  afterEach(async () => {
    await Promise.all(running.splice(0).map((orchestrator) => orchestrator.stop()));
    jest.restoreAllMocks();
  });

  it('analyzes commit abc123 of octo/widgets once and completes the event', async () => {
    const { receiver, orchestrator } = pipeline();

    const { eventId, status } = await deliver(receiver, pushPayload(), 'delivery-1');
    expect(status).toBe('accepted');
    await orchestrator.runOnce();

    expect(store.event(eventId)).toMatchObject({ state: 'DONE', attempt_count: 1 });
    expect(store.commits.size).toBe(1);
    const commit = store.commitByHash('abc123');
    expect(store.analysesFor(commit?.id ?? '')).toEqual([
      expect.objectContaining({ status: 'ok', agent_kind: 'commit_analysis' }),
    ]);
  });

  it('keeps one event and one outcome when a delivery is repeated', async () => {
    const { receiver, orchestrator } = pipeline();

    const first = await deliver(receiver, pushPayload(), 'delivery-1');
    await orchestrator.runOnce();
    const second = await deliver(receiver, pushPayload(), 'delivery-1');
    await orchestrator.runOnce();

    expect(second).toEqual({ eventId: first.eventId, status: 'duplicate' });
    expect(store.events.size).toBe(1);
    expect(store.event(first.eventId).state).toBe('DONE');
    expect(engine.calls).toHaveLength(1);
  });

  it('reports exactly one new commit for concurrent upserts of the same key', async () => {
    const repositoryId = await store.upsertRepository('octo', 'widgets', {});
    const attrs = {
      author: 'octocat',
      author_email: null,
      message: 'Add widget sizing',
      committed_at: new Date('2024-05-01T10:00:00Z'),
      branch: 'main',
      changed_files: [],
      metadata: {},
    };

    const results = await Promise.all(
      Array.from({ length: 10 }, () => store.upsertCommit(repositoryId, 'abc123', attrs)),
    );

    expect(results.filter((result) => result.wasNew)).toHaveLength(1);
    expect(new Set(results.map((result) => result.commitId)).size).toBe(1);
    expect(store.commits.size).toBe(1);
  });

  it('does not analyze again a commit the poller finds after the webhook handled it', async () => {
    const { receiver, orchestrator } = pipeline();
    upstream.addRepository('octo', 'widgets');
    upstream.push('octo', 'widgets', { sha: 'abc123' });

    await deliver(receiver, pushPayload(), 'delivery-1');
    await orchestrator.runOnce();
    const report = await orchestrator.runOnce();

    expect(report.poll).toMatchObject({ repositories: 1, known: 1, enqueued: 0 });
    expect(engine.calls).toHaveLength(1);
    expect(store.analysisWrites).toHaveLength(1);
  });

  it('does not queue a poll event for a commit whose webhook is still pending', async () => {
    const { receiver, orchestrator } = pipeline({ workerPoolSize: 4 });
    upstream.addRepository('octo', 'widgets');
    upstream.push('octo', 'widgets', { sha: 'abc123' });
    await store.upsertRepository('octo', 'widgets', { tracked: true });

    const { eventId } = await deliver(receiver, pushPayload(), 'delivery-1');
    const report = await orchestrator.runOnce();

    expect(report.poll).toMatchObject({ known: 0, inFlight: 1, enqueued: 0 });
    expect(report.drain).toMatchObject({ claimed: 1, done: 1 });
    expect(store.events.size).toBe(1);
    expect(store.event(eventId).state).toBe('DONE');
    expect(engine.calls).toHaveLength(1);
    expect(store.analysisWrites).toHaveLength(1);
  });

  it('skips the analysis when the webhook arrives after reconciliation handled the commit', async () => {
    const { receiver, pool, orchestrator } = pipeline();
    upstream.addRepository('octo', 'widgets');
    upstream.push('octo', 'widgets', { sha: 'abc123' });
    await store.upsertRepository('octo', 'widgets', { tracked: true });

    await orchestrator.runOnce();
    expect(engine.calls).toHaveLength(1);

    await deliver(receiver, pushPayload(), 'delivery-1');
    const drain = await pool.drain();

    expect(drain).toMatchObject({ claimed: 1, done: 1 });
    expect(engine.calls).toHaveLength(1);
    expect(store.commits.size).toBe(1);
  });

  it('fails a malformed payload permanently on its first attempt', async () => {
    const { receiver, orchestrator } = pipeline();
    const body = '{"ref": "refs/heads/main", "commits": "nope"}';

    const { eventId } = await receiver.receive({
      signature: signPayload(SECRET, body),
      rawBody: body,
      deliveryId: 'delivery-bad',
      eventType: 'push',
    });
    await orchestrator.runOnce();
    store.advance(3_600_000);
    await orchestrator.runOnce();

    expect(store.event(eventId)).toMatchObject({ state: 'FAILED_PERMANENT', attempt_count: 1 });
    expect(store.commits.size).toBe(0);
    await expect(orchestrator.status()).resolves.toMatchObject({ failedPermanentCount: 1 });
  });

  it('retries a timing-out analysis up to the cap with growing delays, then gives up', async () => {
    engine.otherwise = 'hang';
    const { receiver, pool } = pipeline({ maxAttempts: 4 });
    const { eventId } = await deliver(receiver, pushPayload(), 'delivery-1');

    const delays: number[] = [];
    for (let attempt = 1; attempt <= 3; attempt += 1) {
      await pool.drain();
      const event = store.event(eventId);
      expect(event).toMatchObject({ state: 'FAILED_TRANSIENT', attempt_count: attempt });
      const delay = event.next_attempt_at.getTime() - store.now().getTime();
      delays.push(delay);
      store.advance(delay);
    }
    await pool.drain();

    expect(delays).toEqual([1000, 2000, 4000]);
    expect(store.event(eventId)).toMatchObject({ state: 'FAILED_PERMANENT', attempt_count: 4 });
    expect(engine.calls).toHaveLength(4);
    const [result] = store.analysesFor(store.commitByHash('abc123')?.id ?? '');
    expect(result).toMatchObject({ status: 'failed' });
    expect(result.error).toMatch(/^retries exhausted: .*timed out after 20ms$/);
  });

  it('completes on the third attempt after two timeouts', async () => {
    engine.enqueue('hang', 'hang', { status: 'ok', text: 'third time lucky', model: 'test-model' });
    const { receiver, orchestrator } = pipeline({ maxAttempts: 3 });
    const { eventId } = await deliver(receiver, pushPayload(), 'delivery-1');

    await orchestrator.runOnce();
    store.advance(1000);
    await orchestrator.runOnce();
    store.advance(2000);
    await orchestrator.runOnce();

    expect(store.event(eventId)).toMatchObject({ state: 'DONE', attempt_count: 3 });
    const results = store.analysesFor(store.commitByHash('abc123')?.id ?? '');
    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({ status: 'ok', analysis: 'third time lucky' });
  });

  it('recovers an event left in progress by a crashed process without a second analysis', async () => {
    const crashed = pipeline({ staleClaimMs: 120_000 });
    const { eventId } = await deliver(crashed.receiver, pushPayload(), 'delivery-1');
    // The process dies after the analysis is stored but before the event is marked done.
    jest.spyOn(store, 'completeEvent').mockRejectedValueOnce(new Error('process killed'));
    await expect(crashed.pool.drain()).resolves.toMatchObject({ claimed: 1, errors: 1 });
    expect(store.event(eventId).state).toBe('IN_PROGRESS');

    store.advance(120_001);
    const restarted = pipeline({ staleClaimMs: 120_000 });
    await restarted.orchestrator.onModuleInit();
    expect(store.event(eventId)).toMatchObject({ state: 'PENDING', claimed_by: null });

    await restarted.orchestrator.runOnce();

    expect(store.event(eventId)).toMatchObject({ state: 'DONE', attempt_count: 2 });
    expect(engine.calls).toHaveLength(1);
    expect(store.analysisWrites).toHaveLength(1);
    expect(store.analysesFor(store.commitByHash('abc123')?.id ?? '')).toHaveLength(1);
  });
});
