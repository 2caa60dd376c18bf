import { StoreUnavailableError } from '../common/errors';
import { EventDispatcherService } from './event-dispatcher.service';
import { InMemoryEntityStore } from '../../test/fakes/in-memory-entity.store';
import { ScriptedAnalysisEngine } from '../../test/fakes/scripted-analysis.engine';
import { testOptions } from '../../test/fixtures/options';
import { claim, enqueueWebhook } from '../../test/fixtures/events';
import { pullRequestPayload, pushCommit, pushPayload } from '../../test/fixtures/push-payloads';
import type { PipelineOptions } from '../config/pipeline-options';

const LABEL = 'commit_analysis of octo/widgets@abc123';

describe('EventDispatcherService', () => {
  let store: InMemoryEntityStore;
  let engine: ScriptedAnalysisEngine;
  let dispatcher: EventDispatcherService;

  function build(overrides: Partial<PipelineOptions> = {}): void {
    dispatcher = new EventDispatcherService(store, engine, testOptions(overrides));
  }

  beforeEach(() => {
    store = new InMemoryEntityStore();
    engine = new ScriptedAnalysisEngine();
    build();
  });

  it('stores the commit, records the analysis and completes the event', async () => {
    const eventId = await enqueueWebhook(store, pushPayload());
    const outcome = await dispatcher.processEvent(await claim(store), 'worker-1');

    expect(outcome).toEqual({
      eventId,
      state: 'DONE',
      attempt: 1,
      commits: 1,
      newCommits: 1,
      analyses: { ok: 1, failed: 0, skipped: 0, pending: 0 },
      retryDelayMs: null,
      error: null,
      applied: true,
    });
    expect(store.event(eventId).state).toBe('DONE');

    const commit = store.commitByHash('abc123');
    expect(commit?.author).toBe('Octo Cat');
    expect(store.analysesFor(commit?.id ?? '')).toEqual([
      expect.objectContaining({
        agent_kind: 'commit_analysis',
        status: 'ok',
        analysis: 'analysis text',
        model: 'test-model',
        event_id: eventId,
      }),
    ]);

    expect(engine.calls).toHaveLength(1);
    expect(engine.calls[0].commit.repository).toBe('octo/widgets');
    expect(engine.calls[0].diffSummary).toBe('added src/size.ts\nmodified src/widget.ts');
  });

  it('fails a malformed payload permanently on the first attempt', async () => {
    const eventId = await enqueueWebhook(store, '{"ref":');
    const outcome = await dispatcher.processEvent(await claim(store), 'worker-1');

    expect(outcome.state).toBe('FAILED_PERMANENT');
    expect(outcome.attempt).toBe(1);
    const event = store.event(eventId);
    expect(event.state).toBe('FAILED_PERMANENT');
    expect(event.last_error).toMatch(/^MalformedPayloadError: payload is not valid JSON/);
    expect(store.commits.size).toBe(0);
    expect(engine.calls).toHaveLength(0);
  });

  it('records a permanent analysis failure and still completes the event', async () => {
    engine.enqueue({ status: 'error', retryable: false, message: 'prompt too long' });
    const eventId = await enqueueWebhook(store, pushPayload());
    const outcome = await dispatcher.processEvent(await claim(store), 'worker-1');

    expect(outcome.state).toBe('DONE');
    expect(outcome.analyses).toEqual({ ok: 0, failed: 1, skipped: 0, pending: 0 });
    const [result] = store.analysesFor(store.commitByHash('abc123')?.id ?? '');
    expect(result).toMatchObject({ status: 'failed', error: 'prompt too long', event_id: eventId });
  });

  it('schedules a retry with backoff when the analysis times out', async () => {
    engine.enqueue('hang');
    const eventId = await enqueueWebhook(store, pushPayload());
    const outcome = await dispatcher.processEvent(await claim(store), 'worker-1');

    expect(outcome.state).toBe('FAILED_TRANSIENT');
    expect(outcome.retryDelayMs).toBe(1000);
    expect(outcome.analyses.pending).toBe(1);

    const event = store.event(eventId);
    expect(event.state).toBe('FAILED_TRANSIENT');
    expect(event.last_error).toBe(`AnalysisTransientError: ${LABEL}: analysis timed out after 50ms`);
    expect(event.next_attempt_at).toEqual(new Date(store.now().getTime() + 1000));
    expect(event.claimed_by).toBeNull();
    // The commit is stored; only its analysis is outstanding.
    const commit = store.commitByHash('abc123');
    expect(commit).toBeDefined();
    expect(store.analysesFor(commit?.id ?? '')).toEqual([]);
  });

  it('treats an engine that throws as a retryable failure', async () => {
    engine.enqueue(new Error('socket hang up'));
    const eventId = await enqueueWebhook(store, pushPayload());
    await dispatcher.processEvent(await claim(store), 'worker-1');

    expect(store.event(eventId).last_error).toBe(`AnalysisTransientError: ${LABEL}: socket hang up`);
  });

  it('retries only the analysis that is still pending', async () => {
    build({ agentKinds: ['commit_analysis', 'code_analysis'] });
    engine.enqueue({ status: 'ok', text: 'summary', model: 'llama' }, 'hang');
    const eventId = await enqueueWebhook(store, pushPayload());

    const first = await dispatcher.processEvent(await claim(store), 'worker-1');
    expect(first.analyses).toEqual({ ok: 1, failed: 0, skipped: 0, pending: 1 });

    store.advance(1000);
    const second = await dispatcher.processEvent(await claim(store), 'worker-1');

    expect(second).toMatchObject({
      state: 'DONE',
      attempt: 2,
      newCommits: 0,
      analyses: { ok: 1, failed: 0, skipped: 1, pending: 0 },
    });
    expect(engine.calls.map((call) => call.agentKind)).toEqual([
      'commit_analysis',
      'code_analysis',
      'code_analysis',
    ]);
    expect(store.event(eventId).state).toBe('DONE');
  });

  it('skips commits whose analysis already succeeded', async () => {
    await enqueueWebhook(store, pushPayload());
    await dispatcher.processEvent(await claim(store), 'worker-1');

    await enqueueWebhook(store, pushPayload());
    const outcome = await dispatcher.processEvent(await claim(store), 'worker-1');

    expect(outcome.state).toBe('DONE');
    expect(outcome.newCommits).toBe(0);
    expect(outcome.analyses.skipped).toBe(1);
    expect(engine.calls).toHaveLength(1);
  });

  it('gives up and records the failure once attempts are exhausted', async () => {
    engine.enqueue('hang');
    const eventId = await enqueueWebhook(store, pushPayload(), { maxAttempts: 1 });
    const outcome = await dispatcher.processEvent(await claim(store), 'worker-1');

    expect(outcome.state).toBe('FAILED_PERMANENT');
    expect(store.event(eventId).last_error).toBe(
      `gave up after 1 attempts: AnalysisTransientError: ${LABEL}: analysis timed out after 50ms`,
    );
    const [result] = store.analysesFor(store.commitByHash('abc123')?.id ?? '');
    expect(result).toMatchObject({
      status: 'failed',
      error: `retries exhausted: ${LABEL}: analysis timed out after 50ms`,
    });
  });

  it('retries the whole event when the store drops out mid-event', async () => {
    jest
      .spyOn(store, 'upsertCommit')
      .mockRejectedValueOnce(new StoreUnavailableError('upsertCommit failed: connection reset'));
    const eventId = await enqueueWebhook(store, pushPayload());
    const outcome = await dispatcher.processEvent(await claim(store), 'worker-1');

    expect(outcome.state).toBe('FAILED_TRANSIENT');
    expect(store.event(eventId).last_error).toBe(
      'StoreUnavailableError: upsertCommit failed: connection reset',
    );
    expect(engine.calls).toHaveLength(0);
  });

  it('does not overwrite an event whose claim was taken over', async () => {
    const eventId = await enqueueWebhook(store, pushPayload());
    const event = await claim(store);
    jest.spyOn(engine, 'analyze').mockImplementationOnce(async () => {
      store.event(eventId).claimed_by = 'worker-2';
      return { status: 'ok', text: 'late', model: null };
    });

    const outcome = await dispatcher.processEvent(event, 'worker-1');

    expect(outcome.applied).toBe(false);
    expect(store.event(eventId).state).toBe('IN_PROGRESS');
    expect(store.event(eventId).claimed_by).toBe('worker-2');
  });

  it('completes a ping without touching the store', async () => {
    const eventId = await enqueueWebhook(store, { zen: 'hello' }, { eventType: 'ping' });
    const outcome = await dispatcher.processEvent(await claim(store), 'worker-1');

    expect(outcome).toMatchObject({ state: 'DONE', commits: 0 });
    expect(store.event(eventId).state).toBe('DONE');
    expect(store.repositories.size).toBe(0);
  });

  it('applies the commits of a push in payload order', async () => {
    const upsertCommit = jest.spyOn(store, 'upsertCommit');
    const commits = [pushCommit('c1'), pushCommit('c2'), pushCommit('c3')];
    await enqueueWebhook(store, pushPayload({ commits }));

    const outcome = await dispatcher.processEvent(await claim(store), 'worker-1');

    expect(outcome).toMatchObject({ state: 'DONE', commits: 3, newCommits: 3 });
    expect(upsertCommit.mock.calls.map((call) => call[1])).toEqual(['c1', 'c2', 'c3']);
    expect(engine.calls.map((call) => call.commit.commit_hash)).toEqual(['c1', 'c2', 'c3']);
  });

  it('stores and analyzes the head commit of a pull request', async () => {
    const eventId = await enqueueWebhook(store, pullRequestPayload(), { eventType: 'pull_request' });

    const outcome = await dispatcher.processEvent(await claim(store), 'worker-1');

    expect(outcome).toMatchObject({ state: 'DONE', commits: 1, newCommits: 1 });
    expect(store.event(eventId).state).toBe('DONE');
    expect(store.commitByHash('abc123')).toMatchObject({
      branch: 'feature/sizing',
      message: 'Size widgets by content',
    });
    expect(engine.calls.map((call) => call.commit.commit_hash)).toEqual(['abc123']);
  });

  it('completes GitHub events that carry no commits', async () => {
    const payload = { action: 'opened', issue: { number: 7 } };
    const eventId = await enqueueWebhook(store, payload, { eventType: 'issues' });

    const outcome = await dispatcher.processEvent(await claim(store), 'worker-1');

    expect(outcome).toMatchObject({ state: 'DONE', commits: 0, error: null });
    expect(store.event(eventId)).toMatchObject({ state: 'DONE', last_error: null });
    expect(store.repositories.size).toBe(0);
    expect(engine.calls).toHaveLength(0);
  });
});
