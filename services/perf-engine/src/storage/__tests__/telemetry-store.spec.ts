import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { makeRecord, makeSample, silentLogger } from '../../__tests__/fixtures.js';
import type { JobRecord } from '../../types/index.js';
import { delay } from '../../utils/timers.js';
import { MemoryTelemetryRepository } from '../memory-repository.js';
import type { TelemetryRepository } from '../telemetry-repository.js';
import { TelemetryError, TelemetryStore } from '../telemetry-store.js';

function createStore() {
  const repository = new MemoryTelemetryRepository();
  const store = new TelemetryStore(repository, silentLogger);
  const run = store.startRun({ modelId: 'test-model', host: 'test-host', startedAt: new Date(1_000_000) });
  return { repository, store, run };
}

class FailingJobRepository extends MemoryTelemetryRepository {
  override async insertJob(): Promise<void> {
    throw new Error('connection reset');
  }
}

class SlowJobRepository extends MemoryTelemetryRepository {
  override async insertJob(record: JobRecord): Promise<void> {
    await delay(20);
    await super.insertJob(record);
  }
}

describe('TelemetryStore', () => {
  it('reads back a JobRecord with identical persisted fields', async () => {
    const { store, run } = createStore();
    const record = makeRecord({
      runId: run.runId,
      latencyMs: 123,
      httpStatus: 429,
      errorText: 'rate limited',
      outcome: 'failed',
      attempts: 4,
      completionTokens: 0,
    });

    store.recordJob(record);
    await store.flush();

    const { attempts, outcome, ...persisted } = record;
    expect(attempts).toBe(4);
    expect(outcome).toBe('failed');
    expect(await store.listJobs(run.runId)).toEqual([persisted]);
  });

  it('ignores a Sample persisted twice', async () => {
    const { store, run } = createStore();
    const sample = makeSample({ runId: run.runId, throughputRps: 2.5 });

    store.recordSample(sample);
    store.recordSample(sample);
    await store.flush();

    expect(await store.listSamples(run.runId)).toHaveLength(1);
    const summary = await store.getRunSummary(run.runId);
    expect(summary?.sampleCount).toBe(1);
    expect(summary?.bestThroughputRps).toBe(2.5);
  });

  it('ignores a JobRecord persisted twice', async () => {
    const { store, run } = createStore();
    const record = makeRecord({ runId: run.runId });

    store.recordJob(record);
    store.recordJob(record);
    await store.flush();

    expect(await store.listJobs(run.runId)).toHaveLength(1);
  });

  it('sets finished_at exactly once', async () => {
    const { store, run } = createStore();

    const ended = store.endRun(new Date(1_120_000));
    const again = store.endRun(new Date(1_500_000));
    await store.flush();

    expect(ended?.finishedAt).toEqual(new Date(1_120_000));
    expect(again).toBeNull();
    expect((await store.getRun(run.runId))?.finishedAt).toEqual(new Date(1_120_000));
  });

  it('refuses to start a second run while one is active', () => {
    const { store } = createStore();

    expect(() => store.startRun({ modelId: 'other', host: 'test-host' })).toThrow(TelemetryError);
  });

  it('starts a new run after the previous one ended', () => {
    const { store, run } = createStore();
    store.endRun();

    const next = store.startRun({ modelId: 'test-model', host: 'test-host' });
    expect(next.runId).not.toBe(run.runId);
    expect(store.getActiveRun()?.runId).toBe(next.runId);
  });

  it('logs and discards write failures without surfacing them', async () => {
    const repository: TelemetryRepository = new FailingJobRepository();
    const store = new TelemetryStore(repository, silentLogger);
    const run = store.startRun({ modelId: 'test-model', host: 'test-host' });

    expect(() => store.recordJob(makeRecord({ runId: run.runId }))).not.toThrow();
    store.recordSample(makeSample({ runId: run.runId }));
    await expect(store.flush()).resolves.toBeUndefined();

    expect(store.writeFailures).toBe(1);
    expect(await store.listSamples(run.runId)).toHaveLength(1);
    expect(store.mode).toBe('memory');
  });

  it('summarizes jobs and the best sample of a run', async () => {
    const { store, run } = createStore();
    store.recordJob(makeRecord({ runId: run.runId, latencyMs: 100 }));
    store.recordJob(makeRecord({ runId: run.runId, latencyMs: 200 }));
    store.recordJob(
      makeRecord({
        runId: run.runId,
        latencyMs: 600,
        outcome: 'failed',
        httpStatus: 500,
        errorText: 'down',
        completionTokens: 0,
      })
    );
    store.recordSample(
      makeSample({ id: '00000000-0000-4000-a000-00000000000a', runId: run.runId, throughputRps: 1, concurrency: 2, p95Ms: 1000 })
    );
    store.recordSample(
      makeSample({
        id: '00000000-0000-4000-a000-00000000000b',
        runId: run.runId,
        ts: new Date(1_015_000),
        throughputRps: 3,
        concurrency: 4,
        p95Ms: 1500,
      })
    );
    store.endRun(new Date(1_060_000));
    await store.flush();

    expect(await store.getRunSummary(run.runId)).toEqual({
      runId: run.runId,
      modelId: 'test-model',
      host: 'test-host',
      startedAt: new Date(1_000_000),
      finishedAt: new Date(1_060_000),
      totalJobs: 3,
      failedJobs: 1,
      avgLatencyMs: 300,
      maxLatencyMs: 600,
      totalCompletionTokens: 20,
      sampleCount: 2,
      bestThroughputRps: 3,
      bestConcurrency: 4,
      bestP95Ms: 1500,
    });
  });

  it('returns null for an unknown run', async () => {
    const { store } = createStore();
    expect(await store.getRunSummary('00000000-0000-4000-8000-00000000ffff')).toBeNull();
  });
});

describe('TelemetryStore against a slow repository', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('writes concurrently and drops writes beyond the backlog limit', async () => {
    const store = new TelemetryStore(new SlowJobRepository(), silentLogger, { maxPendingWrites: 100 });
    const run = store.startRun({ modelId: 'test-model', host: 'test-host' });
    await store.flush();

    for (let i = 0; i < 250; i++) {
      store.recordJob(makeRecord({ runId: run.runId }));
    }

    expect(store.pendingWrites).toBe(100);
    expect(store.droppedWrites).toBe(150);

    // one insert latency covers the whole accepted batch
    await vi.advanceTimersByTimeAsync(20);
    expect(store.pendingWrites).toBe(0);
    expect(await store.listJobs(run.runId)).toHaveLength(100);

    store.recordJob(makeRecord({ runId: run.runId }));
    await vi.advanceTimersByTimeAsync(20);
    await store.flush();

    expect(await store.listJobs(run.runId)).toHaveLength(101);
    expect(store.droppedWrites).toBe(150);
    expect(store.writeFailures).toBe(0);
  });

  it('never drops the run rows', async () => {
    const store = new TelemetryStore(new SlowJobRepository(), silentLogger, { maxPendingWrites: 1 });
    const run = store.startRun({ modelId: 'test-model', host: 'test-host' });
    store.recordJob(makeRecord({ runId: run.runId }));
    store.endRun(new Date(2_000_000));

    await vi.advanceTimersByTimeAsync(20);
    await store.flush();

    expect(store.droppedWrites).toBe(1);
    expect((await store.getRun(run.runId))?.finishedAt).toEqual(new Date(2_000_000));
  });
});
