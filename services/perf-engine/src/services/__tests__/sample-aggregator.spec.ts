import { describe, expect, it } from 'vitest';

import { RUN_ID, makeRecord } from '../../__tests__/fixtures.js';
import { SampleAggregator, percentile } from '../sample-aggregator.js';

const NOW = 2_000_000;
const context = { now: NOW, runId: RUN_ID, concurrency: 3, queueDepth: 4 };

describe('percentile', () => {
  it('uses the nearest rank', () => {
    const values = [10, 20, 30, 40, 50, 60, 70, 80, 90, 100];
    expect(percentile(values, 0.5)).toBe(50);
    expect(percentile(values, 0.95)).toBe(100);
    expect(percentile([7], 0.95)).toBe(7);
    expect(percentile([], 0.5)).toBe(0);
  });
});

describe('SampleAggregator', () => {
  it('reports zeros for an empty window', () => {
    const aggregator = new SampleAggregator(30);
    const sample = aggregator.tick(context);

    expect(sample).toMatchObject({
      runId: RUN_ID,
      windowSec: 30,
      concurrency: 3,
      queueDepth: 4,
      jobCount: 0,
      throughputRps: 0,
      p50Ms: 0,
      p95Ms: 0,
      errorRate: 0,
      tokensIn: 0,
      tokensOut: 0,
    });
    expect(sample.ts.getTime()).toBe(NOW);
  });

  it('computes throughput, percentiles and token sums over the window', () => {
    const aggregator = new SampleAggregator(30);
    for (let i = 1; i <= 10; i++) {
      aggregator.record(makeRecord({ latencyMs: i * 100, finishedAt: new Date(NOW - i * 1000) }));
    }

    const sample = aggregator.tick(context);

    expect(sample.jobCount).toBe(10);
    expect(sample.throughputRps).toBeCloseTo(10 / 30, 10);
    expect(sample.p50Ms).toBe(500);
    expect(sample.p95Ms).toBe(1000);
    expect(sample.errorRate).toBe(0);
    expect(sample.tokensIn).toBe(50);
    expect(sample.tokensOut).toBe(100);
  });

  it('takes latency percentiles from successful jobs only but counts failures in the error rate', () => {
    const aggregator = new SampleAggregator(30);
    for (const latencyMs of [100, 200, 300, 400]) {
      aggregator.record(makeRecord({ latencyMs, finishedAt: new Date(NOW - 1000) }));
    }
    aggregator.record(
      makeRecord({
        latencyMs: 5000,
        finishedAt: new Date(NOW - 1000),
        outcome: 'failed',
        httpStatus: 503,
        errorText: 'unavailable',
        completionTokens: 0,
      })
    );

    const sample = aggregator.tick(context);

    expect(sample.p95Ms).toBe(400);
    expect(sample.errorRate).toBeCloseTo(0.2, 10);
    expect(sample.tokensOut).toBe(40);
  });

  it('falls back to all latencies when nothing succeeded', () => {
    const aggregator = new SampleAggregator(30);
    aggregator.record(makeRecord({ latencyMs: 700, outcome: 'failed', finishedAt: new Date(NOW - 10) }));
    aggregator.record(makeRecord({ latencyMs: 900, outcome: 'cancelled', finishedAt: new Date(NOW - 10) }));

    const sample = aggregator.tick(context);

    expect(sample.p50Ms).toBe(700);
    expect(sample.p95Ms).toBe(900);
    expect(sample.errorRate).toBe(1);
  });

  it('drops records that finished at or before the window start', () => {
    const aggregator = new SampleAggregator(30);
    aggregator.record(makeRecord({ finishedAt: new Date(NOW - 30_000) }));
    aggregator.record(makeRecord({ finishedAt: new Date(NOW - 29_999) }));

    const sample = aggregator.tick(context);

    expect(sample.jobCount).toBe(1);
    expect(aggregator.size).toBe(1);
  });

  it('keeps sample timestamps strictly increasing', () => {
    const aggregator = new SampleAggregator(30);
    const first = aggregator.tick(context);
    const second = aggregator.tick(context);

    expect(second.ts.getTime()).toBe(first.ts.getTime() + 1);
    expect(second.id).not.toBe(first.id);
  });
});
