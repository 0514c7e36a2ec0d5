import { describe, expect, it } from 'vitest';

import { UpstreamError } from '../../clients/completion-client.js';
import { RetryPolicy, classifyFailure } from '../retry-policy.js';

const settings = { maxRetries: 3, baseDelayMs: 1000, maxDelayMs: 30_000 };

describe('classifyFailure', () => {
  it('treats rate limits, server errors, timeouts and transport failures as transient', () => {
    expect(classifyFailure(UpstreamError.fromStatus(429, 'slow down'))).toBe('transient');
    expect(classifyFailure(UpstreamError.fromStatus(503, 'unavailable'))).toBe('transient');
    expect(classifyFailure(new UpstreamError('timed out', 'timeout'))).toBe('transient');
    expect(classifyFailure(new UpstreamError('reset', 'transport'))).toBe('transient');
  });

  it('treats other client errors and local cancellation as permanent', () => {
    expect(classifyFailure(UpstreamError.fromStatus(400, 'bad request'))).toBe('permanent');
    expect(classifyFailure(UpstreamError.fromStatus(404, 'no such model'))).toBe('permanent');
    expect(classifyFailure(new UpstreamError('aborted', 'cancelled'))).toBe('permanent');
  });

  it('treats unknown thrown values as transient', () => {
    expect(classifyFailure(new Error('boom'))).toBe('transient');
  });
});

describe('RetryPolicy', () => {
  it('allows MAX_RETRIES retries of a transient failure', () => {
    const policy = new RetryPolicy(settings, () => 0);
    const error = UpstreamError.fromStatus(500, 'oops');

    expect(policy.shouldRetry(error, 0)).toBe(true);
    expect(policy.shouldRetry(error, 2)).toBe(true);
    expect(policy.shouldRetry(error, 3)).toBe(false);
  });

  it('never retries a permanent failure', () => {
    const policy = new RetryPolicy(settings, () => 0);
    expect(policy.shouldRetry(UpstreamError.fromStatus(401, 'denied'), 0)).toBe(false);
  });

  it('doubles the delay per attempt and adds jitter up to one base delay', () => {
    const noJitter = new RetryPolicy(settings, () => 0);
    expect([0, 1, 2, 3].map((attempt) => noJitter.backoffMs(attempt))).toEqual([1000, 2000, 4000, 8000]);

    const halfJitter = new RetryPolicy(settings, () => 0.5);
    expect(halfJitter.backoffMs(1)).toBe(2500);
  });

  it('caps the delay at maxDelayMs', () => {
    const policy = new RetryPolicy(settings, () => 0.99);
    expect(policy.backoffMs(10)).toBe(30_000);
  });
});
