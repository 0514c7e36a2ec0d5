import { loadPerfConfig, type PerfConfig } from '../config/perf-config.js';
import type { JobRecord, Sample } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

export const silentLogger = createLogger({ name: 'test', level: 'silent' });

export const RUN_ID = '00000000-0000-4000-8000-000000000001';

export function testConfig(env: Record<string, string> = {}): PerfConfig {
  return loadPerfConfig({
    HOST_LABEL: 'test-host',
    LLM_ENDPOINT: 'http://127.0.0.1:9/v1/chat/completions',
    LLM_API_KEY: 'test-secret',
    ...env,
  });
}

let recordCounter = 0;

export function makeRecord(overrides: Partial<JobRecord> = {}): JobRecord {
  recordCounter++;
  const finishedAt = overrides.finishedAt ?? new Date(1_000_000);
  const latencyMs = overrides.latencyMs ?? 100;
  return {
    id: `00000000-0000-4000-9000-${String(recordCounter).padStart(12, '0')}`,
    runId: RUN_ID,
    startedAt: new Date(finishedAt.getTime() - latencyMs),
    finishedAt,
    latencyMs,
    modelId: 'test-model',
    promptTokens: 5,
    completionTokens: 10,
    httpStatus: 200,
    errorText: null,
    attempts: 1,
    outcome: 'success',
    ...overrides,
  };
}

export function makeSample(overrides: Partial<Sample> = {}): Sample {
  return {
    id: '00000000-0000-4000-a000-000000000001',
    runId: RUN_ID,
    ts: new Date(1_000_000),
    windowSec: 30,
    concurrency: 2,
    queueDepth: 0,
    throughputRps: 1,
    p50Ms: 500,
    p95Ms: 1000,
    errorRate: 0,
    tokensIn: 100,
    tokensOut: 200,
    jobCount: 30,
    ...overrides,
  };
}
