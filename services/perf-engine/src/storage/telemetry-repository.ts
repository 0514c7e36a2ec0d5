import type { JobRecord, Run, RunSummary, Sample } from '../types/index.js';
import type { JobRow, RunRow, SampleRow } from './schema.js';

export type PersistedSample = Omit<Sample, 'jobCount'>;
export type PersistedJob = Omit<JobRecord, 'attempts' | 'outcome'>;

export type RepositoryKind = 'postgres' | 'memory';

/**
 * Storage contract behind the TelemetryStore. Inserts of a Sample or
 * JobRecord whose id already exists are no-ops.
 */
export interface TelemetryRepository {
  readonly kind: RepositoryKind;
  insertRun(run: Run): Promise<void>;
  /** Sets finished_at only while it is still null; resolves whether a row changed. */
  finishRun(runId: string, finishedAt: Date): Promise<boolean>;
  insertSample(sample: Sample): Promise<void>;
  insertJob(record: JobRecord): Promise<void>;
  getRun(runId: string): Promise<Run | null>;
  listSamples(runId: string): Promise<PersistedSample[]>;
  listJobs(runId: string): Promise<PersistedJob[]>;
  summarize(runId: string): Promise<RunSummary | null>;
  close(): Promise<void>;
}

// Row mapping shared by both repositories

export function toRunRow(run: Run): RunRow {
  return {
    runId: run.runId,
    startedAt: run.startedAt,
    finishedAt: run.finishedAt,
    modelId: run.modelId,
    host: run.host,
    notes: run.notes,
  };
}

export function fromRunRow(row: RunRow): Run {
  return { ...row };
}

export function toSampleRow(sample: Sample): SampleRow {
  return {
    id: sample.id,
    runId: sample.runId,
    ts: sample.ts,
    windowSec: sample.windowSec,
    concurrency: sample.concurrency,
    queueDepth: sample.queueDepth,
    throughputRps: sample.throughputRps,
    p50Ms: Math.round(sample.p50Ms),
    p95Ms: Math.round(sample.p95Ms),
    errorRate: sample.errorRate,
    tokensIn: sample.tokensIn,
    tokensOut: sample.tokensOut,
  };
}

export function fromSampleRow(row: SampleRow): PersistedSample {
  return { ...row };
}

export function toJobRow(record: JobRecord): JobRow {
  return {
    id: record.id,
    runId: record.runId,
    startedAt: record.startedAt,
    finishedAt: record.finishedAt,
    latencyMs: Math.round(record.latencyMs),
    modelId: record.modelId,
    promptTokens: record.promptTokens,
    completionTokens: record.completionTokens,
    httpStatus: record.httpStatus,
    errorText: record.errorText,
  };
}

export function fromJobRow(row: JobRow): PersistedJob {
  return { ...row };
}

export interface SummaryInputs {
  run: Run;
  totalJobs: number;
  failedJobs: number;
  avgLatencyMs: number;
  maxLatencyMs: number;
  totalCompletionTokens: number;
  sampleCount: number;
  best: Pick<PersistedSample, 'throughputRps' | 'concurrency' | 'p95Ms'> | null;
}

export function buildRunSummary(inputs: SummaryInputs): RunSummary {
  return {
    runId: inputs.run.runId,
    modelId: inputs.run.modelId,
    host: inputs.run.host,
    startedAt: inputs.run.startedAt,
    finishedAt: inputs.run.finishedAt,
    totalJobs: inputs.totalJobs,
    failedJobs: inputs.failedJobs,
    avgLatencyMs: inputs.avgLatencyMs,
    maxLatencyMs: inputs.maxLatencyMs,
    totalCompletionTokens: inputs.totalCompletionTokens,
    sampleCount: inputs.sampleCount,
    bestThroughputRps: inputs.best?.throughputRps ?? 0,
    bestConcurrency: inputs.best?.concurrency ?? 0,
    bestP95Ms: inputs.best?.p95Ms ?? 0,
  };
}
