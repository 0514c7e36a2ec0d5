import type { JobRecord, Run, RunSummary, Sample } from '../types/index.js';
import type { JobRow, RunRow, SampleRow } from './schema.js';
import {
  buildRunSummary,
  fromJobRow,
  fromRunRow,
  fromSampleRow,
  toJobRow,
  toRunRow,
  toSampleRow,
  type PersistedJob,
  type PersistedSample,
  type TelemetryRepository,
} from './telemetry-repository.js';

export interface MemoryRepositoryOptions {
  /** Oldest job rows are evicted past this count. */
  maxJobs?: number;
}

/**
 * In-process repository. Backs logging-only mode when PostgreSQL is not
 * configured or unreachable, and stands in for the database in tests.
 */
export class MemoryTelemetryRepository implements TelemetryRepository {
  readonly kind = 'memory' as const;
  private readonly runs: Map<string, RunRow> = new Map();
  private readonly samples: Map<string, SampleRow> = new Map();
  private readonly jobs: Map<string, JobRow> = new Map();
  private readonly maxJobs: number;

  constructor(options: MemoryRepositoryOptions = {}) {
    this.maxJobs = options.maxJobs ?? 100_000;
  }

  async insertRun(run: Run): Promise<void> {
    if (!this.runs.has(run.runId)) {
      this.runs.set(run.runId, toRunRow(run));
    }
  }

  async finishRun(runId: string, finishedAt: Date): Promise<boolean> {
    const row = this.runs.get(runId);
    if (!row || row.finishedAt !== null) {
      return false;
    }
    this.runs.set(runId, { ...row, finishedAt });
    return true;
  }

  async insertSample(sample: Sample): Promise<void> {
    if (!this.samples.has(sample.id)) {
      this.samples.set(sample.id, toSampleRow(sample));
    }
  }

  async insertJob(record: JobRecord): Promise<void> {
    if (this.jobs.has(record.id)) return;
    this.jobs.set(record.id, toJobRow(record));
    while (this.jobs.size > this.maxJobs) {
      const oldest = this.jobs.keys().next();
      if (oldest.done) break;
      this.jobs.delete(oldest.value);
    }
  }

  async getRun(runId: string): Promise<Run | null> {
    const row = this.runs.get(runId);
    return row ? fromRunRow(row) : null;
  }

  async listSamples(runId: string): Promise<PersistedSample[]> {
    return [...this.samples.values()]
      .filter((row) => row.runId === runId)
      .sort((a, b) => a.ts.getTime() - b.ts.getTime())
      .map(fromSampleRow);
  }

  async listJobs(runId: string): Promise<PersistedJob[]> {
    return [...this.jobs.values()].filter((row) => row.runId === runId).map(fromJobRow);
  }

  async summarize(runId: string): Promise<RunSummary | null> {
    const run = await this.getRun(runId);
    if (!run) return null;

    const jobs = await this.listJobs(runId);
    const samples = await this.listSamples(runId);

    let latencyTotal = 0;
    let maxLatencyMs = 0;
    let failedJobs = 0;
    let totalCompletionTokens = 0;
    for (const job of jobs) {
      latencyTotal += job.latencyMs;
      maxLatencyMs = Math.max(maxLatencyMs, job.latencyMs);
      totalCompletionTokens += job.completionTokens;
      if (job.errorText !== null) failedJobs++;
    }

    let best: PersistedSample | null = null;
    for (const sample of samples) {
      if (!best || sample.throughputRps > best.throughputRps) {
        best = sample;
      }
    }

    return buildRunSummary({
      run,
      totalJobs: jobs.length,
      failedJobs,
      avgLatencyMs: jobs.length > 0 ? latencyTotal / jobs.length : 0,
      maxLatencyMs,
      totalCompletionTokens,
      sampleCount: samples.length,
      best,
    });
  }

  async close(): Promise<void> {
    // nothing to release
  }
}
