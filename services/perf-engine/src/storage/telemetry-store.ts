import { v4 as uuidv4 } from 'uuid';
import type { JobRecord, Run, RunSummary, Sample } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import type { PersistedJob, PersistedSample, RepositoryKind, TelemetryRepository } from './telemetry-repository.js';

export class TelemetryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TelemetryError';
  }
}

export interface TelemetryStoreOptions {
  /** Job and sample writes beyond this many in flight are dropped and counted. */
  maxPendingWrites?: number;
}

export interface StartRunParams {
  modelId: string;
  host: string;
  notes?: string;
  startedAt?: Date;
}

/**
 * Append-only telemetry for one Run at a time.
 *
 * Writes are best-effort: they run without blocking the caller, and a
 * failure is logged and discarded. Sample and job rows wait only for their
 * run row, then go out concurrently. `flush` waits for whatever is in flight.
 */
export class TelemetryStore {
  private activeRun: Run | null = null;
  private readonly pending: Set<Promise<void>> = new Set();
  private runWrite: Promise<void> = Promise.resolve();
  private readonly logger: Logger;
  private readonly maxPendingWrites: number;
  private failedWrites = 0;
  private droppedWriteCount = 0;
  private overflowing = false;

  constructor(
    private readonly repository: TelemetryRepository,
    logger: Logger,
    options: TelemetryStoreOptions = {}
  ) {
    this.logger = logger.child({ component: 'telemetry' });
    this.maxPendingWrites = options.maxPendingWrites ?? 1000;
  }

  get mode(): RepositoryKind {
    return this.repository.kind;
  }

  get writeFailures(): number {
    return this.failedWrites;
  }

  get droppedWrites(): number {
    return this.droppedWriteCount;
  }

  get pendingWrites(): number {
    return this.pending.size;
  }

  getActiveRun(): Run | null {
    return this.activeRun;
  }

  startRun(params: StartRunParams): Run {
    if (this.activeRun && this.activeRun.finishedAt === null) {
      throw new TelemetryError(`Run ${this.activeRun.runId} is still active`);
    }

    const run: Run = {
      runId: uuidv4(),
      startedAt: params.startedAt ?? new Date(),
      finishedAt: null,
      modelId: params.modelId,
      host: params.host,
      notes: params.notes ?? null,
    };
    this.activeRun = run;
    this.runWrite = this.track('insertRun', Promise.resolve(), () => this.repository.insertRun({ ...run }));
    this.logger.info({ runId: run.runId, modelId: run.modelId, mode: this.mode }, 'Run started');
    return run;
  }

  recordSample(sample: Sample): void {
    this.trackBounded('insertSample', () => this.repository.insertSample(sample));
  }

  recordJob(record: JobRecord): void {
    this.trackBounded('insertJob', () => this.repository.insertJob(record));
  }

  /**
   * Set the active Run's finished_at. Only the first call has any effect.
   */
  endRun(finishedAt: Date = new Date()): Run | null {
    const run = this.activeRun;
    if (!run || run.finishedAt !== null) {
      return null;
    }
    run.finishedAt = finishedAt;
    this.track('finishRun', this.runWrite, async () => {
      await this.repository.finishRun(run.runId, finishedAt);
    });
    this.logger.info(
      { runId: run.runId, durationSec: (finishedAt.getTime() - run.startedAt.getTime()) / 1000 },
      'Run finished'
    );
    return { ...run };
  }

  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  async close(): Promise<void> {
    await this.flush();
    await this.repository.close();
  }

  getRun(runId: string): Promise<Run | null> {
    return this.repository.getRun(runId);
  }

  listSamples(runId: string): Promise<PersistedSample[]> {
    return this.repository.listSamples(runId);
  }

  listJobs(runId: string): Promise<PersistedJob[]> {
    return this.repository.listJobs(runId);
  }

  getRunSummary(runId: string): Promise<RunSummary | null> {
    return this.repository.summarize(runId);
  }

  private trackBounded(operation: string, write: () => Promise<void>): void {
    if (this.pending.size >= this.maxPendingWrites) {
      this.droppedWriteCount++;
      if (!this.overflowing) {
        this.overflowing = true;
        this.logger.warn(
          { operation, maxPendingWrites: this.maxPendingWrites },
          'Telemetry backlog full; dropping writes'
        );
      }
      return;
    }
    if (this.overflowing) {
      this.overflowing = false;
      this.logger.info({ dropped: this.droppedWriteCount }, 'Telemetry backlog recovered');
    }
    this.track(operation, this.runWrite, write);
  }

  private track(operation: string, after: Promise<void>, write: () => Promise<void>): Promise<void> {
    const task: Promise<void> = after
      .then(write)
      .catch((error: unknown) => {
        this.failedWrites++;
        this.logger.warn({ err: error, operation }, 'Telemetry write failed; discarding');
      })
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
    return task;
  }
}
