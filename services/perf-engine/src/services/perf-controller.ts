import { v4 as uuidv4 } from 'uuid';
import type { CompletionClient } from '../clients/completion-client.js';
import type { PerfConfig } from '../config/perf-config.js';
import type { TelemetryStore } from '../storage/telemetry-store.js';
import type {
  AdmissionResult,
  ControllerState,
  Job,
  JobInput,
  JobRecord,
  PerfSnapshot,
  RunSummary,
  Sample,
  ShutdownReport,
  TuningDecision,
} from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { ConcurrencyTuner } from './concurrency-tuner.js';
import { RequestQueue } from './request-queue.js';
import { RetryPolicy } from './retry-policy.js';
import { SampleAggregator } from './sample-aggregator.js';
import { WorkerPool } from './worker-pool.js';

export type ControllerConfig = Pick<
  PerfConfig,
  | 'concurrency'
  | 'tuner'
  | 'sampleWindowSec'
  | 'tuneIntervalSec'
  | 'queueCapacity'
  | 'workerPollMs'
  | 'retry'
  | 'drainTimeoutMs'
  | 'upstream'
  | 'telemetry'
>;

export interface PerfControllerOptions {
  config: ControllerConfig;
  client: CompletionClient;
  store: TelemetryStore;
  logger: Logger;
  now?: () => number;
  random?: () => number;
}

export type SampleListener = (sample: Sample, decision: TuningDecision | null) => void;

export interface ControllerStats {
  accepted: number;
  rejected: number;
  completed: number;
  failed: number;
}

/**
 * Owns the request queue and the worker target, and runs the periodic
 * aggregate → persist → tune → broadcast tick. Nothing else mutates either.
 */
export class PerfController {
  private readonly queue: RequestQueue<Job>;
  private readonly pool: WorkerPool;
  private readonly aggregator: SampleAggregator;
  private readonly tuner: ConcurrencyTuner;
  private readonly listeners: Set<SampleListener> = new Set();
  private readonly now: () => number;
  private readonly logger: Logger;

  private state: ControllerState = 'idle';
  private runId: string | null = null;
  private tickTimer: NodeJS.Timeout | null = null;
  private latestSample: Sample | null = null;
  private stopPromise: Promise<ShutdownReport> | null = null;
  private readonly stats: ControllerStats = { accepted: 0, rejected: 0, completed: 0, failed: 0 };

  constructor(private readonly options: PerfControllerOptions) {
    const { config } = options;
    this.now = options.now ?? Date.now;
    this.logger = options.logger.child({ component: 'controller' });

    this.queue = new RequestQueue<Job>(config.queueCapacity);
    this.aggregator = new SampleAggregator(config.sampleWindowSec);
    this.tuner = new ConcurrencyTuner(config.tuner);
    this.pool = new WorkerPool({
      queue: this.queue,
      client: options.client,
      retryPolicy: new RetryPolicy(config.retry, options.random),
      bounds: config.concurrency,
      pollMs: config.workerPollMs,
      runId: () => this.requireRunId(),
      onRecord: (record) => this.handleRecord(record),
      logger: options.logger,
      now: this.now,
    });
  }

  async start(): Promise<string> {
    if (this.state !== 'idle') {
      throw new Error(`Controller cannot start from state ${this.state}`);
    }

    const { config, store } = this.options;
    const run = store.startRun({
      modelId: config.upstream.modelId,
      host: config.telemetry.host,
      notes: config.telemetry.notes,
      startedAt: new Date(this.now()),
    });
    this.runId = run.runId;

    this.pool.start(config.concurrency.start);
    this.tickTimer = setInterval(() => {
      this.tick();
    }, config.tuneIntervalSec * 1000);
    this.state = 'running';

    this.logger.info(
      {
        runId: run.runId,
        concurrency: config.concurrency,
        targetP95Ms: config.tuner.targetP95Ms,
        targetErrorRate: config.tuner.targetErrorRate,
        queueCapacity: config.queueCapacity,
      },
      'Controller started'
    );
    return run.runId;
  }

  submit(input: JobInput): AdmissionResult {
    if (this.state !== 'running') {
      this.stats.rejected++;
      return { accepted: false, reason: 'stopping' };
    }

    const job = this.buildJob(input);
    const result = this.queue.offer(job);
    if (!result.accepted) {
      this.stats.rejected++;
      return result;
    }

    this.stats.accepted++;
    return { accepted: true, jobId: job.id };
  }

  /**
   * Produce one Sample and, while running, apply one tuning decision.
   */
  tick(): Sample {
    const sample = this.aggregator.tick({
      now: this.now(),
      runId: this.requireRunId(),
      concurrency: this.pool.getTarget(),
      queueDepth: this.queue.depth,
    });
    this.latestSample = sample;
    this.options.store.recordSample(sample);

    let decision: TuningDecision | null = null;
    if (this.state === 'running') {
      decision = this.tuner.evaluate(sample);
      if (decision.to !== decision.from) {
        this.pool.resize(decision.to);
      }
      this.logger.info(
        {
          conc: `${decision.from}->${decision.to}`,
          q: sample.queueDepth,
          rps: Number(sample.throughputRps.toFixed(2)),
          p95: sample.p95Ms,
          err: Number(sample.errorRate.toFixed(3)),
          decision: decision.direction.toUpperCase(),
          reason: decision.reason,
        },
        'Tuner decision'
      );
    }

    for (const listener of this.listeners) {
      try {
        listener(sample, decision);
      } catch (error) {
        this.logger.error({ err: error }, 'Sample listener failed');
      }
    }
    return sample;
  }

  onSample(listener: SampleListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Stop accepting jobs, drain within the timeout, then cancel what is left.
   * Safe to call more than once; later calls share the first result.
   */
  stop(drainTimeoutMs: number = this.options.config.drainTimeoutMs): Promise<ShutdownReport> {
    if (!this.stopPromise) {
      this.stopPromise = this.performStop(drainTimeoutMs);
    }
    return this.stopPromise;
  }

  getState(): ControllerState {
    return this.state;
  }

  getRunId(): string | null {
    return this.runId;
  }

  getLatestSample(): Sample | null {
    return this.latestSample;
  }

  getStats(): ControllerStats {
    return { ...this.stats };
  }

  getRunSummary(): Promise<RunSummary | null> {
    return this.runId ? this.options.store.getRunSummary(this.runId) : Promise.resolve(null);
  }

  isIdle(): boolean {
    return this.queue.depth === 0 && this.pool.getStatus().busy === 0;
  }

  getSnapshot(): PerfSnapshot {
    return {
      runId: this.runId,
      state: this.state,
      latestSample: this.latestSample,
      lastDecision: this.tuner.getLastDecision(),
      pool: this.pool.getStatus(),
      queue: {
        depth: this.queue.depth,
        capacity: this.queue.maxDepth,
      },
      bounds: this.tuner.bounds,
      timestamp: new Date(this.now()).toISOString(),
    };
  }

  private async performStop(drainTimeoutMs: number): Promise<ShutdownReport> {
    if (this.state === 'idle') {
      this.state = 'stopped';
      return { drained: true, cancelledJobs: 0, discardedJobs: 0, finalSample: null };
    }

    this.state = 'stopping';
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = null;
    }
    this.queue.close();
    this.logger.info({ drainTimeoutMs, queued: this.queue.depth }, 'Stopping: draining in-flight jobs');

    const drained = await this.pool.drain(drainTimeoutMs);
    let discardedJobs = 0;
    let cancelledJobs = 0;
    if (!drained) {
      discardedJobs = this.queue.drain().length;
      cancelledJobs = await this.pool.forceStop();
      this.logger.warn({ cancelledJobs, discardedJobs }, 'Drain timeout exceeded; cancelled remaining jobs');
    }

    const finalSample = this.tick();
    this.options.store.endRun(new Date(this.now()));
    await this.options.store.flush();
    this.state = 'stopped';
    this.logger.info({ stats: this.stats }, 'Controller stopped');

    return { drained, cancelledJobs, discardedJobs, finalSample };
  }

  private handleRecord(record: JobRecord): void {
    if (record.outcome === 'success') {
      this.stats.completed++;
    } else {
      this.stats.failed++;
    }
    this.aggregator.record(record);
    this.options.store.recordJob(record);
  }

  private buildJob(input: JobInput): Job {
    const { upstream } = this.options.config;
    const messages = input.messages && input.messages.length > 0
      ? input.messages
      : input.prompt
        ? [{ role: 'user' as const, content: input.prompt }]
        : null;
    if (!messages) {
      throw new Error('A job needs a prompt or at least one message');
    }

    return {
      id: uuidv4(),
      messages,
      modelId: input.model ?? upstream.modelId,
      maxTokens: input.maxTokens ?? upstream.maxTokens,
      temperature: input.temperature ?? upstream.temperature,
      createdAt: new Date(this.now()),
    };
  }

  private requireRunId(): string {
    if (!this.runId) {
      throw new Error('No active run; call start() first');
    }
    return this.runId;
  }
}
