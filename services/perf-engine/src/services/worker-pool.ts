import { UpstreamError, countWords, type CompletionClient } from '../clients/completion-client.js';
import type { ConcurrencyBounds } from '../config/perf-config.js';
import type { Job, JobOutcome, JobRecord, WorkerPoolStatus } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { delay } from '../utils/timers.js';
import type { RequestQueue } from './request-queue.js';
import type { RetryPolicy } from './retry-policy.js';

const MAX_ERROR_TEXT = 500;
export const DRAIN_CANCEL_MESSAGE = 'cancelled: drain timeout exceeded';

interface Executor {
  id: number;
  retiring: boolean;
  exiting: boolean;
  busy: boolean;
  wake: AbortController;
  done: Promise<void>;
}

export interface WorkerPoolOptions {
  queue: RequestQueue<Job>;
  client: CompletionClient;
  retryPolicy: RetryPolicy;
  bounds: ConcurrencyBounds;
  pollMs: number;
  runId: () => string;
  onRecord: (record: JobRecord) => void;
  logger: Logger;
  now?: () => number;
}

interface Attempt {
  outcome: JobOutcome;
  attempts: number;
  httpStatus: number | null;
  errorText: string | null;
  promptTokens: number;
  completionTokens: number;
}

export function clampConcurrency(value: number, bounds: ConcurrencyBounds): number {
  return Math.max(bounds.min, Math.min(bounds.max, Math.round(value)));
}

/**
 * Resizable set of executors pulling jobs from the request queue.
 *
 * Each executor emits exactly one JobRecord per job it takes. Shrinking
 * retires executors: idle ones exit at once, busy ones after their current
 * job. Only `forceStop` aborts in-flight upstream calls.
 */
export class WorkerPool {
  private readonly executors: Map<number, Executor> = new Map();
  private readonly hardStop = new AbortController();
  private readonly now: () => number;
  private readonly logger: Logger;
  private nextExecutorId = 1;
  private target = 0;

  constructor(private readonly options: WorkerPoolOptions) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger.child({ component: 'worker-pool' });
  }

  start(initial: number): number {
    const target = this.resize(initial);
    const active = this.activeExecutors().length;
    if (active < this.options.bounds.min) {
      throw new Error(`Failed to launch minimum workers: ${active}/${this.options.bounds.min}`);
    }
    this.logger.info({ concurrency: target }, 'Worker pool started');
    return target;
  }

  resize(requested: number): number {
    const next = clampConcurrency(requested, this.options.bounds);
    const previous = this.target;
    this.target = next;

    const active = this.activeExecutors();
    if (active.length < next) {
      // Retirees still hold a slot until they exit; reclaim them before spawning.
      let missing = next - active.length;
      const retirees = [...this.executors.values()]
        .filter((executor) => executor.retiring && !executor.exiting)
        .sort((a, b) => Number(b.busy) - Number(a.busy));
      for (const executor of retirees.slice(0, missing)) {
        executor.retiring = false;
        if (executor.wake.signal.aborted) {
          executor.wake = new AbortController();
        }
        missing--;
      }
      for (let i = 0; i < missing; i++) {
        this.spawn();
      }
    } else if (active.length > next) {
      // Retire idle executors before busy ones.
      const candidates = [...active].sort((a, b) => Number(a.busy) - Number(b.busy));
      for (const executor of candidates.slice(0, active.length - next)) {
        executor.retiring = true;
        if (!executor.busy) {
          executor.wake.abort();
        }
      }
    }

    if (previous !== next) {
      this.logger.debug({ from: previous, to: next }, 'Worker pool resized');
    }
    return next;
  }

  getTarget(): number {
    return this.target;
  }

  getStatus(): WorkerPoolStatus {
    let retiring = 0;
    let busy = 0;
    let idle = 0;
    for (const executor of this.executors.values()) {
      if (executor.retiring) retiring++;
      if (executor.busy) busy++;
      else if (!executor.retiring) idle++;
    }
    return {
      target: this.target,
      active: this.executors.size - retiring,
      retiring,
      busy,
      idle,
    };
  }

  /**
   * Wait for every executor to exit. Resolves `false` if the timeout elapses first.
   */
  async drain(timeoutMs: number): Promise<boolean> {
    const settled = this.whenStopped().then(() => true);
    const timer = new AbortController();
    const timedOut = delay(timeoutMs, timer.signal).then(() => false);
    const drained = await Promise.race([settled, timedOut]);
    timer.abort();
    return drained;
  }

  /**
   * Abort every in-flight upstream call and wait for the executors to exit.
   * Returns the number of executors that were busy.
   */
  async forceStop(): Promise<number> {
    const busy = this.getStatus().busy;
    for (const executor of this.executors.values()) {
      executor.retiring = true;
      executor.wake.abort();
    }
    this.hardStop.abort();
    await this.whenStopped();
    return busy;
  }

  whenStopped(): Promise<void> {
    return Promise.all([...this.executors.values()].map((executor) => executor.done)).then(() => undefined);
  }

  private activeExecutors(): Executor[] {
    return [...this.executors.values()].filter((executor) => !executor.retiring);
  }

  private spawn(): void {
    const executor: Executor = {
      id: this.nextExecutorId++,
      retiring: false,
      exiting: false,
      busy: false,
      wake: new AbortController(),
      done: Promise.resolve(),
    };
    this.executors.set(executor.id, executor);
    executor.done = this.runExecutor(executor)
      .catch((error: unknown) => {
        this.logger.error({ err: error, executor: executor.id }, 'Executor crashed');
      })
      .finally(() => {
        this.executors.delete(executor.id);
      });
  }

  private async runExecutor(executor: Executor): Promise<void> {
    const { queue, pollMs } = this.options;
    while (!executor.retiring) {
      if (queue.isClosed && queue.depth === 0) break;

      const job = await queue.take(pollMs, executor.wake.signal);
      if (!job) continue;

      executor.busy = true;
      const record = await this.execute(job);
      executor.busy = false;
      this.emit(record);
    }
    executor.exiting = true;
    this.logger.debug({ executor: executor.id }, 'Executor exited');
  }

  private emit(record: JobRecord): void {
    try {
      this.options.onRecord(record);
    } catch (error) {
      this.logger.error({ err: error, jobId: record.id }, 'Job record handler failed');
    }
  }

  private async execute(job: Job): Promise<JobRecord> {
    const startedAt = this.now();
    const result = await this.callWithRetry(job).catch((error: unknown): Attempt => failure(error, 1, job));
    const finishedAt = this.now();

    if (result.outcome !== 'success') {
      this.logger.debug({ jobId: job.id, status: result.httpStatus, error: result.errorText }, 'Job failed');
    }

    return Object.freeze({
      id: job.id,
      runId: this.options.runId(),
      startedAt: new Date(startedAt),
      finishedAt: new Date(finishedAt),
      latencyMs: finishedAt - startedAt,
      modelId: job.modelId,
      ...result,
    });
  }

  private async callWithRetry(job: Job): Promise<Attempt> {
    const { client, retryPolicy } = this.options;
    const signal = this.hardStop.signal;

    for (let attempt = 0; ; attempt++) {
      try {
        const completion = await client.complete(
          {
            model: job.modelId,
            messages: job.messages,
            maxTokens: job.maxTokens,
            temperature: job.temperature,
          },
          signal
        );
        return {
          outcome: 'success',
          attempts: attempt + 1,
          httpStatus: completion.httpStatus,
          errorText: null,
          promptTokens: completion.promptTokens,
          completionTokens: completion.completionTokens,
        };
      } catch (error) {
        if (signal.aborted) {
          return cancelled(attempt + 1, job);
        }
        if (!retryPolicy.shouldRetry(error, attempt)) {
          return failure(error, attempt + 1, job);
        }

        const wait = retryPolicy.backoffMs(attempt);
        this.logger.debug({ jobId: job.id, attempt: attempt + 1, wait }, 'Retrying upstream call');
        const waited = await delay(wait, signal);
        if (!waited) {
          return cancelled(attempt + 1, job);
        }
      }
    }
  }
}

function truncate(text: string): string {
  return text.length > MAX_ERROR_TEXT ? text.slice(0, MAX_ERROR_TEXT) : text;
}

function cancelled(attempts: number, job: Job): Attempt {
  return {
    outcome: 'cancelled',
    attempts,
    httpStatus: null,
    errorText: DRAIN_CANCEL_MESSAGE,
    promptTokens: countWords(job.messages),
    completionTokens: 0,
  };
}

function failure(error: unknown, attempts: number, job: Job): Attempt {
  const upstream = error instanceof UpstreamError ? error : null;
  return {
    outcome: upstream?.kind === 'cancelled' ? 'cancelled' : 'failed',
    attempts,
    httpStatus: upstream?.status ?? null,
    errorText: truncate(error instanceof Error ? error.message : String(error)),
    promptTokens: countWords(job.messages),
    completionTokens: 0,
  };
}
