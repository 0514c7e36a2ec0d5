import { readFile } from 'fs/promises';
import type { PerfController } from '../services/perf-controller.js';
import type { RunSummary, Sample } from '../types/index.js';
import { delay } from '../utils/timers.js';

export const DEFAULT_PROMPTS: readonly string[] = [
  'Summarize the plot of a short story about a lighthouse keeper in three sentences.',
  'Write a polite email asking a colleague to review a pull request.',
  'Explain the difference between a queue and a stack to a new programmer.',
  'List four things to check before deploying a web service on a Friday.',
  'Draft a two-line product description for a reusable water bottle.',
];

export interface BenchmarkProgress {
  submitted: number;
  rejected: number;
  elapsedSec: number;
  concurrency: number;
  queueDepth: number;
}

export interface BenchmarkOptions {
  controller: PerfController;
  prompts: readonly string[];
  /** Stop submitting after this many accepted jobs. */
  jobs?: number;
  /** Stop submitting after this many seconds. */
  durationSec?: number;
  model?: string;
  /** Pause after each accepted submission; 0 submits as fast as admission allows. */
  paceMs?: number;
  rejectBackoffMs?: number;
  idlePollMs?: number;
  progressEvery?: number;
  onProgress?: (progress: BenchmarkProgress) => void;
  now?: () => number;
}

export interface BenchmarkReport {
  runId: string;
  submitted: number;
  rejected: number;
  completed: number;
  failed: number;
  elapsedSec: number;
  drained: boolean;
  finalSample: Sample | null;
  finalConcurrency: number;
  summary: RunSummary | null;
}

/**
 * Read prompts from a file, one per line; blank lines are skipped. Without a
 * file the built-in prompts are used.
 */
export async function loadPrompts(file?: string): Promise<string[]> {
  if (!file) {
    return [...DEFAULT_PROMPTS];
  }

  const text = await readFile(file, 'utf-8');
  const prompts = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  if (prompts.length === 0) {
    throw new Error(`Prompt file ${file} contains no prompts`);
  }
  return prompts;
}

/**
 * Drive synthetic load through the controller until the job or time bound is
 * reached, wait for the backlog to clear, then stop the controller and report.
 */
export async function runBenchmark(options: BenchmarkOptions): Promise<BenchmarkReport> {
  const {
    controller,
    prompts,
    jobs,
    durationSec,
    model,
    paceMs = 0,
    rejectBackoffMs = 10,
    idlePollMs = 50,
    progressEvery = 100,
    onProgress,
  } = options;
  const now = options.now ?? Date.now;

  if (jobs === undefined && durationSec === undefined) {
    throw new Error('runBenchmark needs a job count or a duration');
  }
  if (prompts.length === 0) {
    throw new Error('runBenchmark needs at least one prompt');
  }

  const runId = controller.getRunId() ?? (await controller.start());
  const startedAt = now();
  const deadline = durationSec === undefined ? Number.POSITIVE_INFINITY : startedAt + durationSec * 1000;

  let submitted = 0;
  let rejected = 0;
  while ((jobs === undefined || submitted < jobs) && now() < deadline) {
    const prompt = prompts[submitted % prompts.length] ?? '';
    const result = controller.submit({ prompt, model });

    if (!result.accepted) {
      rejected++;
      if (result.reason === 'stopping') break;
      await delay(rejectBackoffMs);
      continue;
    }

    submitted++;
    if (onProgress && submitted % progressEvery === 0) {
      const snapshot = controller.getSnapshot();
      onProgress({
        submitted,
        rejected,
        elapsedSec: (now() - startedAt) / 1000,
        concurrency: snapshot.pool.target,
        queueDepth: snapshot.queue.depth,
      });
    }
    if (paceMs > 0) {
      await delay(paceMs);
    }
  }

  while (!controller.isIdle() && controller.getState() === 'running') {
    await delay(idlePollMs);
  }
  const elapsedSec = (now() - startedAt) / 1000;

  const shutdown = await controller.stop();
  const stats = controller.getStats();
  const summary = await controller.getRunSummary();

  return {
    runId,
    submitted,
    rejected,
    completed: stats.completed,
    failed: stats.failed,
    elapsedSec,
    drained: shutdown.drained,
    finalSample: shutdown.finalSample,
    finalConcurrency: shutdown.finalSample?.concurrency ?? controller.getSnapshot().pool.target,
    summary,
  };
}
