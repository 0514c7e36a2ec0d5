import { v4 as uuidv4 } from 'uuid';
import type { JobRecord, Sample } from '../types/index.js';

export interface TickContext {
  now: number;
  runId: string;
  concurrency: number;
  queueDepth: number;
}

/**
 * Nearest-rank percentile over an ascending list. Returns 0 for an empty list.
 */
export function percentile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) return 0;
  const rank = Math.ceil(q * sorted.length);
  const index = Math.min(sorted.length - 1, Math.max(0, rank - 1));
  return sorted[index] ?? 0;
}

/**
 * Rolling window over completed jobs, turned into one Sample per tick.
 */
export class SampleAggregator {
  private records: JobRecord[] = [];
  private lastTs = 0;

  constructor(private readonly windowSec: number) {}

  get size(): number {
    return this.records.length;
  }

  record(jobRecord: JobRecord): void {
    this.records.push(jobRecord);
  }

  tick(context: TickContext): Sample {
    const cutoff = context.now - this.windowSec * 1000;
    this.records = this.records.filter((record) => record.finishedAt.getTime() > cutoff);

    // Keep emission times strictly increasing within a run.
    const ts = context.now > this.lastTs ? context.now : this.lastTs + 1;
    this.lastTs = ts;

    const window = this.records;
    const base = {
      id: uuidv4(),
      runId: context.runId,
      ts: new Date(ts),
      windowSec: this.windowSec,
      concurrency: context.concurrency,
      queueDepth: context.queueDepth,
      jobCount: window.length,
    };

    if (window.length === 0) {
      return Object.freeze({
        ...base,
        throughputRps: 0,
        p50Ms: 0,
        p95Ms: 0,
        errorRate: 0,
        tokensIn: 0,
        tokensOut: 0,
      });
    }

    const successful = window.filter((record) => record.outcome === 'success');
    const latencySource = successful.length > 0 ? successful : window;
    const latencies = latencySource.map((record) => record.latencyMs).sort((a, b) => a - b);
    const failed = window.length - successful.length;

    let tokensIn = 0;
    let tokensOut = 0;
    for (const record of window) {
      tokensIn += record.promptTokens;
      tokensOut += record.completionTokens;
    }

    return Object.freeze({
      ...base,
      throughputRps: window.length / this.windowSec,
      p50Ms: percentile(latencies, 0.5),
      p95Ms: percentile(latencies, 0.95),
      errorRate: failed / window.length,
      tokensIn,
      tokensOut,
    });
  }
}
