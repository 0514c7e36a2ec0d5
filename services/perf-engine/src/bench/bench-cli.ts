#!/usr/bin/env node
import dotenv from 'dotenv';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { parseArgs } from 'util';
import { OpenAICompatibleClient, type CompletionClient } from '../clients/completion-client.js';
import { MockCompletionClient } from '../clients/mock-completion-client.js';
import { loadPerfConfig, type PerfConfig } from '../config/perf-config.js';
import { PerfController } from '../services/perf-controller.js';
import { createTelemetryRepository } from '../storage/create-repository.js';
import { TelemetryStore } from '../storage/telemetry-store.js';
import { createLogger } from '../utils/logger.js';
import { loadPrompts, runBenchmark, type BenchmarkReport } from './benchmark-driver.js';

export interface BenchArgs {
  jobs?: number;
  durationSec?: number;
  promptFile?: string;
  model?: string;
  paceMs: number;
  mockLatencyMs?: number;
  mockErrorRate: number;
}

const USAGE = `Usage: perf-bench [--jobs N] [--duration-sec S] [--prompt-file PATH]
                  [--model ID] [--pace-ms MS]
                  [--mock-latency-ms MS] [--mock-error-rate R]

At least one of --jobs or --duration-sec is required. --mock-latency-ms
replaces LLM_ENDPOINT with an in-process mock endpoint.`;

function toNumber(name: string, raw: string | undefined, min: number): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min) {
    throw new Error(`--${name} must be a number >= ${min}, got "${raw}"`);
  }
  return value;
}

function toInteger(name: string, raw: string | undefined, min: number): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`--${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

export function parseBenchArgs(argv: string[]): BenchArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      jobs: { type: 'string' },
      'duration-sec': { type: 'string' },
      'prompt-file': { type: 'string' },
      model: { type: 'string' },
      'pace-ms': { type: 'string' },
      'mock-latency-ms': { type: 'string' },
      'mock-error-rate': { type: 'string' },
    },
    strict: true,
  });

  const args: BenchArgs = {
    jobs: toInteger('jobs', values.jobs, 1),
    durationSec: toInteger('duration-sec', values['duration-sec'], 1),
    promptFile: values['prompt-file'],
    model: values.model,
    paceMs: toInteger('pace-ms', values['pace-ms'], 0) ?? 0,
    mockLatencyMs: toInteger('mock-latency-ms', values['mock-latency-ms'], 0),
    mockErrorRate: toNumber('mock-error-rate', values['mock-error-rate'], 0) ?? 0,
  };

  if (args.jobs === undefined && args.durationSec === undefined) {
    throw new Error('One of --jobs or --duration-sec is required');
  }
  if (args.mockErrorRate > 1) {
    throw new Error('--mock-error-rate must be between 0 and 1');
  }
  return args;
}

export function formatReport(report: BenchmarkReport): string {
  const lines = [
    '-'.repeat(60),
    'BENCHMARK RESULTS',
    '-'.repeat(60),
    `Run ID:            ${report.runId}`,
    `Submitted:         ${report.submitted} (rejected offers: ${report.rejected})`,
    `Completed:         ${report.completed}`,
    `Failed:            ${report.failed}`,
    `Elapsed:           ${report.elapsedSec.toFixed(1)}s`,
    `Final concurrency: ${report.finalConcurrency}`,
  ];

  const sample = report.finalSample;
  if (sample) {
    lines.push(
      `Throughput:        ${sample.throughputRps.toFixed(2)} rps`,
      `Latency p50/p95:   ${Math.round(sample.p50Ms)}ms / ${Math.round(sample.p95Ms)}ms`,
      `Error rate:        ${(sample.errorRate * 100).toFixed(1)}%`
    );
  }

  const summary = report.summary;
  if (summary) {
    lines.push(
      `Avg latency:       ${Math.round(summary.avgLatencyMs)}ms (max ${summary.maxLatencyMs}ms)`,
      `Completion tokens: ${summary.totalCompletionTokens}`,
      `Best window:       ${summary.bestThroughputRps.toFixed(2)} rps at concurrency ${summary.bestConcurrency}`
    );
  }
  return lines.join('\n');
}

async function main(): Promise<void> {
  dotenv.config();

  let args: BenchArgs;
  let config: PerfConfig;
  try {
    args = parseBenchArgs(process.argv.slice(2));
    config = loadPerfConfig();
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    process.exit(2);
  }

  const logger = createLogger({ name: 'perf-bench', level: config.logLevel });
  const client: CompletionClient =
    args.mockLatencyMs !== undefined
      ? new MockCompletionClient({ latencyMs: args.mockLatencyMs, errorRate: args.mockErrorRate })
      : new OpenAICompatibleClient({
          endpoint: config.upstream.endpoint,
          apiKey: config.upstream.apiKey,
          timeoutMs: config.upstream.requestTimeoutMs,
        });

  const store = new TelemetryStore(await createTelemetryRepository(config, logger), logger);
  const controller = new PerfController({ config, client, store, logger });
  const prompts = await loadPrompts(args.promptFile);

  console.log(`Starting benchmark with ${prompts.length} prompt variations`);
  console.log(
    `Target: ${args.jobs ?? 'unlimited'} jobs, ${args.durationSec ?? 'unlimited'} seconds, ` +
      `upstream: ${args.mockLatencyMs !== undefined ? `mock (${args.mockLatencyMs}ms)` : config.upstream.endpoint}`
  );

  const interrupt = () => {
    console.log('\nInterrupted; stopping...');
    controller.stop().catch((error: unknown) => {
      logger.error({ err: error }, 'Stop failed');
    });
  };
  process.once('SIGINT', interrupt);

  try {
    const report = await runBenchmark({
      controller,
      prompts,
      jobs: args.jobs,
      durationSec: args.durationSec,
      model: args.model,
      paceMs: args.paceMs,
      onProgress: (progress) => {
        console.log(
          `Submitted: ${progress.submitted} jobs, ` +
            `Rate: ${(progress.submitted / Math.max(progress.elapsedSec, 0.001)).toFixed(1)} jobs/sec, ` +
            `Concurrency: ${progress.concurrency}, Queue: ${progress.queueDepth}`
        );
      },
    });
    console.log(formatReport(report));
  } finally {
    process.off('SIGINT', interrupt);
    await store.close();
  }
}

const entry = process.argv[1];
if (entry && realpathSync(entry) === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    console.error('Benchmark failed:', error);
    process.exit(1);
  });
}
