import os from 'os';
import { z } from 'zod';

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

const int = (fallback: number, min = 0) => z.coerce.number().int().min(min).default(fallback);

const flag = (fallback: boolean) =>
  z
    .preprocess((value) => {
      if (value === undefined || value === '') return undefined;
      if (typeof value === 'boolean') return value;
      return ['1', 'true', 'yes', 'on'].includes(String(value).toLowerCase());
    }, z.boolean().optional())
    .transform((value) => value ?? fallback);

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const envSchema = z.object({
  CONCURRENCY_MIN: int(2, 1),
  CONCURRENCY_MAX: int(6, 1),
  CONCURRENCY_START: z.coerce.number().int().min(1).optional(),
  TARGET_P95_MS: int(2500, 1),
  TARGET_ERROR_RATE: z.coerce.number().min(0).max(1).default(0.03),
  SAMPLE_WINDOW_SEC: int(30, 1),
  TUNE_INTERVAL_SEC: int(15, 1),
  INCREASE_STEP: int(1, 1),
  DECREASE_STEP: int(1, 1),
  SCALE_DOWN_WHEN_IDLE: flag(true),
  BACKPRESSURE_QUEUE_MAX: int(8, 1),
  WORKER_POLL_MS: int(1000, 1),
  REQUEST_TIMEOUT_SEC: int(60, 1),
  MAX_RETRIES: int(3, 0),
  RETRY_BASE_DELAY_MS: int(1000, 0),
  RETRY_MAX_DELAY_MS: int(30000, 0),
  DRAIN_TIMEOUT_MS: int(30000, 0),
  METRICS_PORT: z.coerce.number().int().min(0).max(65535).default(8088),
  LLM_ENDPOINT: z.string().url().default('http://127.0.0.1:1234/v1/chat/completions'),
  LLM_API_KEY: optionalText,
  MODEL_ID: z.string().min(1).default('meta-llama-3-8b-instruct'),
  MAX_TOKENS: int(128, 1),
  TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  PERF_DB_URL: optionalText,
  HOST_LABEL: optionalText,
  RUN_NOTES: optionalText,
  LOG_LEVEL: z.string().default('info'),
});

export interface ConcurrencyBounds {
  min: number;
  max: number;
}

export interface TunerSettings extends ConcurrencyBounds {
  targetP95Ms: number;
  targetErrorRate: number;
  increaseStep: number;
  decreaseStep: number;
  scaleDownWhenIdle: boolean;
}

export interface RetrySettings {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface PerfConfig {
  concurrency: ConcurrencyBounds & { start: number };
  tuner: TunerSettings;
  sampleWindowSec: number;
  tuneIntervalSec: number;
  queueCapacity: number;
  workerPollMs: number;
  retry: RetrySettings;
  drainTimeoutMs: number;
  metricsPort: number;
  upstream: {
    endpoint: string;
    apiKey?: string;
    modelId: string;
    maxTokens: number;
    temperature: number;
    requestTimeoutMs: number;
  };
  telemetry: {
    databaseUrl?: string;
    host: string;
    notes?: string;
  };
  logLevel: string;
}

/**
 * Parse and validate the process environment into a PerfConfig.
 * Throws ConfigError on any invalid value or inconsistent bounds.
 */
export function loadPerfConfig(env: NodeJS.ProcessEnv = process.env): PerfConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const values = parsed.data;
  if (values.CONCURRENCY_MIN > values.CONCURRENCY_MAX) {
    throw new ConfigError(
      `CONCURRENCY_MIN (${values.CONCURRENCY_MIN}) exceeds CONCURRENCY_MAX (${values.CONCURRENCY_MAX})`
    );
  }

  const start = values.CONCURRENCY_START ?? values.CONCURRENCY_MIN;
  if (start < values.CONCURRENCY_MIN || start > values.CONCURRENCY_MAX) {
    throw new ConfigError(
      `CONCURRENCY_START (${start}) must be within [${values.CONCURRENCY_MIN}, ${values.CONCURRENCY_MAX}]`
    );
  }

  if (values.RETRY_BASE_DELAY_MS > values.RETRY_MAX_DELAY_MS) {
    throw new ConfigError('RETRY_BASE_DELAY_MS must not exceed RETRY_MAX_DELAY_MS');
  }

  return {
    concurrency: {
      min: values.CONCURRENCY_MIN,
      max: values.CONCURRENCY_MAX,
      start,
    },
    tuner: {
      min: values.CONCURRENCY_MIN,
      max: values.CONCURRENCY_MAX,
      targetP95Ms: values.TARGET_P95_MS,
      targetErrorRate: values.TARGET_ERROR_RATE,
      increaseStep: values.INCREASE_STEP,
      decreaseStep: values.DECREASE_STEP,
      scaleDownWhenIdle: values.SCALE_DOWN_WHEN_IDLE,
    },
    sampleWindowSec: values.SAMPLE_WINDOW_SEC,
    tuneIntervalSec: values.TUNE_INTERVAL_SEC,
    queueCapacity: values.BACKPRESSURE_QUEUE_MAX,
    workerPollMs: values.WORKER_POLL_MS,
    retry: {
      maxRetries: values.MAX_RETRIES,
      baseDelayMs: values.RETRY_BASE_DELAY_MS,
      maxDelayMs: values.RETRY_MAX_DELAY_MS,
    },
    drainTimeoutMs: values.DRAIN_TIMEOUT_MS,
    metricsPort: values.METRICS_PORT,
    upstream: {
      endpoint: values.LLM_ENDPOINT,
      apiKey: values.LLM_API_KEY,
      modelId: values.MODEL_ID,
      maxTokens: values.MAX_TOKENS,
      temperature: values.TEMPERATURE,
      requestTimeoutMs: values.REQUEST_TIMEOUT_SEC * 1000,
    },
    telemetry: {
      databaseUrl: values.PERF_DB_URL,
      host: values.HOST_LABEL ?? os.hostname(),
      notes: values.RUN_NOTES,
    },
    logLevel: values.LOG_LEVEL,
  };
}
