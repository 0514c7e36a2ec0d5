// Job Types
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface JobInput {
  prompt?: string;
  messages?: ChatMessage[];
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface Job {
  id: string;
  messages: ChatMessage[];
  modelId: string;
  maxTokens: number;
  temperature: number;
  createdAt: Date;
}

export type JobOutcome = 'success' | 'failed' | 'cancelled';

export interface JobRecord {
  readonly id: string;
  readonly runId: string;
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly latencyMs: number;
  readonly modelId: string;
  readonly promptTokens: number;
  readonly completionTokens: number;
  readonly httpStatus: number | null;
  readonly errorText: string | null;
  readonly attempts: number;
  readonly outcome: JobOutcome;
}

// Admission
export type AdmissionRejectReason = 'queue_full' | 'stopping';

export type AdmissionResult =
  | { accepted: true; jobId: string }
  | { accepted: false; reason: AdmissionRejectReason };

// Telemetry Types
export interface Run {
  runId: string;
  startedAt: Date;
  finishedAt: Date | null;
  modelId: string;
  host: string;
  notes: string | null;
}

export interface Sample {
  readonly id: string;
  readonly runId: string;
  readonly ts: Date;
  readonly windowSec: number;
  readonly concurrency: number;
  readonly queueDepth: number;
  readonly throughputRps: number;
  readonly p50Ms: number;
  readonly p95Ms: number;
  readonly errorRate: number;
  readonly tokensIn: number;
  readonly tokensOut: number;
  readonly jobCount: number;
}

export interface RunSummary {
  runId: string;
  modelId: string;
  host: string;
  startedAt: Date;
  finishedAt: Date | null;
  totalJobs: number;
  failedJobs: number;
  avgLatencyMs: number;
  maxLatencyMs: number;
  totalCompletionTokens: number;
  sampleCount: number;
  bestThroughputRps: number;
  bestConcurrency: number;
  bestP95Ms: number;
}

// Tuning Types
export type TuningDirection = 'up' | 'down' | 'hold';

export type TuningReason =
  | 'empty_window'
  | 'error_rate_exceeded'
  | 'p95_exceeded'
  | 'headroom_with_demand'
  | 'idle'
  | 'steady';

export interface TuningDecision {
  direction: TuningDirection;
  from: number;
  to: number;
  reason: TuningReason;
}

// Pool Types
export interface WorkerPoolStatus {
  target: number;
  active: number;
  retiring: number;
  busy: number;
  idle: number;
}

export interface PerfSnapshot {
  runId: string | null;
  state: ControllerState;
  latestSample: Sample | null;
  lastDecision: TuningDecision | null;
  pool: WorkerPoolStatus;
  queue: {
    depth: number;
    capacity: number;
  };
  bounds: {
    min: number;
    max: number;
  };
  timestamp: string;
}

export type ControllerState = 'idle' | 'running' | 'stopping' | 'stopped';

export interface ShutdownReport {
  drained: boolean;
  cancelledJobs: number;
  discardedJobs: number;
  finalSample: Sample | null;
}
