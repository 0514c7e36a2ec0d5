import { UpstreamError, type UpstreamErrorKind } from '../clients/completion-client.js';
import type { RetrySettings } from '../config/perf-config.js';

export type FailureClass = 'transient' | 'permanent';

const TRANSIENT_KINDS: ReadonlySet<UpstreamErrorKind> = new Set(['transport', 'timeout', 'rate_limit', 'server']);

export function classifyFailure(error: unknown): FailureClass {
  if (error instanceof UpstreamError) {
    return TRANSIENT_KINDS.has(error.kind) ? 'transient' : 'permanent';
  }
  // Anything thrown outside the client is treated like a transport failure.
  return 'transient';
}

export class RetryPolicy {
  private readonly settings: RetrySettings;
  private readonly random: () => number;

  constructor(settings: RetrySettings, random: () => number = Math.random) {
    this.settings = settings;
    this.random = random;
  }

  /**
   * Whether a failure on the given zero-based attempt should be retried.
   */
  shouldRetry(error: unknown, attempt: number): boolean {
    return classifyFailure(error) === 'transient' && attempt < this.settings.maxRetries;
  }

  /**
   * Exponential backoff with jitter, capped at maxDelayMs.
   */
  backoffMs(attempt: number): number {
    const { baseDelayMs, maxDelayMs } = this.settings;
    const exponential = baseDelayMs * 2 ** attempt;
    const jitter = this.random() * baseDelayMs;
    return Math.min(maxDelayMs, Math.round(exponential + jitter));
  }
}
