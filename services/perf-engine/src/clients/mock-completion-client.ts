import {
  UpstreamError,
  countWords,
  type CompletionClient,
  type CompletionRequest,
  type CompletionResult,
} from './completion-client.js';
import { delay } from '../utils/timers.js';

export interface MockCompletionOptions {
  latencyMs: number;
  errorRate?: number;
  errorStatus?: number;
  completionTokens?: number;
  random?: () => number;
}

/**
 * In-process stand-in for an upstream endpoint with fixed latency and a
 * configurable failure rate. Used by the benchmark CLI and tests.
 */
export class MockCompletionClient implements CompletionClient {
  private calls = 0;
  private readonly options: Required<MockCompletionOptions>;

  constructor(options: MockCompletionOptions) {
    this.options = {
      errorRate: 0,
      errorStatus: 503,
      completionTokens: 32,
      random: Math.random,
      ...options,
    };
  }

  get callCount(): number {
    return this.calls;
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResult> {
    this.calls++;
    const completed = await delay(this.options.latencyMs, signal);
    if (!completed) {
      throw new UpstreamError('Request cancelled', 'cancelled');
    }

    if (this.options.errorRate > 0 && this.options.random() < this.options.errorRate) {
      throw UpstreamError.fromStatus(this.options.errorStatus, 'mock upstream failure');
    }

    return {
      text: `mock completion for ${request.model}`,
      promptTokens: countWords(request.messages),
      completionTokens: Math.min(this.options.completionTokens, request.maxTokens),
      httpStatus: 200,
    };
  }
}
