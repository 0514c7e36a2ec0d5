/**
 * Completion client for OpenAI-compatible chat endpoints.
 * Every failure surfaces as an UpstreamError so the retry policy can classify it.
 */

import axios, { isAxiosError, type AxiosInstance } from 'axios';
import type { ChatMessage } from '../types/index.js';

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
  maxTokens: number;
  temperature: number;
}

export interface CompletionResult {
  text: string;
  promptTokens: number;
  completionTokens: number;
  httpStatus: number;
}

export interface CompletionClient {
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResult>;
}

export type UpstreamErrorKind = 'transport' | 'timeout' | 'rate_limit' | 'server' | 'client' | 'cancelled';

export class UpstreamError extends Error {
  constructor(
    message: string,
    public readonly kind: UpstreamErrorKind,
    public readonly status: number | null = null
  ) {
    super(message);
    this.name = 'UpstreamError';
  }

  static fromStatus(status: number, body: string): UpstreamError {
    const kind: UpstreamErrorKind = status === 429 ? 'rate_limit' : status >= 500 ? 'server' : 'client';
    return new UpstreamError(body || `Upstream responded with status ${status}`, kind, status);
  }
}

interface ChatCompletionResponse {
  choices?: Array<{
    message?: { content?: string | null };
    text?: string;
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
  };
}

export interface OpenAICompatibleClientOptions {
  endpoint: string;
  apiKey?: string;
  timeoutMs: number;
}

export function countWords(messages: ChatMessage[]): number {
  return messages.reduce((total, message) => {
    const words = message.content.trim().split(/\s+/).filter(Boolean);
    return total + words.length;
  }, 0);
}

function describeBody(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}

export class OpenAICompatibleClient implements CompletionClient {
  private client: AxiosInstance;

  constructor(options: OpenAICompatibleClientOptions) {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'User-Agent': 'perf-engine/1.0.0',
    };
    if (options.apiKey) {
      headers['Authorization'] = `Bearer ${options.apiKey}`;
    }

    this.client = axios.create({
      baseURL: options.endpoint,
      timeout: options.timeoutMs,
      headers,
    });
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResult> {
    try {
      const response = await this.client.post<ChatCompletionResponse>(
        '',
        {
          model: request.model,
          messages: request.messages,
          max_tokens: request.maxTokens,
          temperature: request.temperature,
        },
        { signal }
      );

      const choice = response.data.choices?.[0];
      const usage = response.data.usage ?? {};
      return {
        text: choice?.message?.content ?? choice?.text ?? '',
        promptTokens: usage.prompt_tokens ?? countWords(request.messages),
        completionTokens: usage.completion_tokens ?? 0,
        httpStatus: response.status,
      };
    } catch (error) {
      throw this.toUpstreamError(error);
    }
  }

  private toUpstreamError(error: unknown): UpstreamError {
    if (!isAxiosError(error)) {
      const message = error instanceof Error ? error.message : String(error);
      return new UpstreamError(message, 'transport');
    }

    if (error.code === 'ERR_CANCELED') {
      return new UpstreamError('Request cancelled', 'cancelled');
    }

    if (error.response) {
      return UpstreamError.fromStatus(error.response.status, describeBody(error.response.data));
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new UpstreamError(error.message || 'Request timed out', 'timeout');
    }

    return new UpstreamError(error.message || 'Transport failure', 'transport');
  }
}
