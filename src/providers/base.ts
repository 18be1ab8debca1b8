/**
 * Base Provider Adapter
 * Abstract base class for all LLM provider adapters
 */

import type {
  ProviderAdapter,
  ProviderName,
  ProviderCredentials,
  CompletionRequest,
  CompletionResponse,
  ModelPricing,
  TokenUsage,
} from '../types/index.js';
import { ProviderError, RateLimitError } from '../types/index.js';

const ABORT_ERROR_NAMES = new Set(['AbortError', 'APIUserAbortError']);

export abstract class BaseProvider implements ProviderAdapter {
  abstract name: ProviderName;
  protected credentials: ProviderCredentials;

  constructor(credentials: ProviderCredentials) {
    this.credentials = credentials;
  }

  abstract complete(request: CompletionRequest): Promise<CompletionResponse>;

  abstract listModels(): Promise<string[]>;

  abstract getModelCost(model: string): ModelPricing;

  async isAvailable(): Promise<boolean> {
    try {
      await this.listModels();
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Calculate cost based on token usage and model pricing
   */
  protected calculateCost(model: string, usage: TokenUsage): number {
    const pricing = this.getModelCost(model);
    const inputCost = (usage.inputTokens / 1000) * pricing.inputPer1k;
    const outputCost = (usage.outputTokens / 1000) * pricing.outputPer1k;
    return Math.round((inputCost + outputCost) * 1000000) / 1000000; // 6 decimal precision
  }

  /**
   * Translate an SDK failure into the provider error taxonomy.
   * Aborts pass through untouched so callers can tell cancellation apart.
   */
  protected normalizeError(error: unknown): Error {
    if (!(error instanceof Error)) {
      return new ProviderError(String(error), this.name);
    }
    if (ABORT_ERROR_NAMES.has(error.name)) {
      return error;
    }

    const status = 'status' in error && typeof error.status === 'number' ? error.status : undefined;
    if (status === 429) {
      return new RateLimitError(this.name, readRetryAfter(error));
    }
    return new ProviderError(error.message, this.name, status, error);
  }
}

function readRetryAfter(error: Error): number | undefined {
  if (!('headers' in error) || typeof error.headers !== 'object' || error.headers === null) {
    return undefined;
  }
  const headers = error.headers;
  const raw =
    headers instanceof Headers
      ? headers.get('retry-after')
      : 'retry-after' in headers
        ? headers['retry-after']
        : undefined;
  const seconds = typeof raw === 'string' ? Number.parseFloat(raw) : NaN;
  return Number.isFinite(seconds) ? seconds * 1000 : undefined;
}
