/**
 * Routing Engine
 * Handles model selection, failover, retries and per-request timeouts
 */

import type {
  ProviderAdapter,
  ProviderName,
  CompletionRequest,
  CompletionResponse,
  RetryConfig,
  FailedAttempt,
} from '../types/index.js';
import {
  AllProvidersFailedError,
  ProviderError,
  RoundtableError,
  TimeoutError,
} from '../types/index.js';
import { getProviderForModel } from '../providers/index.js';

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 2,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryableErrors: ['RATE_LIMIT', 'TIMEOUT', 'NETWORK_ERROR', '500', '502', '503', '529'],
};

const DEFAULT_TIMEOUT_MS = 60000;

export interface RouterConfig {
  providers: Map<ProviderName, ProviderAdapter>;
  retry?: Partial<RetryConfig>;
  defaultTimeout?: number;
}

export interface RouteAttempt {
  provider: ProviderName;
  model: string;
  success: boolean;
  error?: Error;
  latencyMs: number;
}

export interface RouteResult {
  response: CompletionResponse;
  attempts: RouteAttempt[];
}

/**
 * Router handles model selection and failover between providers
 */
export class Router {
  private providers: Map<ProviderName, ProviderAdapter>;
  private retryConfig: RetryConfig;
  private defaultTimeout: number;

  constructor(config: RouterConfig) {
    this.providers = config.providers;
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...config.retry };
    this.defaultTimeout = config.defaultTimeout ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Route a completion request with automatic failover.
   * Once the caller's signal fires nothing is retried and no fallback is tried.
   */
  async route(request: CompletionRequest): Promise<RouteResult> {
    const models = this.buildModelChain(request);
    const attempts: RouteAttempt[] = [];

    for (const { model, provider } of models) {
      const adapter = this.providers.get(provider);
      if (!adapter) {
        attempts.push({
          provider,
          model,
          success: false,
          error: new ProviderError(`Provider ${provider} not configured`, provider),
          latencyMs: 0,
        });
        continue;
      }

      for (let retry = 0; retry <= this.retryConfig.maxRetries; retry++) {
        request.signal?.throwIfAborted();
        const startTime = Date.now();
        try {
          const response = await this.executeWithTimeout(
            adapter,
            { ...request, model },
            request.timeout ?? this.defaultTimeout
          );

          response.meta.failoverAttempts = attempts.length;
          attempts.push({
            provider,
            model,
            success: true,
            latencyMs: Date.now() - startTime,
          });

          return { response, attempts };
        } catch (error) {
          if (request.signal?.aborted) {
            throw error;
          }

          const failure = error instanceof Error ? error : new Error(String(error));
          attempts.push({
            provider,
            model,
            success: false,
            error: failure,
            latencyMs: Date.now() - startTime,
          });

          if (!this.isRetryable(failure) || retry === this.retryConfig.maxRetries) {
            // Move to next model in chain
            break;
          }

          const delay = Math.min(
            this.retryConfig.initialDelayMs * Math.pow(this.retryConfig.backoffMultiplier, retry),
            this.retryConfig.maxDelayMs
          );
          await this.sleep(delay, request.signal);
        }
      }
    }

    const failures: FailedAttempt[] = attempts.flatMap((attempt) =>
      attempt.error ? [{ provider: attempt.provider, model: attempt.model, error: attempt.error }] : []
    );
    throw new AllProvidersFailedError(failures);
  }

  /**
   * Build the model chain for failover
   */
  private buildModelChain(
    request: CompletionRequest
  ): Array<{ model: string; provider: ProviderName }> {
    const chain: Array<{ model: string; provider: ProviderName }> = [];

    for (const model of [request.model, ...(request.fallback ?? [])]) {
      const provider = getProviderForModel(model);
      if (provider) {
        chain.push({ model, provider });
      }
    }

    return chain;
  }

  /**
   * Run one adapter call under its own deadline. The deadline aborts the
   * underlying request; the caller's signal is forwarded as well.
   */
  private async executeWithTimeout(
    adapter: ProviderAdapter,
    request: CompletionRequest,
    timeoutMs: number
  ): Promise<CompletionResponse> {
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(request.signal?.reason);
    request.signal?.addEventListener('abort', forwardAbort, { once: true });

    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new TimeoutError(adapter.name, timeoutMs);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        adapter.complete({ ...request, signal: controller.signal }),
        deadline,
      ]);
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener('abort', forwardAbort);
    }
  }

  /**
   * Check if an error is retryable
   */
  private isRetryable(error: Error): boolean {
    const retryable = this.retryConfig.retryableErrors;
    if (error instanceof ProviderError) {
      // No status means the request never got an HTTP answer
      return error.statusCode === undefined
        ? retryable.includes('NETWORK_ERROR')
        : retryable.includes(String(error.statusCode));
    }
    if (error instanceof RoundtableError) {
      return retryable.includes(error.code);
    }
    return false;
  }

  private sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        reject(signal?.reason);
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Get available providers
   */
  getAvailableProviders(): ProviderName[] {
    return Array.from(this.providers.keys());
  }

  /**
   * Check if a provider is available
   */
  async isProviderAvailable(provider: ProviderName): Promise<boolean> {
    const adapter = this.providers.get(provider);
    if (!adapter) return false;
    return adapter.isAvailable();
  }
}
