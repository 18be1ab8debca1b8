/**
 * Model Client
 * The process-wide handle to the hosted model providers. Built once by the
 * entry point and shared by every agent.
 */

import type {
  ModelClientConfig,
  CompletionRequest,
  CompletionResponse,
  CompletionMeta,
  ModelPricing,
  ProviderName,
  ProviderAdapter,
} from './types/index.js';
import { createProviders, getProviderForModel } from './providers/index.js';
import { Router } from './routing/router.js';
import { Tracer, createNoopTracer } from './tracing/tracer.js';
import type { SpanContext, SpanData } from './tracing/tracer.js';

interface UsageTotals {
  requests: number;
  tokens: { input: number; output: number };
  cost: number;
}

export interface ModelClientStats {
  totalRequests: number;
  totalTokens: { input: number; output: number };
  totalCost: number;
  byProvider: Partial<Record<ProviderName, UsageTotals & { avgLatencyMs: number }>>;
  byModel: Record<string, UsageTotals>;
}

export class ModelClient {
  private config: ModelClientConfig;
  private providers: Map<ProviderName, ProviderAdapter>;
  private router: Router;
  private tracer: Tracer;
  private stats: ModelClientStats;

  constructor(config: ModelClientConfig, tracer?: Tracer) {
    this.config = config;
    this.providers = createProviders(config.providers);
    this.router = new Router({
      providers: this.providers,
      retry: config.retry,
      defaultTimeout: config.defaultTimeout,
    });
    this.tracer = tracer ?? (config.tracing?.enabled ? new Tracer(config.tracing) : createNoopTracer());
    this.stats = this.initStats();
  }

  /**
   * Send a completion request through the router
   */
  async complete(request: CompletionRequest, parentContext?: SpanContext): Promise<CompletionResponse> {
    return this.tracer.trace(
      'model.complete',
      async (span) => {
        const { response } = await this.router.route(request);
        response.meta.traceId = span.getContext().traceId;

        this.tracer.recordCompletion(span, response.meta);
        this.updateStats(response.meta);

        if (this.config.costTracking?.enabled) {
          this.checkCostAlerts();
        }

        return response;
      },
      {
        'model.requested': request.model,
        'model.fallback': request.fallback?.join(','),
      },
      parentContext
    );
  }

  getTracer(): Tracer {
    return this.tracer;
  }

  getProviders(): ProviderName[] {
    return this.router.getAvailableProviders();
  }

  async isProviderAvailable(provider: ProviderName): Promise<boolean> {
    return this.router.isProviderAvailable(provider);
  }

  getProviderForModel(model: string): ProviderName | undefined {
    return getProviderForModel(model);
  }

  getModelCost(model: string): ModelPricing | undefined {
    const provider = getProviderForModel(model);
    if (!provider) return undefined;
    return this.providers.get(provider)?.getModelCost(model);
  }

  getStats(): ModelClientStats {
    return structuredClone(this.stats);
  }

  resetStats(): void {
    this.stats = this.initStats();
  }

  getTraces(): SpanData[] {
    return this.tracer.getSpans();
  }

  async shutdown(): Promise<void> {
    await this.tracer.shutdown();
  }

  private initStats(): ModelClientStats {
    return {
      totalRequests: 0,
      totalTokens: { input: 0, output: 0 },
      totalCost: 0,
      byProvider: {},
      byModel: {},
    };
  }

  private updateStats(meta: CompletionMeta): void {
    const { provider, model, tokens, cost, latencyMs } = meta;

    this.stats.totalRequests++;
    this.stats.totalTokens.input += tokens.inputTokens;
    this.stats.totalTokens.output += tokens.outputTokens;
    this.stats.totalCost += cost;

    const providerStats = this.stats.byProvider[provider] ?? {
      requests: 0,
      tokens: { input: 0, output: 0 },
      cost: 0,
      avgLatencyMs: 0,
    };
    const prevCount = providerStats.requests;
    providerStats.requests++;
    providerStats.tokens.input += tokens.inputTokens;
    providerStats.tokens.output += tokens.outputTokens;
    providerStats.cost += cost;
    providerStats.avgLatencyMs =
      (providerStats.avgLatencyMs * prevCount + latencyMs) / providerStats.requests;
    this.stats.byProvider[provider] = providerStats;

    const modelStats = this.stats.byModel[model] ?? {
      requests: 0,
      tokens: { input: 0, output: 0 },
      cost: 0,
    };
    modelStats.requests++;
    modelStats.tokens.input += tokens.inputTokens;
    modelStats.tokens.output += tokens.outputTokens;
    modelStats.cost += cost;
    this.stats.byModel[model] = modelStats;
  }

  private checkCostAlerts(): void {
    const config = this.config.costTracking;
    if (!config) return;

    const total = this.stats.totalCost;

    if (config.budgetLimit && total >= config.budgetLimit) {
      console.error(
        `[ModelClient] Budget exceeded: Total cost $${total.toFixed(4)} ` +
        `exceeds limit $${config.budgetLimit}`
      );
    } else if (config.alertThreshold && total >= config.alertThreshold) {
      console.warn(
        `[ModelClient] Cost alert: Total cost $${total.toFixed(4)} ` +
        `exceeds threshold $${config.alertThreshold}`
      );
    }
  }
}

export default ModelClient;
