/**
 * Tracing
 * OpenTelemetry-shaped spans for team runs, turns and model calls
 */

import type { CompletionMeta, TracingConfig } from '../types/index.js';

export interface SpanContext {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
}

export interface SpanEvent {
  name: string;
  timestamp: number;
  attributes?: Record<string, unknown>;
}

export interface SpanData {
  context: SpanContext;
  name: string;
  startTime: number;
  endTime?: number;
  status: 'ok' | 'error' | 'unset';
  attributes: Record<string, unknown>;
  events: SpanEvent[];
}

const EXPORT_INTERVAL_MS = 5000;
const EXPORT_BATCH_SIZE = 100;
export const MAX_EXPORT_QUEUE = 1000;
export const MAX_RETAINED_SPANS = 1000;

/**
 * Span represents a single operation within a trace
 */
export class Span {
  private data: SpanData;
  private tracer: Tracer;

  constructor(
    tracer: Tracer,
    name: string,
    parentContext?: SpanContext,
    attributes?: Record<string, unknown>
  ) {
    this.tracer = tracer;
    this.data = {
      context: {
        traceId: parentContext?.traceId ?? tracer.generateTraceId(),
        spanId: generateId(),
        parentSpanId: parentContext?.spanId,
      },
      name,
      startTime: Date.now(),
      status: 'unset',
      attributes: attributes ?? {},
      events: [],
    };
  }

  getContext(): SpanContext {
    return { ...this.data.context };
  }

  setAttribute(key: string, value: unknown): this {
    this.data.attributes[key] = value;
    return this;
  }

  setAttributes(attributes: Record<string, unknown>): this {
    Object.assign(this.data.attributes, attributes);
    return this;
  }

  addEvent(name: string, attributes?: Record<string, unknown>): this {
    this.data.events.push({
      name,
      timestamp: Date.now(),
      attributes,
    });
    return this;
  }

  setStatus(status: 'ok' | 'error', message?: string): this {
    this.data.status = status;
    if (message) {
      this.data.attributes['error.message'] = message;
    }
    return this;
  }

  recordException(error: unknown): this {
    const failure = error instanceof Error ? error : new Error(String(error));
    this.setStatus('error', failure.message);
    this.addEvent('exception', {
      'exception.type': failure.name,
      'exception.message': failure.message,
      'exception.stacktrace': failure.stack,
    });
    return this;
  }

  startChild(name: string, attributes?: Record<string, unknown>): Span {
    return new Span(this.tracer, name, this.data.context, attributes);
  }

  /**
   * End the span. Ending twice records it once.
   */
  end(): void {
    if (this.data.endTime !== undefined) return;
    this.data.endTime = Date.now();
    if (this.data.status === 'unset') {
      this.data.status = 'ok';
    }
    this.tracer.recordSpan(this.data);
  }

  getDuration(): number {
    const endTime = this.data.endTime ?? Date.now();
    return endTime - this.data.startTime;
  }

  getData(): SpanData {
    return { ...this.data };
  }
}

/**
 * Tracer manages span creation and export
 */
export class Tracer {
  private config: TracingConfig;
  private spans: SpanData[] = [];
  private exportQueue: SpanData[] = [];
  private exportTimer?: ReturnType<typeof setInterval>;
  private inFlight?: Promise<void>;
  private exportFailing = false;

  constructor(config: TracingConfig) {
    this.config = config;

    if (config.enabled && config.exportEndpoint) {
      this.exportTimer = setInterval(() => void this.flush(), EXPORT_INTERVAL_MS);
      this.exportTimer.unref();
    }
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  startSpan(
    name: string,
    attributes?: Record<string, unknown>,
    parentContext?: SpanContext
  ): Span {
    return new Span(this, name, parentContext, attributes);
  }

  /**
   * Execute a function within a span
   */
  async trace<T>(
    name: string,
    fn: (span: Span) => Promise<T>,
    attributes?: Record<string, unknown>,
    parentContext?: SpanContext
  ): Promise<T> {
    const span = this.startSpan(name, attributes, parentContext);
    try {
      const result = await fn(span);
      span.setStatus('ok');
      return result;
    } catch (error) {
      span.recordException(error);
      throw error;
    } finally {
      span.end();
    }
  }

  /**
   * Record model-call attributes on a span
   */
  recordCompletion(
    span: Span,
    meta: Pick<CompletionMeta, 'provider' | 'model' | 'tokens' | 'cost' | 'latencyMs' | 'failoverAttempts'>
  ): void {
    span.setAttributes({
      'llm.provider': meta.provider,
      'llm.model': meta.model,
      'llm.tokens.input': meta.tokens.inputTokens,
      'llm.tokens.output': meta.tokens.outputTokens,
      'llm.tokens.total': meta.tokens.totalTokens,
      'llm.cost': meta.cost,
      'llm.latency_ms': meta.latencyMs,
      'llm.failover_attempts': meta.failoverAttempts,
    });
  }

  recordSpan(data: SpanData): void {
    if (!this.shouldSample()) return;

    this.spans.push(data);
    dropOldest(this.spans, MAX_RETAINED_SPANS);
    if (!this.config.exportEndpoint) return;

    this.exportQueue.push(data);
    dropOldest(this.exportQueue, MAX_EXPORT_QUEUE);
    // While the endpoint is failing only the timer and shutdown retry
    if (this.exportQueue.length >= EXPORT_BATCH_SIZE && !this.exportFailing) {
      void this.flush();
    }
  }

  /**
   * Flush pending spans to the export endpoint. Failed batches are re-queued,
   * oldest spans dropped first once the queue is full. Concurrent calls share
   * the export in flight.
   */
  flush(): Promise<void> {
    if (this.inFlight) return this.inFlight;
    if (!this.config.exportEndpoint || this.exportQueue.length === 0) return Promise.resolve();

    this.inFlight = this.exportBatch(this.config.exportEndpoint).finally(() => {
      this.inFlight = undefined;
    });
    return this.inFlight;
  }

  private async exportBatch(endpoint: string): Promise<void> {
    const toExport = [...this.exportQueue];
    this.exportQueue = [];

    try {
      const response = await fetch(endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ spans: toExport }),
      });
      if (!response.ok) {
        throw new Error(`span export returned HTTP ${response.status}`);
      }
      this.exportFailing = false;
    } catch (error) {
      this.exportQueue.unshift(...toExport);
      dropOldest(this.exportQueue, MAX_EXPORT_QUEUE);
      if (!this.exportFailing) {
        console.error('[Tracer] Failed to export spans:', error);
      }
      this.exportFailing = true;
    }
  }

  getSpans(): SpanData[] {
    return [...this.spans];
  }

  clearSpans(): void {
    this.spans = [];
  }

  getPendingExportCount(): number {
    return this.exportQueue.length;
  }

  generateTraceId(): string {
    return `trace_${generateId()}`;
  }

  async shutdown(): Promise<void> {
    if (this.exportTimer) {
      clearInterval(this.exportTimer);
      this.exportTimer = undefined;
    }
    await this.inFlight;
    await this.flush();
  }

  private shouldSample(): boolean {
    if (!this.config.enabled) return false;
    if (this.config.sampleRate === undefined) return true;
    return Math.random() < this.config.sampleRate;
  }
}

function dropOldest<T>(items: T[], limit: number): void {
  if (items.length > limit) {
    items.splice(0, items.length - limit);
  }
}

function generateId(): string {
  return `${Date.now().toString(36)}_${Math.random().toString(36).substring(2, 11)}`;
}

/**
 * Create a no-op tracer for when tracing is disabled
 */
export function createNoopTracer(): Tracer {
  return new Tracer({ enabled: false });
}
