/**
 * Reasoning Backend
 * The collaborator that turns a transcript and a persona into new text
 */

import type { AgentId, Message } from '../types/index.js';
import type { SpanContext } from '../tracing/tracer.js';

export interface BackendCallOptions {
  /** Aborts the in-flight completion. */
  signal?: AbortSignal;
  /** Agent on whose behalf the call is made; its own messages read as assistant turns. */
  speaker?: AgentId;
  /** Parent span for tracing. */
  traceContext?: SpanContext;
}

/**
 * Fails with BackendError on auth, quota, network or malformed-response conditions.
 */
export interface ReasoningBackend {
  complete(
    transcript: readonly Message[],
    persona: string,
    options?: BackendCallOptions
  ): Promise<string>;
}
