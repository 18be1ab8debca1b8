/**
 * Roundtable
 * Turn-taking teams of conversational agents, with composable termination
 * and whole teams nested as single participants.
 *
 * @packageDocumentation
 */

export * from './types/index.js';
export * from './conditions/index.js';
export * from './agents/index.js';
export * from './teams/index.js';
export * from './backend/index.js';
export * from './console/index.js';
export { ModelClient } from './client.js';
export type { ModelClientStats } from './client.js';
export { Router } from './routing/router.js';
export type { RouterConfig, RouteResult, RouteAttempt } from './routing/router.js';
export { Tracer, Span, createNoopTracer } from './tracing/tracer.js';
export type { SpanContext, SpanData, SpanEvent } from './tracing/tracer.js';
export { createProviders, getProviderForModel } from './providers/index.js';
export { loadConfig, DEFAULT_MODEL } from './config/index.js';
export type { AppConfig, ConfigOverrides } from './config/index.js';

export { ModelClient as default } from './client.js';
