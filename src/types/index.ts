/**
 * Core type definitions for Roundtable
 */

// ============================================================================
// Conversation Types
// ============================================================================

/** Name of a participant; unique within its team. */
export type AgentId = string;

/**
 * One entry of a transcript. Created once by its author and never mutated.
 */
export interface Message {
  readonly source: AgentId;
  readonly content: string;
  readonly sequenceNumber: number;
}

export interface TaskResult {
  messages: readonly Message[];
  stopReason: string;
}

export type RunStream = AsyncGenerator<Message, TaskResult, undefined>;

export interface RunOptions {
  signal?: AbortSignal;
}

// ============================================================================
// Provider Types
// ============================================================================

export type ProviderName = 'anthropic' | 'openai' | 'google';

export interface ProviderCredentials {
  apiKey: string;
  baseUrl?: string;
  organizationId?: string;
}

export interface ProvidersConfig {
  anthropic?: ProviderCredentials;
  openai?: ProviderCredentials;
  google?: ProviderCredentials;
}

export type ChatRole = 'system' | 'user' | 'assistant';

/** Provider-neutral chat message sent to a completion endpoint. */
export interface ChatMessage {
  role: ChatRole;
  content: string;
  name?: string;
}

// ============================================================================
// Request/Response Types
// ============================================================================

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  fallback?: string[];
  timeout?: number;
  signal?: AbortSignal;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export type FinishReason = 'stop' | 'length' | 'content_filter';

export interface CompletionMeta {
  latencyMs: number;
  tokens: TokenUsage;
  cost: number;
  traceId: string;
  model: string;
  provider: ProviderName;
  failoverAttempts: number;
}

export interface CompletionResponse {
  content: string;
  finishReason: FinishReason;
  meta: CompletionMeta;
}

export interface ModelPricing {
  inputPer1k: number;
  outputPer1k: number;
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface TracingConfig {
  enabled: boolean;
  exportEndpoint?: string;
  sampleRate?: number;
}

export interface CostTrackingConfig {
  enabled: boolean;
  alertThreshold?: number;
  budgetLimit?: number;
}

export interface RetryConfig {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  retryableErrors: string[];
}

export interface ModelClientConfig {
  providers: ProvidersConfig;
  tracing?: TracingConfig;
  costTracking?: CostTrackingConfig;
  retry?: Partial<RetryConfig>;
  defaultTimeout?: number;
}

// ============================================================================
// Provider Adapter Interface
// ============================================================================

export interface ProviderAdapter {
  name: ProviderName;

  complete(request: CompletionRequest): Promise<CompletionResponse>;

  listModels(): Promise<string[]>;

  isAvailable(): Promise<boolean>;

  getModelCost(model: string): ModelPricing;
}

// ============================================================================
// Error Types
// ============================================================================

export class RoundtableError extends Error {
  constructor(
    message: string,
    public code: string,
    public cause?: unknown
  ) {
    super(message);
    this.name = 'RoundtableError';
  }
}

export class ProviderError extends RoundtableError {
  constructor(
    message: string,
    public provider: ProviderName,
    public statusCode?: number,
    cause?: unknown
  ) {
    super(message, 'PROVIDER_ERROR', cause);
    this.name = 'ProviderError';
  }
}

export class RateLimitError extends RoundtableError {
  constructor(
    public provider: ProviderName,
    public retryAfterMs?: number
  ) {
    super(`Rate limit exceeded for ${provider}`, 'RATE_LIMIT');
    this.name = 'RateLimitError';
  }
}

export class TimeoutError extends RoundtableError {
  constructor(public provider: ProviderName, timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

/**
 * A provider answered, but without anything usable. Not retried: asking again
 * gets the same answer.
 */
export class MalformedResponseError extends RoundtableError {
  constructor(message: string, public provider: ProviderName) {
    super(message, 'MALFORMED_RESPONSE');
    this.name = 'MalformedResponseError';
  }
}

export interface FailedAttempt {
  provider: ProviderName;
  model: string;
  error: Error;
}

export class AllProvidersFailedError extends RoundtableError {
  constructor(public attempts: FailedAttempt[]) {
    super(
      attempts.length === 0
        ? 'No configured provider can serve the requested models'
        : `All providers failed: ${attempts.map(a => `${a.provider}/${a.model}`).join(', ')}`,
      'ALL_PROVIDERS_FAILED',
      attempts[attempts.length - 1]?.error
    );
    this.name = 'AllProvidersFailedError';
  }
}

/**
 * Failure of the reasoning backend behind an agent: auth, quota, network,
 * timeout or a malformed completion.
 */
export class BackendError extends RoundtableError {
  constructor(message: string, cause?: unknown) {
    super(message, 'BACKEND_ERROR', cause);
    this.name = 'BackendError';
  }
}

export class ConfigurationError extends RoundtableError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export type AbortReason = 'cancelled' | 'agent_failed';

/**
 * A run that stopped before reaching termination. `transcript` holds every
 * message appended up to the failure.
 */
export class ConversationAborted extends RoundtableError {
  constructor(
    message: string,
    public reason: AbortReason,
    public transcript: readonly Message[],
    public agent?: AgentId,
    cause?: unknown
  ) {
    super(message, 'CONVERSATION_ABORTED', cause);
    this.name = 'ConversationAborted';
  }
}

export class InvalidReplyError extends RoundtableError {
  constructor(message: string) {
    super(message, 'INVALID_REPLY');
    this.name = 'InvalidReplyError';
  }
}

export class AgentBusyError extends RoundtableError {
  constructor(agent: AgentId) {
    super(`Agent ${agent} is already responding`, 'AGENT_BUSY');
    this.name = 'AgentBusyError';
  }
}

export class TeamConfigError extends RoundtableError {
  constructor(message: string) {
    super(message, 'TEAM_CONFIG');
    this.name = 'TeamConfigError';
  }
}
