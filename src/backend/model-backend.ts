/**
 * Model Backend
 * Reasoning backend that renders a transcript as a chat completion request
 */

import type {
  AgentId,
  ChatMessage,
  CompletionRequest,
  CompletionResponse,
  Message,
} from '../types/index.js';
import { BackendError } from '../types/index.js';
import type { SpanContext } from '../tracing/tracer.js';
import { USER_SOURCE } from '../teams/transcript.js';
import type { BackendCallOptions, ReasoningBackend } from './backend.js';

/** The part of ModelClient the backend relies on. */
export interface CompletionClient {
  complete(request: CompletionRequest, parentContext?: SpanContext): Promise<CompletionResponse>;
}

export interface ModelBackendOptions {
  client: CompletionClient;
  model: string;
  fallback?: string[];
  temperature?: number;
  maxTokens?: number;
  /** Per-request deadline in milliseconds. */
  timeout?: number;
}

export class ModelBackend implements ReasoningBackend {
  private options: ModelBackendOptions;

  constructor(options: ModelBackendOptions) {
    this.options = options;
  }

  get model(): string {
    return this.options.model;
  }

  async complete(
    transcript: readonly Message[],
    persona: string,
    options: BackendCallOptions = {}
  ): Promise<string> {
    const { client, model, fallback, temperature, maxTokens, timeout } = this.options;
    const request: CompletionRequest = {
      model,
      messages: toChatMessages(transcript, persona, options.speaker),
      ...(fallback && fallback.length > 0 && { fallback }),
      ...(temperature !== undefined && { temperature }),
      ...(maxTokens !== undefined && { maxTokens }),
      ...(timeout !== undefined && { timeout }),
      signal: options.signal,
    };

    let response: CompletionResponse;
    try {
      response = await client.complete(request, options.traceContext);
    } catch (error) {
      if (options.signal?.aborted || error instanceof BackendError) {
        throw error;
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new BackendError(`Completion failed for ${options.speaker ?? 'agent'}: ${detail}`, error);
    }

    if (response.content.trim().length === 0) {
      throw new BackendError(
        `Malformed completion: ${response.meta.model} returned no text (finish reason: ${response.finishReason})`
      );
    }
    return response.content;
  }
}

/**
 * Persona first, then the transcript in order. The speaker's own messages are
 * assistant turns; everyone else's are user turns tagged with their author.
 */
export function toChatMessages(
  transcript: readonly Message[],
  persona: string,
  speaker?: AgentId
): ChatMessage[] {
  const messages: ChatMessage[] = [];
  if (persona.trim().length > 0) {
    messages.push({ role: 'system', content: persona });
  }

  for (const message of transcript) {
    if (speaker !== undefined && message.source === speaker) {
      messages.push({ role: 'assistant', content: message.content, name: message.source });
    } else if (message.source === USER_SOURCE) {
      messages.push({ role: 'user', content: message.content });
    } else {
      messages.push({
        role: 'user',
        content: `${message.source}: ${message.content}`,
        name: message.source,
      });
    }
  }

  return messages;
}
