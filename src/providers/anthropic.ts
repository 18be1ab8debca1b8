/**
 * Anthropic Provider Adapter
 * Handles Claude models via the Anthropic API
 */

import Anthropic from '@anthropic-ai/sdk';
import { BaseProvider } from './base.js';
import type {
  ProviderCredentials,
  CompletionRequest,
  CompletionResponse,
  ChatMessage,
  FinishReason,
  ModelPricing,
  TokenUsage,
} from '../types/index.js';

// Pricing per 1K tokens
const MODEL_PRICING: Record<string, ModelPricing> = {
  'claude-3-5-sonnet-20241022': { inputPer1k: 0.003, outputPer1k: 0.015 },
  'claude-3-5-haiku-20241022': { inputPer1k: 0.0008, outputPer1k: 0.004 },
  'claude-3-opus-20240229': { inputPer1k: 0.015, outputPer1k: 0.075 },
  'claude-3-haiku-20240307': { inputPer1k: 0.00025, outputPer1k: 0.00125 },
};

const MODEL_ALIASES: Record<string, string> = {
  'claude-3.5-sonnet': 'claude-3-5-sonnet-20241022',
  'claude-3.5-haiku': 'claude-3-5-haiku-20241022',
  'claude-3-opus': 'claude-3-opus-20240229',
  'claude-3-haiku': 'claude-3-haiku-20240307',
};

const DEFAULT_MAX_TOKENS = 4096;

export class AnthropicProvider extends BaseProvider {
  name = 'anthropic' as const;
  private client: Anthropic;

  constructor(credentials: ProviderCredentials) {
    super(credentials);
    this.client = new Anthropic({
      apiKey: credentials.apiKey,
      baseURL: credentials.baseUrl,
    });
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const startTime = Date.now();
    const resolvedModel = this.resolveModel(request.model);

    // Claude takes the system prompt out of band
    const { systemPrompt, messages } = this.convertMessages(request.messages);

    const anthropicRequest: Anthropic.MessageCreateParamsNonStreaming = {
      model: resolvedModel,
      max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
      messages,
      ...(systemPrompt && { system: systemPrompt }),
      ...(request.temperature !== undefined && { temperature: request.temperature }),
    };

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(anthropicRequest, {
        signal: request.signal,
      });
    } catch (error) {
      throw this.normalizeError(error);
    }

    const usage: TokenUsage = {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      totalTokens: response.usage.input_tokens + response.usage.output_tokens,
    };

    let content = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        content += block.text;
      }
    }

    return {
      content,
      finishReason: this.mapStopReason(response.stop_reason),
      meta: {
        latencyMs: Date.now() - startTime,
        tokens: usage,
        cost: this.calculateCost(resolvedModel, usage),
        traceId: '', // Set by ModelClient
        model: resolvedModel,
        provider: 'anthropic',
        failoverAttempts: 0,
      },
    };
  }

  async listModels(): Promise<string[]> {
    return Object.keys(MODEL_PRICING);
  }

  getModelCost(model: string): ModelPricing {
    const resolved = this.resolveModel(model);
    return MODEL_PRICING[resolved] ?? { inputPer1k: 0.003, outputPer1k: 0.015 };
  }

  private resolveModel(model: string): string {
    return MODEL_ALIASES[model] ?? model;
  }

  private convertMessages(
    messages: ChatMessage[]
  ): { systemPrompt: string | undefined; messages: Anthropic.MessageParam[] } {
    let systemPrompt: string | undefined;
    const anthropicMessages: Anthropic.MessageParam[] = [];

    for (const msg of messages) {
      if (msg.role === 'system') {
        systemPrompt = systemPrompt ? `${systemPrompt}\n\n${msg.content}` : msg.content;
      } else {
        anthropicMessages.push({ role: msg.role, content: msg.content });
      }
    }

    return { systemPrompt, messages: anthropicMessages };
  }

  private mapStopReason(reason: string | null): FinishReason {
    return reason === 'max_tokens' ? 'length' : 'stop';
  }
}
