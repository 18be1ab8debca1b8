/**
 * OpenAI Provider Adapter
 * Handles GPT models via the OpenAI API
 */

import OpenAI from 'openai';
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
import { MalformedResponseError } from '../types/index.js';

// Pricing per 1K tokens
const MODEL_PRICING: Record<string, ModelPricing> = {
  'gpt-4o-mini': { inputPer1k: 0.00015, outputPer1k: 0.0006 },
  'gpt-4o': { inputPer1k: 0.0025, outputPer1k: 0.01 },
  'gpt-4.1-mini': { inputPer1k: 0.0004, outputPer1k: 0.0016 },
  'gpt-4.1': { inputPer1k: 0.002, outputPer1k: 0.008 },
  'gpt-4-turbo': { inputPer1k: 0.01, outputPer1k: 0.03 },
  'gpt-3.5-turbo': { inputPer1k: 0.0005, outputPer1k: 0.0015 },
};

// OpenAI only accepts these characters in a participant name
const NAME_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export class OpenAIProvider extends BaseProvider {
  name = 'openai' as const;
  private client: OpenAI;

  constructor(credentials: ProviderCredentials) {
    super(credentials);
    this.client = new OpenAI({
      apiKey: credentials.apiKey,
      baseURL: credentials.baseUrl,
      organization: credentials.organizationId,
    });
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const startTime = Date.now();

    const openaiRequest: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model: request.model,
      messages: this.convertMessages(request.messages),
      ...(request.maxTokens && { max_tokens: request.maxTokens }),
      ...(request.temperature !== undefined && { temperature: request.temperature }),
    };

    let response: OpenAI.Chat.ChatCompletion;
    try {
      response = await this.client.chat.completions.create(openaiRequest, {
        signal: request.signal,
      });
    } catch (error) {
      throw this.normalizeError(error);
    }

    const choice = response.choices[0];
    if (!choice) {
      throw new MalformedResponseError('OpenAI returned no choices', this.name);
    }

    const usage: TokenUsage = {
      inputTokens: response.usage?.prompt_tokens ?? 0,
      outputTokens: response.usage?.completion_tokens ?? 0,
      totalTokens: response.usage?.total_tokens ?? 0,
    };

    return {
      content: choice.message.content ?? '',
      finishReason: this.mapFinishReason(choice.finish_reason),
      meta: {
        latencyMs: Date.now() - startTime,
        tokens: usage,
        cost: this.calculateCost(request.model, usage),
        traceId: '', // Set by ModelClient
        model: request.model,
        provider: 'openai',
        failoverAttempts: 0,
      },
    };
  }

  async listModels(): Promise<string[]> {
    const response = await this.client.models.list();
    return response.data
      .filter((m) => m.id.startsWith('gpt'))
      .map((m) => m.id);
  }

  getModelCost(model: string): ModelPricing {
    // Longest key first so 'gpt-4o-mini' wins over 'gpt-4o'
    const keys = Object.keys(MODEL_PRICING).sort((a, b) => b.length - a.length);
    const match = keys.find((key) => model.startsWith(key));
    return match ? MODEL_PRICING[match] : MODEL_PRICING['gpt-4o'];
  }

  private convertMessages(messages: ChatMessage[]): OpenAI.Chat.ChatCompletionMessageParam[] {
    return messages.map((msg): OpenAI.Chat.ChatCompletionMessageParam => {
      const name = msg.name && NAME_PATTERN.test(msg.name) ? msg.name : undefined;
      switch (msg.role) {
        case 'system':
          return { role: 'system', content: msg.content };
        case 'assistant':
          return { role: 'assistant', content: msg.content, ...(name && { name }) };
        case 'user':
          return { role: 'user', content: msg.content, ...(name && { name }) };
      }
    });
  }

  private mapFinishReason(reason: string | null): FinishReason {
    switch (reason) {
      case 'length':
        return 'length';
      case 'content_filter':
        return 'content_filter';
      default:
        return 'stop';
    }
  }
}
