/**
 * Google Provider Adapter
 * Handles Gemini models via the Google Generative AI API
 */

import { GoogleGenerativeAI } from '@google/generative-ai';
import type { Content, EnhancedGenerateContentResponse } from '@google/generative-ai';
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
  'gemini-1.5-pro': { inputPer1k: 0.00125, outputPer1k: 0.005 },
  'gemini-1.5-flash': { inputPer1k: 0.000075, outputPer1k: 0.0003 },
  'gemini-2.0-flash': { inputPer1k: 0.0001, outputPer1k: 0.0004 },
};

const MODEL_ALIASES: Record<string, string> = {
  'gemini-pro': 'gemini-1.5-pro',
  'gemini-flash': 'gemini-1.5-flash',
};

export class GoogleProvider extends BaseProvider {
  name = 'google' as const;
  private client: GoogleGenerativeAI;

  constructor(credentials: ProviderCredentials) {
    super(credentials);
    this.client = new GoogleGenerativeAI(credentials.apiKey);
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const startTime = Date.now();
    const resolvedModel = this.resolveModel(request.model);

    const model = this.client.getGenerativeModel(
      {
        model: resolvedModel,
        generationConfig: {
          maxOutputTokens: request.maxTokens ?? 4096,
          temperature: request.temperature,
        },
      },
      this.credentials.baseUrl ? { baseUrl: this.credentials.baseUrl } : undefined
    );

    const { systemInstruction, history, last } = this.convertMessages(request.messages);

    const chat = model.startChat({
      history,
      ...(systemInstruction && { systemInstruction }),
    });

    let response: EnhancedGenerateContentResponse;
    try {
      const result = await chat.sendMessage(last.parts, { signal: request.signal });
      response = result.response;
    } catch (error) {
      throw this.normalizeError(error);
    }

    // Gemini does not always report usage
    const usage: TokenUsage = {
      inputTokens: response.usageMetadata?.promptTokenCount ?? 0,
      outputTokens: response.usageMetadata?.candidatesTokenCount ?? 0,
      totalTokens: response.usageMetadata?.totalTokenCount ?? 0,
    };

    return {
      content: response.text(),
      finishReason: this.mapFinishReason(response.candidates?.[0]?.finishReason),
      meta: {
        latencyMs: Date.now() - startTime,
        tokens: usage,
        cost: this.calculateCost(resolvedModel, usage),
        traceId: '', // Set by ModelClient
        model: resolvedModel,
        provider: 'google',
        failoverAttempts: 0,
      },
    };
  }

  async listModels(): Promise<string[]> {
    return Object.keys(MODEL_PRICING);
  }

  getModelCost(model: string): ModelPricing {
    const resolved = this.resolveModel(model);
    return MODEL_PRICING[resolved] ?? { inputPer1k: 0.00125, outputPer1k: 0.005 };
  }

  private resolveModel(model: string): string {
    return MODEL_ALIASES[model] ?? model;
  }

  private convertMessages(messages: ChatMessage[]): {
    systemInstruction: string | undefined;
    history: Content[];
    last: Content;
  } {
    let systemInstruction: string | undefined;
    const contents: Content[] = [];

    for (const msg of messages) {
      if (msg.role === 'system') {
        systemInstruction = systemInstruction ? `${systemInstruction}\n\n${msg.content}` : msg.content;
      } else {
        contents.push({
          role: msg.role === 'assistant' ? 'model' : 'user',
          parts: [{ text: msg.content }],
        });
      }
    }

    const last = contents.pop() ?? { role: 'user', parts: [{ text: '' }] };
    return { systemInstruction, history: contents, last };
  }

  private mapFinishReason(reason: string | undefined): FinishReason {
    switch (reason) {
      case 'MAX_TOKENS':
        return 'length';
      case 'SAFETY':
      case 'RECITATION':
        return 'content_filter';
      default:
        return 'stop';
    }
  }
}
