/**
 * Provider Registry
 * Central registry for all LLM provider adapters
 */

export { BaseProvider } from './base.js';
export { AnthropicProvider } from './anthropic.js';
export { OpenAIProvider } from './openai.js';
export { GoogleProvider } from './google.js';

import type { ProviderAdapter, ProviderName, ProvidersConfig } from '../types/index.js';
import { AnthropicProvider } from './anthropic.js';
import { OpenAIProvider } from './openai.js';
import { GoogleProvider } from './google.js';

const MODEL_PREFIXES: Array<[prefix: string, provider: ProviderName]> = [
  ['claude', 'anthropic'],
  ['gpt', 'openai'],
  ['o1', 'openai'],
  ['o3', 'openai'],
  ['o4', 'openai'],
  ['gemini', 'google'],
];

/**
 * Environment variable holding each provider's key
 */
export const PROVIDER_KEY_VARIABLES: Record<ProviderName, string> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
  google: 'GOOGLE_API_KEY',
};

/**
 * Create provider instances from config
 */
export function createProviders(config: ProvidersConfig): Map<ProviderName, ProviderAdapter> {
  const providers = new Map<ProviderName, ProviderAdapter>();

  if (config.anthropic?.apiKey) {
    providers.set('anthropic', new AnthropicProvider(config.anthropic));
  }

  if (config.openai?.apiKey) {
    providers.set('openai', new OpenAIProvider(config.openai));
  }

  if (config.google?.apiKey) {
    providers.set('google', new GoogleProvider(config.google));
  }

  return providers;
}

/**
 * Get provider name for a model
 */
export function getProviderForModel(model: string): ProviderName | undefined {
  return MODEL_PREFIXES.find(([prefix]) => model.startsWith(prefix))?.[1];
}
