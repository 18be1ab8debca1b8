/**
 * Configuration
 * Process settings read from the environment and validated up front
 */

import { z } from 'zod';
import type { ProviderName, ProvidersConfig } from '../types/index.js';
import { ConfigurationError } from '../types/index.js';
import { getProviderForModel, PROVIDER_KEY_VARIABLES } from '../providers/index.js';

export const DEFAULT_MODEL = 'gpt-4o-mini';

const optionalText = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

// Blank entries, as left by a .env template, count as unset
const blankAsUnset = (value: unknown) =>
  typeof value === 'string' && value.trim().length === 0 ? undefined : value;

const positiveInt = (fallback: number) =>
  z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(fallback));

const flag = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no', ''])
  .default('')
  .transform((value) => value === '1' || value === 'true' || value === 'yes');

const envSchema = z.object({
  OPENAI_API_KEY: optionalText,
  ANTHROPIC_API_KEY: optionalText,
  GOOGLE_API_KEY: optionalText,
  ROUNDTABLE_MODEL: optionalText,
  ROUNDTABLE_FALLBACK_MODELS: optionalText,
  ROUNDTABLE_TIMEOUT_MS: positiveInt(60000),
  ROUNDTABLE_MAX_RETRIES: z.preprocess(blankAsUnset, z.coerce.number().int().min(0).default(2)),
  ROUNDTABLE_MAX_INNER_MESSAGES: positiveInt(6),
  ROUNDTABLE_MAX_OUTER_TURNS: positiveInt(2),
  ROUNDTABLE_APPROVAL_KEYWORD: optionalText,
  ROUNDTABLE_TRACE: flag,
  ROUNDTABLE_TRACE_ENDPOINT: z.preprocess(blankAsUnset, z.string().url().optional()),
  ROUNDTABLE_COST_ALERT: z.preprocess(blankAsUnset, z.coerce.number().positive().optional()),
  SINGLE_QUERY: optionalText,
});

export interface AppConfig {
  providers: ProvidersConfig;
  model: string;
  fallbackModels: string[];
  timeoutMs: number;
  maxRetries: number;
  maxInnerMessages: number;
  maxOuterTurns: number;
  approvalKeyword: string;
  tracing: { enabled: boolean; exportEndpoint?: string };
  costAlertThreshold?: number;
  singleQuery?: string;
}

export type ConfigOverrides = Partial<
  Pick<AppConfig, 'model' | 'maxInnerMessages' | 'maxOuterTurns' | 'singleQuery'>
> & { trace?: boolean };

/**
 * Build the process configuration. Every model in the chain must map to a
 * provider, and the primary model's provider must have a key.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }
  const vars = parsed.data;

  const providers: ProvidersConfig = {
    ...(vars.OPENAI_API_KEY && { openai: { apiKey: vars.OPENAI_API_KEY } }),
    ...(vars.ANTHROPIC_API_KEY && { anthropic: { apiKey: vars.ANTHROPIC_API_KEY } }),
    ...(vars.GOOGLE_API_KEY && { google: { apiKey: vars.GOOGLE_API_KEY } }),
  };

  const model = overrides.model ?? vars.ROUNDTABLE_MODEL ?? DEFAULT_MODEL;
  const fallbackModels = (vars.ROUNDTABLE_FALLBACK_MODELS ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  for (const candidate of [model, ...fallbackModels]) {
    if (!getProviderForModel(candidate)) {
      throw new ConfigurationError(`Unknown model "${candidate}": no provider serves it`);
    }
  }

  const provider = getProviderForModel(model);
  if (provider && !providers[provider]) {
    throw new ConfigurationError(missingKeyMessage(provider));
  }

  for (const [name, value] of Object.entries({
    maxInnerMessages: overrides.maxInnerMessages,
    maxOuterTurns: overrides.maxOuterTurns,
  })) {
    if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
      throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
    }
  }

  return {
    providers,
    model,
    fallbackModels,
    timeoutMs: vars.ROUNDTABLE_TIMEOUT_MS,
    maxRetries: vars.ROUNDTABLE_MAX_RETRIES,
    maxInnerMessages: overrides.maxInnerMessages ?? vars.ROUNDTABLE_MAX_INNER_MESSAGES,
    maxOuterTurns: overrides.maxOuterTurns ?? vars.ROUNDTABLE_MAX_OUTER_TURNS,
    approvalKeyword: vars.ROUNDTABLE_APPROVAL_KEYWORD ?? 'APPROVE',
    tracing: {
      enabled: overrides.trace ?? (vars.ROUNDTABLE_TRACE || vars.ROUNDTABLE_TRACE_ENDPOINT !== undefined),
      exportEndpoint: vars.ROUNDTABLE_TRACE_ENDPOINT,
    },
    costAlertThreshold: vars.ROUNDTABLE_COST_ALERT,
    singleQuery: overrides.singleQuery ?? vars.SINGLE_QUERY,
  };
}

function missingKeyMessage(provider: ProviderName): string {
  return (
    `${PROVIDER_KEY_VARIABLES[provider]} environment variable not set. ` +
    'Please set it before running the application.'
  );
}
