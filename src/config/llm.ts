// src/config/llm.ts

import type { EnvironmentSource } from './env';
import { MissingCredentialError } from './errors';
import {
  llmProvider,
  lookupFirst,
  nonEmptyText,
  positiveInteger,
  positiveNumber,
  resolveField,
  temperatureNumber,
  urlText,
} from './schema';
import type { LLMConfig, LLMProvider } from './types';

interface ProviderProfile {
  prefix: string;
  defaultModel: string;
  defaultBaseURL: string;
}

export const PROVIDER_PROFILES: Record<LLMProvider, ProviderProfile> = {
  moonshot: {
    prefix: 'MOONSHOT',
    defaultModel: 'kimi-k2-0905-preview',
    defaultBaseURL: 'https://api.moonshot.cn/v1',
  },
  openai: {
    prefix: 'OPENAI',
    defaultModel: 'gpt-4.1-mini',
    defaultBaseURL: 'https://api.openai.com/v1',
  },
};

export const DEFAULT_PROVIDER: LLMProvider = 'moonshot';
export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 1000;
export const DEFAULT_TIMEOUT_SECONDS = 30;

/**
 * Variables to consult for one LLM setting, most specific first:
 * provider-specific, then vendor-neutral `LLM_*`, then the `OPENAI_*`
 * names most OpenAI-compatible tooling already exports.
 */
export function llmVariableNames(
  provider: LLMProvider,
  suffix: string,
  neutralSuffix: string = suffix,
): string[] {
  const names = [
    `${PROVIDER_PROFILES[provider].prefix}_${suffix}`,
    `LLM_${neutralSuffix}`,
    `OPENAI_${suffix}`,
  ];
  return [...new Set(names)];
}

/**
 * Build the LLM view from the environment. Pure apart from reading `env`;
 * throws `InvalidConfigValueError` or `MissingCredentialError`.
 */
export function buildLLMConfig(env: EnvironmentSource): LLMConfig {
  const provider = resolveField<LLMProvider>(env, 'provider', {
    keys: ['LLM_PROVIDER'],
    schema: llmProvider,
    default: DEFAULT_PROVIDER,
  });
  const profile = PROVIDER_PROFILES[provider];

  const modelName = resolveField(env, 'modelName', {
    keys: llmVariableNames(provider, 'MODEL', 'MODEL_NAME'),
    schema: nonEmptyText,
    default: profile.defaultModel,
  });
  const baseURL = resolveField(env, 'baseURL', {
    keys: llmVariableNames(provider, 'BASE_URL'),
    schema: urlText,
    default: profile.defaultBaseURL,
  });
  const temperature = resolveField(env, 'temperature', {
    keys: llmVariableNames(provider, 'TEMPERATURE'),
    schema: temperatureNumber,
    default: DEFAULT_TEMPERATURE,
  });
  const maxTokens = resolveField(env, 'maxTokens', {
    keys: llmVariableNames(provider, 'MAX_TOKENS'),
    schema: positiveInteger,
    default: DEFAULT_MAX_TOKENS,
  });
  const timeoutSeconds = resolveField(env, 'timeoutSeconds', {
    keys: llmVariableNames(provider, 'TIMEOUT'),
    schema: positiveNumber,
    default: DEFAULT_TIMEOUT_SECONDS,
  });

  // No default: a missing key must fail here, not at the first request.
  const keyNames = llmVariableNames(provider, 'API_KEY');
  const key = lookupFirst(env, keyNames);
  const apiKey = key?.raw.trim();
  if (!key || !apiKey) {
    throw new MissingCredentialError('apiKey', keyNames);
  }

  return Object.freeze({
    provider,
    apiKey,
    apiKeySource: key.key,
    modelName,
    baseURL,
    temperature,
    maxTokens,
    timeoutSeconds,
  });
}
