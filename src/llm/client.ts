// src/llm/client.ts

import OpenAI from 'openai';
import type { LLMConfig } from '../config/types';

/**
 * Per-request settings derived from the LLM view, in the shape the agent
 * loop passes alongside its messages.
 */
export interface LLMRequestDefaults {
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export function toRequestDefaults(config: LLMConfig): LLMRequestDefaults {
  return {
    model: config.modelName,
    temperature: config.temperature,
    maxTokens: config.maxTokens,
    timeoutMs: Math.round(config.timeoutSeconds * 1000),
  };
}

/**
 * OpenAI SDK client pointed at the configured endpoint. Moonshot and other
 * OpenAI-compatible providers only differ by `baseURL`.
 * Only the config values are used; the SDK's own env lookups never apply.
 */
export function createOpenAIClient(config: LLMConfig): OpenAI {
  return new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseURL,
    timeout: toRequestDefaults(config).timeoutMs,
  });
}
