import { describe, it, expect } from 'vitest';
import { createStaticEnvSource } from '../src/config/env';
import { buildLLMConfig } from '../src/config/llm';
import { createOpenAIClient, toRequestDefaults } from '../src/llm/client';

describe('llm client', () => {
  it('derives request defaults from the LLM view', () => {
    const llm = buildLLMConfig(
      createStaticEnvSource({ LLM_API_KEY: 'test-key', LLM_TIMEOUT: '12.5' }),
    );
    expect(toRequestDefaults(llm)).toEqual({
      model: 'kimi-k2-0905-preview',
      temperature: 0.7,
      maxTokens: 1000,
      timeoutMs: 12_500,
    });
  });

  it('builds an OpenAI SDK client from the configured endpoint', () => {
    const llm = buildLLMConfig(
      createStaticEnvSource({
        LLM_PROVIDER: 'openai',
        OPENAI_API_KEY: 'test-key',
        OPENAI_BASE_URL: 'http://localhost:8000/v1',
      }),
    );
    const client = createOpenAIClient(llm);
    expect(client.apiKey).toBe('test-key');
    expect(client.baseURL).toBe('http://localhost:8000/v1');
    expect(client.timeout).toBe(30_000);
  });
});
