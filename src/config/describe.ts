// src/config/describe.ts

import type { LLMConfig, ProjectConfig } from './types';

export const REDACTED = '[redacted]';

/**
 * Human-readable lines for the LLM view. The key is never rendered,
 * only the variable it came from.
 */
export function describeLLMConfig(config: LLMConfig): string[] {
  return [
    `provider: ${config.provider}`,
    `apiKey: ${REDACTED} (from ${config.apiKeySource})`,
    `modelName: ${config.modelName}`,
    `baseURL: ${config.baseURL}`,
    `temperature: ${config.temperature}`,
    `maxTokens: ${config.maxTokens}`,
    `timeoutSeconds: ${config.timeoutSeconds}`,
  ];
}

export function describeProjectConfig(config: ProjectConfig): string[] {
  return [
    `projectName: ${config.projectName}`,
    `version: ${config.version}`,
    `maxIterations: ${config.maxIterations}`,
    `debugMode: ${config.debugMode}`,
    `logLevel: ${config.logLevel}`,
    `dataDir: ${config.dataDir}`,
    `cacheDir: ${config.cacheDir}`,
    `logsDir: ${config.logsDir}`,
    `agentWorkRoot: ${config.agentWorkRoot}`,
    `defaultUserMessage: ${config.defaultUserMessage}`,
    `completionThreshold: ${config.completionThreshold}`,
  ];
}
