// src/config/index.ts

export { ConfigManager } from './manager';
export type { ConfigManagerOptions } from './manager';
export { createProcessEnvSource, createStaticEnvSource } from './env';
export type { EnvironmentSource } from './env';
export {
  ConfigError,
  MissingCredentialError,
  InvalidConfigValueError,
  DiagnosticSinkUnavailableError,
} from './errors';
export type { ConfigErrorCode } from './errors';
export { buildLLMConfig, llmVariableNames, PROVIDER_PROFILES } from './llm';
export { buildProjectConfig, PROJECT_DEFAULTS } from './project';
export { describeLLMConfig, describeProjectConfig, REDACTED } from './describe';
export { LLM_PROVIDERS, LOG_LEVELS } from './types';
export type { LLMConfig, LLMProvider, LogLevel, ProjectConfig } from './types';
