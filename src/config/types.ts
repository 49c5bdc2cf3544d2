// src/config/types.ts

export const LLM_PROVIDERS = ['moonshot', 'openai'] as const;

/**
 * Vendor whose variables (`MOONSHOT_*` / `OPENAI_*`) are consulted first.
 */
export type LLMProvider = (typeof LLM_PROVIDERS)[number];

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Everything a model client needs. Frozen once built; a reload produces
 * a new instance rather than touching this one.
 */
export interface LLMConfig {
  readonly provider: LLMProvider;
  /**
   * Never printed. Use `apiKeySource` when you need to say where it came from.
   */
  readonly apiKey: string;
  /**
   * Name of the environment variable the key was read from.
   */
  readonly apiKeySource: string;
  readonly modelName: string;
  readonly baseURL: string;
  /**
   * Sampling temperature in [0, 2].
   */
  readonly temperature: number;
  readonly maxTokens: number;
  /**
   * Per-request timeout in seconds.
   */
  readonly timeoutSeconds: number;
}

/**
 * Project-level runtime settings consumed by the agent loop and its tooling.
 */
export interface ProjectConfig {
  readonly projectName: string;
  readonly version: string;
  /**
   * Upper bound on plan/execute/observe iterations per task.
   */
  readonly maxIterations: number;
  readonly debugMode: boolean;
  readonly logLevel: LogLevel;
  readonly dataDir: string;
  readonly cacheDir: string;
  readonly logsDir: string;
  /**
   * Root under which per-task working directories are created.
   */
  readonly agentWorkRoot: string;
  /**
   * Prompt used when the agent is started without a task description.
   */
  readonly defaultUserMessage: string;
  /**
   * How many consecutive "done" observations end a task.
   */
  readonly completionThreshold: number;
}
