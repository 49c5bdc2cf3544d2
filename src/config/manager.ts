// src/config/manager.ts

import type { EnvironmentSource } from './env';
import { createProcessEnvSource } from './env';
import { buildLLMConfig } from './llm';
import { buildProjectConfig, PROJECT_FIELDS } from './project';
import { resolveField } from './schema';
import type { LLMConfig, ProjectConfig } from './types';
import type { ConfigObserver } from '../observability/types';
import { notifyConfigBuilt } from '../observability/notify';
import { ConsoleConfigObserver } from '../observability/consoleObserver';

export interface ConfigManagerOptions {
  /**
   * Where variables are read from. Defaults to the live process environment.
   */
  env?: EnvironmentSource;
  /**
   * Receive a dump of each view as it is built while debug mode is on.
   * Defaults to a stderr dump; pass `[]` to turn it off.
   */
  observers?: ConfigObserver[];
}

interface ConfigSnapshot {
  readonly llm?: LLMConfig;
  readonly project?: ProjectConfig;
}

const EMPTY_SNAPSHOT: ConfigSnapshot = Object.freeze({});

/**
 * Process-scoped owner of the resolved configuration. Construct one at
 * startup and pass it to whatever needs settings.
 *
 * Views are built lazily and cached. The cache is an immutable snapshot that
 * is swapped, never edited, so a reader holds either the old views or the new
 * ones. Building is synchronous, so check-build-store cannot interleave with
 * another caller.
 */
export class ConfigManager {
  private readonly env: EnvironmentSource;
  private readonly observers: ConfigObserver[];
  private snapshot: ConfigSnapshot = EMPTY_SNAPSHOT;

  constructor(options: ConfigManagerOptions = {}) {
    this.env = options.env ?? createProcessEnvSource();
    this.observers = [...(options.observers ?? [new ConsoleConfigObserver()])];
  }

  getLLMConfig(): LLMConfig {
    const cached = this.snapshot.llm;
    if (cached) return cached;

    const llm = buildLLMConfig(this.env);
    const debug = this.resolveDebugMode();
    this.snapshot = { ...this.snapshot, llm };

    if (debug) {
      notifyConfigBuilt(this.observers, { kind: 'llm', config: llm });
    }
    return llm;
  }

  getProjectConfig(): ProjectConfig {
    const cached = this.snapshot.project;
    if (cached) return cached;

    const project = buildProjectConfig(this.env);
    this.snapshot = { ...this.snapshot, project };

    if (project.debugMode) {
      notifyConfigBuilt(this.observers, { kind: 'project', config: project });
    }
    return project;
  }

  /**
   * Debug flag without building the project view, so a bad project variable
   * only fails `getProjectConfig()`. An invalid `DEBUG_MODE` still throws.
   */
  private resolveDebugMode(): boolean {
    const cached = this.snapshot.project;
    if (cached) return cached.debugMode;
    return resolveField(this.env, 'debugMode', PROJECT_FIELDS.debugMode);
  }

  /**
   * Drop both cached views; the next access rebuilds from the environment.
   * Safe to call before anything was built.
   */
  reloadConfig(): void {
    this.snapshot = EMPTY_SNAPSHOT;
  }

  /**
   * Build both views now so configuration errors surface at startup
   * instead of on first use.
   */
  prewarm(): void {
    this.getProjectConfig();
    this.getLLMConfig();
  }

  isDebugMode(): boolean {
    return this.getProjectConfig().debugMode;
  }
}
