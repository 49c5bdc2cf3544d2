// src/observability/types.ts

import type { LLMConfig, ProjectConfig } from '../config/types';

export type ConfigView =
  | { kind: 'llm'; config: LLMConfig }
  | { kind: 'project'; config: ProjectConfig };

export interface ConfigObserver {
  /**
   * Called after a view is built while debug mode is on.
   * Must not mutate or retain secrets from `view`.
   */
  onConfigBuilt(view: ConfigView): void;
}
