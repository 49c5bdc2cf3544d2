// src/observability/consoleObserver.ts

import type { ConfigObserver, ConfigView } from './types';
import { describeLLMConfig, describeProjectConfig } from '../config/describe';

export interface TextSink {
  write(chunk: string): unknown;
}

const TITLES: Record<ConfigView['kind'], string> = {
  llm: 'LLM configuration',
  project: 'Project configuration',
};

/**
 * Observer that dumps each freshly built view to stderr (or the given sink)
 * so stdout stays free for the agent's own output.
 */
export class ConsoleConfigObserver implements ConfigObserver {
  constructor(private readonly sink: TextSink = process.stderr) {}

  onConfigBuilt(view: ConfigView): void {
    const lines =
      view.kind === 'llm'
        ? describeLLMConfig(view.config)
        : describeProjectConfig(view.config);

    const block = [`=== ${TITLES[view.kind]} (debug) ===`, ...lines].join('\n');
    this.sink.write(`${block}\n`);
  }
}
