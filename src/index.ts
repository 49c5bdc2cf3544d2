// src/index.ts

import 'dotenv/config';

import {
  ConfigManager,
  createProcessEnvSource,
  describeLLMConfig,
  describeProjectConfig,
} from './config';
import { createOpenAIClient, toRequestDefaults } from './llm/client';
import { ConsoleConfigObserver } from './observability/consoleObserver';
import { toErrorMessage } from './utils/error';

function printSection(title: string, lines: string[]): void {
  // eslint-disable-next-line no-console
  console.log(`=== ${title} ===`);
  for (const line of lines) {
    // eslint-disable-next-line no-console
    console.log(line);
  }
  // eslint-disable-next-line no-console
  console.log('');
}

function main(): void {
  const config = new ConfigManager({
    env: createProcessEnvSource(),
    observers: [new ConsoleConfigObserver()],
  });
  config.prewarm();

  const project = config.getProjectConfig();
  const llm = config.getLLMConfig();

  printSection(`${project.projectName} v${project.version}`, describeProjectConfig(project));
  printSection('LLM', describeLLMConfig(llm));

  const client = createOpenAIClient(llm);
  const defaults = toRequestDefaults(llm);
  // eslint-disable-next-line no-console
  console.log(`Client ready: ${defaults.model} at ${client.baseURL} (timeout ${defaults.timeoutMs}ms)`);
}

try {
  main();
} catch (err) {
  // eslint-disable-next-line no-console
  console.error('Configuration error:', toErrorMessage(err, 'Unknown config error'));
  process.exitCode = 1;
}
