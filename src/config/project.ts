// src/config/project.ts

import type { EnvironmentSource } from './env';
import {
  booleanFlag,
  logLevel,
  nonEmptyText,
  positiveInteger,
  resolveField,
} from './schema';
import type { FieldSpec } from './schema';
import type { LogLevel, ProjectConfig } from './types';

export const PROJECT_DEFAULTS: ProjectConfig = Object.freeze({
  projectName: 'Agent Template',
  version: '1.0.0',
  maxIterations: 10,
  debugMode: false,
  logLevel: 'INFO',
  dataDir: './data',
  cacheDir: './cache',
  logsDir: './logs',
  agentWorkRoot: './agent_work',
  defaultUserMessage: 'Please help me complete a task.',
  completionThreshold: 3,
});

function text(keys: string[], fallback: string): FieldSpec<string> {
  return { keys, schema: nonEmptyText, default: fallback };
}

function count(keys: string[], fallback: number): FieldSpec<number> {
  return { keys, schema: positiveInteger, default: fallback };
}

/**
 * Field table for the project view. `AGENT_WORK_DIR` is the older name
 * of `AGENT_WORK_ROOT` and is still honoured.
 */
export const PROJECT_FIELDS = {
  projectName: text(['PROJECT_NAME'], PROJECT_DEFAULTS.projectName),
  version: text(['PROJECT_VERSION'], PROJECT_DEFAULTS.version),
  maxIterations: count(['MAX_ITERATIONS'], PROJECT_DEFAULTS.maxIterations),
  debugMode: {
    keys: ['DEBUG_MODE'],
    schema: booleanFlag,
    default: PROJECT_DEFAULTS.debugMode,
  } satisfies FieldSpec<boolean>,
  logLevel: {
    keys: ['LOG_LEVEL'],
    schema: logLevel,
    default: PROJECT_DEFAULTS.logLevel,
  } satisfies FieldSpec<LogLevel>,
  dataDir: text(['DATA_DIR'], PROJECT_DEFAULTS.dataDir),
  cacheDir: text(['CACHE_DIR'], PROJECT_DEFAULTS.cacheDir),
  logsDir: text(['LOGS_DIR'], PROJECT_DEFAULTS.logsDir),
  agentWorkRoot: text(
    ['AGENT_WORK_ROOT', 'AGENT_WORK_DIR'],
    PROJECT_DEFAULTS.agentWorkRoot,
  ),
  defaultUserMessage: text(
    ['DEFAULT_USER_MESSAGE'],
    PROJECT_DEFAULTS.defaultUserMessage,
  ),
  completionThreshold: count(
    ['COMPLETION_THRESHOLD'],
    PROJECT_DEFAULTS.completionThreshold,
  ),
};

export function buildProjectConfig(env: EnvironmentSource): ProjectConfig {
  const f = PROJECT_FIELDS;
  return Object.freeze({
    projectName: resolveField(env, 'projectName', f.projectName),
    version: resolveField(env, 'version', f.version),
    maxIterations: resolveField(env, 'maxIterations', f.maxIterations),
    debugMode: resolveField(env, 'debugMode', f.debugMode),
    logLevel: resolveField(env, 'logLevel', f.logLevel),
    dataDir: resolveField(env, 'dataDir', f.dataDir),
    cacheDir: resolveField(env, 'cacheDir', f.cacheDir),
    logsDir: resolveField(env, 'logsDir', f.logsDir),
    agentWorkRoot: resolveField(env, 'agentWorkRoot', f.agentWorkRoot),
    defaultUserMessage: resolveField(
      env,
      'defaultUserMessage',
      f.defaultUserMessage,
    ),
    completionThreshold: resolveField(
      env,
      'completionThreshold',
      f.completionThreshold,
    ),
  });
}
