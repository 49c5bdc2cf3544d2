// src/config/errors.ts

export type ConfigErrorCode =
  | 'MISSING_CREDENTIAL'
  | 'INVALID_CONFIG_VALUE'
  | 'DIAGNOSTIC_SINK_UNAVAILABLE';

/**
 * Base class for everything the config layer throws.
 * `code` is stable and safe to branch on; `message` is for operators.
 */
export abstract class ConfigError extends Error {
  abstract readonly code: ConfigErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A required credential resolved to nothing (unset or blank).
 * The value itself is never carried.
 */
export class MissingCredentialError extends ConfigError {
  readonly code = 'MISSING_CREDENTIAL';
  readonly field: string;
  readonly variables: readonly string[];

  constructor(field: string, variables: readonly string[]) {
    super(
      `Missing credential for ${field}: set one of ${variables.join(', ')}`,
    );
    this.field = field;
    this.variables = variables;
  }
}

/**
 * A variable was present but failed parsing, range or enum checks.
 */
export class InvalidConfigValueError extends ConfigError {
  readonly code = 'INVALID_CONFIG_VALUE';
  readonly field: string;
  readonly variable: string;
  readonly value: string;
  readonly reason: string;

  constructor(params: {
    field: string;
    variable: string;
    value: string;
    reason: string;
  }) {
    super(
      `Invalid value for ${params.field} (${params.variable}="${params.value}"): ${params.reason}`,
    );
    this.field = params.field;
    this.variable = params.variable;
    this.value = params.value;
    this.reason = params.reason;
  }
}

/**
 * A config observer threw while receiving a diagnostic dump.
 * Reported, never propagated to callers of the manager.
 */
export class DiagnosticSinkUnavailableError extends ConfigError {
  readonly code = 'DIAGNOSTIC_SINK_UNAVAILABLE';

  constructor(cause: unknown) {
    super('Config diagnostic sink is unavailable', { cause });
  }
}
