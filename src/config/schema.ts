// src/config/schema.ts

import { z } from 'zod';
import type { EnvironmentSource } from './env';
import { InvalidConfigValueError } from './errors';
import { LLM_PROVIDERS, LOG_LEVELS } from './types';

/**
 * Declarative description of one config field: where to look, how to
 * parse and validate the raw string, and what to use when nothing is set.
 */
export interface FieldSpec<T> {
  /** Consulted in order; the first variable that is set wins. */
  keys: readonly string[];
  schema: z.ZodType<T, z.ZodTypeDef, string>;
  default: T;
}

export interface EnvMatch {
  key: string;
  raw: string;
}

/**
 * First variable among `keys` that is set, empty strings included.
 */
export function lookupFirst(
  env: EnvironmentSource,
  keys: readonly string[],
): EnvMatch | undefined {
  for (const key of keys) {
    const raw = env.lookup(key);
    if (raw !== undefined) {
      return { key, raw };
    }
  }
  return undefined;
}

/**
 * Resolve a single field. A value that is set but fails the schema is an
 * error, never a silent fallback to the default.
 */
export function resolveField<T>(
  env: EnvironmentSource,
  field: string,
  definition: FieldSpec<T>,
): T {
  const match = lookupFirst(env, definition.keys);
  if (!match) {
    return definition.default;
  }

  const parsed = definition.schema.safeParse(match.raw);
  if (!parsed.success) {
    throw new InvalidConfigValueError({
      field,
      variable: match.key,
      value: match.raw,
      reason: parsed.error.issues[0]?.message ?? 'invalid value',
    });
  }
  return parsed.data;
}

// ── Parsers ─────────────────────────────────────────────────

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

const TRUTHY = new Set(['true', '1', 'yes']);
const FALSY = new Set(['false', '0', 'no']);

// `+ 0` turns -0 into 0.
function toDecimal(value: string): number {
  return Number(value) + 0;
}

export const nonEmptyText = z.string().trim().min(1, 'must not be empty');

export const urlText = z.string().trim().url('must be a valid URL');

export const positiveInteger = z
  .string()
  .trim()
  .regex(INTEGER_PATTERN, 'must be an integer')
  .transform((value) => Number(value))
  .pipe(
    z
      .number()
      .int()
      .positive('must be greater than 0')
      .safe('must be a safe integer'),
  );

export const positiveNumber = z
  .string()
  .trim()
  .regex(DECIMAL_PATTERN, 'must be a number')
  .transform(toDecimal)
  .pipe(z.number().positive('must be greater than 0'));

export const temperatureNumber = z
  .string()
  .trim()
  .regex(DECIMAL_PATTERN, 'must be a number')
  .transform(toDecimal)
  .pipe(
    z
      .number()
      .min(0, 'must be between 0 and 2')
      .max(2, 'must be between 0 and 2'),
  );

export const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .refine(
    (value) => TRUTHY.has(value) || FALSY.has(value),
    'must be one of true, 1, yes, false, 0, no',
  )
  .transform((value) => TRUTHY.has(value));

export const logLevel = z
  .string()
  .trim()
  .toUpperCase()
  .pipe(
    z.enum(LOG_LEVELS, {
      errorMap: () => ({ message: `must be one of ${LOG_LEVELS.join(', ')}` }),
    }),
  );

export const llmProvider = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(
    z.enum(LLM_PROVIDERS, {
      errorMap: () => ({ message: `must be one of ${LLM_PROVIDERS.join(', ')}` }),
    }),
  );
