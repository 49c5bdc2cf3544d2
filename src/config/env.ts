// src/config/env.ts

/**
 * Read-only view over environment variables.
 * `undefined` means the variable is not set; an empty string is a value.
 */
export interface EnvironmentSource {
  lookup(key: string): string | undefined;
}

/**
 * Source backed by a live env object (defaults to process.env).
 * Nothing is cached, so a rebuild after reload sees variables set later.
 */
export function createProcessEnvSource(
  env: NodeJS.ProcessEnv = process.env,
): EnvironmentSource {
  return {
    lookup(key) {
      return Object.prototype.hasOwnProperty.call(env, key) ? env[key] : undefined;
    },
  };
}

/**
 * Source over a fixed set of variables. Handy for tests and for embedding
 * the config layer in a process whose environment should not leak in.
 */
export function createStaticEnvSource(
  vars: Record<string, string | undefined>,
): EnvironmentSource {
  const snapshot = new Map<string, string>();
  for (const [key, value] of Object.entries(vars)) {
    if (value !== undefined) snapshot.set(key, value);
  }
  return {
    lookup(key) {
      return snapshot.get(key);
    },
  };
}
