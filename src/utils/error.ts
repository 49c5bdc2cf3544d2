// src/utils/error.ts

/**
 * Turn an unknown thrown value into a string message.
 * Use a default prefix when the value is not an Error (e.g. "Unknown config error").
 * When the error wraps a cause, its message is appended so wrapped failures stay readable.
 */
export function toErrorMessage(
  err: unknown,
  defaultPrefix = 'Unknown error',
): string {
  if (err instanceof Error) {
    if (err.cause !== undefined) {
      return `${err.message} (caused by: ${toErrorMessage(err.cause, defaultPrefix)})`;
    }
    return err.message;
  }
  return `${defaultPrefix}: ${String(err)}`;
}
