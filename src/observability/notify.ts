// src/observability/notify.ts

import type { ConfigObserver, ConfigView } from './types';
import { DiagnosticSinkUnavailableError } from '../config/errors';
import { toErrorMessage } from '../utils/error';

/**
 * Notify all config observers that a view was built.
 * Diagnostics are best-effort: an observer that throws is reported and
 * skipped, and the build that triggered it still succeeds.
 */
export function notifyConfigBuilt(
  observers: readonly ConfigObserver[],
  view: ConfigView,
): void {
  for (const observer of observers) {
    try {
      observer.onConfigBuilt(view);
    } catch (err) {
      const failure = new DiagnosticSinkUnavailableError(err);
      // eslint-disable-next-line no-console
      console.warn(toErrorMessage(failure));
    }
  }
}
