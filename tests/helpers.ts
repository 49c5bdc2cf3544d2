import type { ConfigObserver, ConfigView } from '../src/observability/types';

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}

export class RecordingObserver implements ConfigObserver {
  readonly views: ConfigView[] = [];

  onConfigBuilt(view: ConfigView): void {
    this.views.push(view);
  }

  kinds(): ConfigView['kind'][] {
    return this.views.map((view) => view.kind);
  }
}
