/**
 * Progress Reporter
 *
 * A handle bound to one logical operation. Without a UI backend every call is
 * a no-op. Once finished, a handle ignores further reports and finishes.
 */

export interface ProgressHandle {
  report(message: string, percentage: number): void;
  finish(): void;
  readonly finished: boolean;
}

/**
 * Renders progress somewhere (a terminal spinner, an editor widget)
 */
export interface ProgressBackend {
  start(title: string): ProgressSink;
}

export interface ProgressSink {
  update(message: string, percentage: number): void;
  stop(): void;
}

class BoundProgressHandle implements ProgressHandle {
  private done = false;

  constructor(private readonly sink: ProgressSink | null) {}

  get finished(): boolean {
    return this.done;
  }

  report(message: string, percentage: number): void {
    if (this.done) return;
    this.sink?.update(message, clampPercentage(percentage));
  }

  finish(): void {
    if (this.done) return;
    this.done = true;
    this.sink?.stop();
  }
}

function clampPercentage(value: number): number {
  return Math.min(100, Math.max(0, Math.round(value)));
}

export function createProgressHandle(title: string, backend?: ProgressBackend): ProgressHandle {
  return new BoundProgressHandle(backend ? backend.start(title) : null);
}
