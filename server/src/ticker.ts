/** Runs a callback on a fixed interval. Swappable so tests can drive ticks by hand. */
export interface TickScheduler {
  start(callback: () => void, intervalMs: number): void;
  stop(): void;
  readonly running: boolean;
}

export class IntervalTickScheduler implements TickScheduler {
  private handle: NodeJS.Timeout | null = null;

  get running() { return this.handle !== null; }

  start(callback: () => void, intervalMs: number) {
    this.stop();
    this.handle = setInterval(callback, intervalMs);
    this.handle.unref();
  }

  stop() {
    if (this.handle) clearInterval(this.handle);
    this.handle = null;
  }
}

export class ManualTickScheduler implements TickScheduler {
  private callback: (() => void) | null = null;

  get running() { return this.callback !== null; }

  start(callback: () => void) { this.callback = callback; }
  stop() { this.callback = null; }

  fire() { this.callback?.(); }
}
