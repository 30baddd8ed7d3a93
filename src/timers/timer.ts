import { HasAlreadyRunError } from './errors.js';

// setTimeout clamps anything above a signed 32-bit millisecond count to 1ms.
export const MAX_TIMEOUT_MS = 2 ** 31 - 1;

export type TimerOpts = {
  onError: (err: unknown) => void;
};

/**
 * One-shot timer that runs `callback` after `delayMs`. Can be cancelled, or
 * skipped (run immediately) as long as the callback has not run yet. Delays
 * beyond MAX_TIMEOUT_MS are chained over several timeouts.
 */
export class Timer {
  private handle: ReturnType<typeof setTimeout> | null = null;
  private remainingMs: number;
  private ran = false;
  private stopped = false;

  constructor(
    delayMs: number,
    private readonly callback: () => void | Promise<void>,
    private readonly opts: TimerOpts,
  ) {
    this.remainingMs = Math.max(0, delayMs);
    this.arm();
  }

  get hasRun(): boolean {
    return this.ran;
  }

  get cancelled(): boolean {
    return this.stopped;
  }

  cancel(): void {
    if (this.ran) throw new HasAlreadyRunError();
    this.clear();
    this.stopped = true;
  }

  /** Stop waiting and run the callback now. */
  skip(): Promise<void> {
    if (this.ran) throw new HasAlreadyRunError();
    this.clear();
    return this.fire();
  }

  private arm(): void {
    const chunk = Math.min(this.remainingMs, MAX_TIMEOUT_MS);
    this.remainingMs -= chunk;
    this.handle = setTimeout(() => {
      this.handle = null;
      if (this.remainingMs > 0) {
        this.arm();
        return;
      }
      void this.fire();
    }, chunk);
  }

  private clear(): void {
    if (this.handle !== null) {
      clearTimeout(this.handle);
      this.handle = null;
    }
  }

  private async fire(): Promise<void> {
    this.ran = true;
    try {
      await this.callback();
    } catch (err) {
      this.opts.onError(err);
    }
  }
}
