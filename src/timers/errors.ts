/** Malformed recurrence field (wrong type, out of range, empty list). */
export class RecurrenceSpecError extends Error {
  constructor(
    readonly field: string,
    message: string,
  ) {
    super(`${field}: ${message}`);
    this.name = 'RecurrenceSpecError';
  }
}

/** Thrown by `TimerScheduler.schedule()` when a spec can never fire again. */
export class NoFutureOccurrenceError extends Error {
  constructor(readonly specText: string) {
    super(`No future occurrence for ${specText}`);
    this.name = 'NoFutureOccurrenceError';
  }
}

export class DoubleCancelError extends Error {
  constructor(readonly jobId: number) {
    super(`Timer job #${jobId} was already cancelled`);
    this.name = 'DoubleCancelError';
  }
}

/** `Timer.cancel()` / `Timer.skip()` came after the callback already ran. */
export class HasAlreadyRunError extends Error {
  constructor() {
    super('Timer callback has already run');
    this.name = 'HasAlreadyRunError';
  }
}

export class UnrepresentableWaitError extends Error {
  constructor(
    readonly waitMs: number,
    readonly target: Date,
  ) {
    super(`Unable to sleep until ${target.toISOString()} (${waitMs}ms)`);
    this.name = 'UnrepresentableWaitError';
  }
}
