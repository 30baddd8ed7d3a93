import { nextOccurrence } from './calendar.js';
import { DoubleCancelError, UnrepresentableWaitError } from './errors.js';
import { Gate } from './gate.js';
import { copySpec, describeSpec } from './recurrence.js';
import { Timer } from './timer.js';
import type { Clock, JobState, LoggerLike, RecurrenceSpec, TimerErrorContext } from './types.js';

export type TimerCallback<T> = (job: Job<T>) => void | Promise<void>;

/** What a job needs from the scheduler that owns it. */
export type JobHost = {
  clock: Clock;
  log?: LoggerLike;
  safetyMarginMs: number;
  maxWaitMs: number;
  report(err: unknown, context: TimerErrorContext): void;
  detach(job: Job<unknown>): void;
};

export type JobInit<T> = {
  id: number;
  spec: RecurrenceSpec;
  callback: TimerCallback<T>;
  data: T | undefined;
  repeat: boolean;
  skipNow: boolean;
  firstOccurrence: Date | null;
};

/**
 * A scheduled unit of work. Each job runs its own loop:
 * wait for the next occurrence, run the callback, reschedule.
 */
export class Job<T = undefined> {
  readonly id: number;
  readonly repeat: boolean;
  /** Opaque owner payload; never read by the scheduler. */
  data: T | undefined;
  /** Resolves once the loop has exited (done or cancelled). */
  readonly completion: Promise<void>;

  private readonly normalized: RecurrenceSpec;
  private readonly invoke: () => void | Promise<void>;
  private readonly initialSkipNow: boolean;
  private readonly gate = new Gate();
  private timer: Timer | null = null;
  private cachedNext: Date | null;
  private current: JobState = 'waiting';
  private isCancelled = false;
  private finished = false;
  private scheduled = false;
  private lastRunAt: Date | null = null;
  private runs = 0;

  constructor(
    private readonly host: JobHost,
    init: JobInit<T>,
  ) {
    this.id = init.id;
    this.normalized = init.spec;
    this.repeat = init.repeat;
    this.data = init.data;
    this.initialSkipNow = init.skipNow;
    this.cachedNext = init.firstOccurrence;
    const callback = init.callback;
    this.invoke = () => callback(this);
    this.completion = this.run();
  }

  get spec(): RecurrenceSpec {
    return copySpec(this.normalized);
  }

  get cancelled(): boolean {
    return this.isCancelled;
  }

  get isScheduled(): boolean {
    return this.scheduled;
  }

  get state(): JobState {
    return this.current;
  }

  get lastRun(): Date | null {
    return this.lastRunAt ? new Date(this.lastRunAt.getTime()) : null;
  }

  get runCount(): number {
    return this.runs;
  }

  /**
   * Cancel the job. A pending wait is resolved right away and the callback
   * will not run again. Throws DoubleCancelError on a second call.
   */
  cancel(): void {
    if (this.isCancelled) throw new DoubleCancelError(this.id);
    this.isCancelled = true;
    this.host.log?.info({ jobId: this.id }, 'timer:cancelled');
    if (this.current === 'waiting') this.current = 'cancelled';
    this.interrupt();
  }

  /**
   * Next execution time, or null when there is none. The cached value is
   * recomputed once it is closer than the safety margin to now.
   */
  nextExecution(skipNow = true): Date | null {
    const now = this.host.clock.now().getTime();
    const margin = this.host.safetyMarginMs;
    if (this.cachedNext === null || this.cachedNext.getTime() - now < margin) {
      this.cachedNext = nextOccurrence(this.normalized, new Date(now + margin), skipNow);
    }
    return this.cachedNext ? new Date(this.cachedNext.getTime()) : null;
  }

  /**
   * Run the callback ahead of schedule. A non-repeating job is finished by
   * this and will not fire again. No-op while the callback is already running
   * or once the job has finished.
   */
  async executeNow(): Promise<void> {
    if (this.isCancelled || this.current === 'done' || this.current === 'executing' || this.finished) {
      this.host.log?.warn({ jobId: this.id, state: this.current }, 'timer:executeNow on inactive job');
      return;
    }
    this.host.log?.info({ jobId: this.id }, 'timer:executing ahead of schedule');
    if (!this.repeat) {
      this.finished = true;
      this.interrupt();
    }
    await this.runCallback();
  }

  toString(): string {
    return `Job#${this.id}(${describeSpec(this.normalized)}; state=${this.current}; repeat=${this.repeat})`;
  }

  // Wakes the loop if it is parked on the gate waiting for its timer.
  private interrupt(): void {
    const timer = this.timer;
    if (timer && !timer.hasRun && !timer.cancelled) {
      timer.cancel();
      this.gate.release();
    }
  }

  private errorContext(phase: TimerErrorContext['phase']): TimerErrorContext {
    return { jobId: this.id, spec: describeSpec(this.normalized), phase };
  }

  private async runCallback(): Promise<void> {
    this.lastRunAt = this.host.clock.now();
    this.runs++;
    try {
      await this.invoke();
    } catch (err) {
      this.host.log?.error({ err, jobId: this.id }, 'timer:callback failed');
      this.host.report(err, this.errorContext('callback'));
    }
  }

  private async run(): Promise<void> {
    await this.gate.acquire();
    let skipNow = this.initialSkipNow;
    try {
      for (;;) {
        if (this.isCancelled) {
          this.current = 'cancelled';
          break;
        }
        if (this.finished) {
          this.current = 'done';
          break;
        }

        const target = this.nextExecution(skipNow);
        skipNow = true;
        if (target === null) {
          this.host.log?.info({ jobId: this.id }, 'timer:no further occurrence');
          this.current = 'done';
          break;
        }

        const waitMs = target.getTime() - this.host.clock.now().getTime();
        if (!Number.isFinite(waitMs) || waitMs > this.host.maxWaitMs) {
          const err = new UnrepresentableWaitError(waitMs, target);
          this.host.log?.error({ err, jobId: this.id }, 'timer:wait not representable');
          this.host.report(err, this.errorContext('wait'));
          this.current = 'done';
          break;
        }

        this.current = 'waiting';
        this.scheduled = true;
        this.host.log?.debug?.({ jobId: this.id, target: target.toISOString(), waitMs }, 'timer:sleeping');
        this.timer = new Timer(waitMs, () => this.gate.release(), {
          onError: (err) => this.host.log?.error({ err, jobId: this.id }, 'timer:wakeup failed'),
        });
        await this.gate.acquire();
        this.timer = null;
        this.scheduled = false;

        if (this.isCancelled) {
          this.current = 'cancelled';
          break;
        }
        if (this.finished) {
          this.current = 'done';
          break;
        }

        this.current = 'executing';
        this.host.log?.debug?.({ jobId: this.id }, 'timer:executing');
        await this.runCallback();
        if (!this.repeat) this.finished = true;
      }
    } finally {
      this.scheduled = false;
      this.host.detach(this);
    }
  }
}
