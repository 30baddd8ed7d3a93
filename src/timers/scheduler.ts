import { nextOccurrence } from './calendar.js';
import { NoFutureOccurrenceError } from './errors.js';
import { Job } from './job.js';
import type { JobHost, TimerCallback } from './job.js';
import { describeSpec, normalizeSpec } from './recurrence.js';
import { systemClock } from './types.js';
import type {
  Clock,
  ErrorReporter,
  JobState,
  LoggerLike,
  RecurrenceInput,
  RecurrenceSpec,
  TimerErrorContext,
} from './types.js';

export const DEFAULT_SAFETY_MARGIN_MS = 10_000;
// Anything further out than this is treated as a broken spec, not a real wait.
export const DEFAULT_MAX_WAIT_MS = 100 * 365 * 24 * 60 * 60_000;

export type TimerSchedulerOpts = {
  clock?: Clock;
  log?: LoggerLike;
  reportError?: ErrorReporter;
  safetyMarginMs?: number;
  maxWaitMs?: number;
};

export type ScheduleOpts<T> = {
  data?: T;
  repeat?: boolean;
  skipNow?: boolean;
};

export type ScheduleResult<T> =
  | { kind: 'scheduled'; job: Job<T> }
  | { kind: 'run-immediately'; spec: RecurrenceSpec };

export type TimerJobSummary = {
  id: number;
  spec: string;
  state: JobState;
  repeat: boolean;
  runCount: number;
  nextRun: Date | null;
};

export class TimerScheduler {
  private readonly jobs = new Map<number, Job<unknown>>();
  private readonly host: JobHost;
  private readonly log?: LoggerLike;
  private readonly clock: Clock;
  private nextId = 1;

  constructor(opts: TimerSchedulerOpts = {}) {
    this.log = opts.log;
    this.clock = opts.clock ?? systemClock;
    const reportError = opts.reportError;
    const log = opts.log;
    this.host = {
      clock: this.clock,
      log,
      safetyMarginMs: opts.safetyMarginMs ?? DEFAULT_SAFETY_MARGIN_MS,
      maxWaitMs: opts.maxWaitMs ?? DEFAULT_MAX_WAIT_MS,
      report(err: unknown, context: TimerErrorContext) {
        if (!reportError) return;
        // Fire-and-forget: a failing sink must not take the job loop down.
        Promise.resolve()
          .then(() => reportError(err, context))
          .catch((sinkErr: unknown) => {
            log?.warn({ err: sinkErr, jobId: context.jobId }, 'timer:error report failed');
          });
      },
      detach: (job) => {
        if (this.jobs.get(job.id) === job) {
          this.jobs.delete(job.id);
          this.log?.debug?.({ jobId: job.id, state: job.state }, 'timer:removed');
        }
      },
    };
  }

  get size(): number {
    return this.jobs.size;
  }

  /** True when waiting until `target` would be longer than the maximum wait. */
  exceedsMaxWait(target: Date): boolean {
    return target.getTime() - this.clock.now().getTime() > this.host.maxWaitMs;
  }

  /**
   * Schedule `callback` to run at every occurrence of `spec` (or only the
   * first, with `repeat: false`). Throws NoFutureOccurrenceError when the spec
   * can never fire again.
   */
  schedule<T = undefined>(spec: RecurrenceInput, callback: TimerCallback<T>, opts: ScheduleOpts<T> = {}): Job<T> {
    const result = this.trySchedule(spec, callback, opts);
    if (result.kind === 'run-immediately') {
      throw new NoFutureOccurrenceError(describeSpec(result.spec));
    }
    return result.job;
  }

  /**
   * Like schedule(), but reports "no future occurrence" as a result instead of
   * throwing, so callers can run the work right away.
   */
  trySchedule<T = undefined>(
    spec: RecurrenceInput,
    callback: TimerCallback<T>,
    opts: ScheduleOpts<T> = {},
  ): ScheduleResult<T> {
    const normalized = normalizeSpec(spec);
    const skipNow = opts.skipNow ?? false;
    const first = nextOccurrence(normalized, this.clock.now(), skipNow);
    if (first === null) {
      this.log?.info({ spec: describeSpec(normalized) }, 'timer:no future occurrence');
      return { kind: 'run-immediately', spec: normalized };
    }

    const id = this.nextId++;
    const job = new Job<T>(this.host, {
      id,
      spec: normalized,
      callback,
      data: opts.data,
      repeat: opts.repeat ?? true,
      skipNow,
      firstOccurrence: first,
    });
    this.jobs.set(id, job);
    this.log?.info(
      { jobId: id, spec: describeSpec(normalized), repeat: job.repeat, firstRun: first.toISOString() },
      'timer:scheduled',
    );
    return { kind: 'scheduled', job };
  }

  /**
   * Drop a job from the collection. Does not cancel it: the job keeps its
   * timer and keeps firing, but search(), listJobs() and stopAll() no longer
   * see it. Cancel it first to stop it.
   */
  remove(job: Job<unknown>): boolean {
    if (this.jobs.get(job.id) !== job) return false;
    this.jobs.delete(job.id);
    this.log?.debug?.({ jobId: job.id }, 'timer:removed');
    return true;
  }

  getJob(id: number): Job<unknown> | undefined {
    return this.jobs.get(id);
  }

  search(predicate: (job: Job<unknown>) => boolean): Job<unknown>[] {
    return Array.from(this.jobs.values()).filter(predicate);
  }

  listJobs(): TimerJobSummary[] {
    return Array.from(this.jobs.values()).map((job) => ({
      id: job.id,
      spec: describeSpec(job.spec),
      state: job.state,
      repeat: job.repeat,
      runCount: job.runCount,
      nextRun: job.state === 'waiting' ? job.nextExecution() : null,
    }));
  }

  stopAll(): void {
    const live = Array.from(this.jobs.values());
    this.jobs.clear();
    for (const job of live) {
      if (!job.cancelled) job.cancel();
    }
    this.log?.info({ count: live.length }, 'timer:stopAll');
  }
}
