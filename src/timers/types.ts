export const SPEC_FIELDS = ['year', 'month', 'monthday', 'weekday', 'hour', 'minute'] as const;

export type SpecField = (typeof SPEC_FIELDS)[number];

// null = wildcard; otherwise sorted, deduplicated, non-empty.
export type RecurrenceSpec = Readonly<Record<SpecField, readonly number[] | null>>;

export type RecurrenceFieldInput = number | Iterable<number> | null | undefined;

export type RecurrenceInput = Partial<Record<SpecField, RecurrenceFieldInput>>;

export type JobState = 'waiting' | 'executing' | 'cancelled' | 'done';

export type Clock = {
  now(): Date;
};

export const systemClock: Clock = {
  now: () => new Date(),
};

export type TimerErrorContext = {
  jobId: number;
  spec: string;
  phase: 'callback' | 'wait';
};

/** Error sink; fire-and-forget from the scheduler's side. */
export type ErrorReporter = (err: unknown, context: TimerErrorContext) => void | Promise<void>;

export type LoggerLike = {
  debug?(obj: unknown, msg?: string): void;
  info(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  error(obj: unknown, msg?: string): void;
};
