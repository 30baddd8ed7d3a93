import type { Job } from '../timers/job.js';
import { specFromDate } from '../timers/recurrence.js';
import type { TimerScheduler } from '../timers/scheduler.js';
import type { LoggerLike } from '../timers/types.js';

export class Reminder {
  constructor(
    readonly userId: string,
    readonly channelId: string,
    readonly text: string,
    readonly at: Date,
  ) {}
}

/** `late` is set when the reminder is posted at once because its time has passed. */
export type DeliverReminder = (reminder: Reminder, opts: { late: boolean }) => Promise<void>;

export type AddReminderResult =
  | { kind: 'scheduled'; id: number; at: Date }
  | { kind: 'delivered'; reason: 'past' | 'due' }
  | { kind: 'too-far'; at: Date }
  | { kind: 'limit'; max: number };

export type ReminderListing = { id: number; at: Date; text: string };

export type ReminderBookOpts = {
  scheduler: TimerScheduler;
  deliver: DeliverReminder;
  maxPerUser: number;
  log?: LoggerLike;
};

type Entry = { job: Job<unknown>; reminder: Reminder };

/**
 * One-shot reminders kept as jobs on the shared scheduler. The scheduler's
 * collection is the only record; finished jobs drop out of it on their own.
 */
export class ReminderBook {
  constructor(private readonly opts: ReminderBookOpts) {}

  async add(userId: string, channelId: string, at: Date, text: string): Promise<AddReminderResult> {
    const { scheduler, deliver, maxPerUser, log } = this.opts;
    if (this.entries(userId).length >= maxPerUser) {
      log?.info({ userId, max: maxPerUser }, 'reminder:limit reached');
      return { kind: 'limit', max: maxPerUser };
    }

    const reminder = new Reminder(userId, channelId, text, at);
    const result = scheduler.trySchedule<Reminder>(
      specFromDate(at),
      async (job) => {
        if (job.data) await deliver(job.data, { late: false });
      },
      { data: reminder, repeat: false },
    );

    if (result.kind === 'run-immediately') {
      log?.info({ userId, at: at.toISOString() }, 'reminder:past, delivering now');
      await deliver(reminder, { late: true });
      return { kind: 'delivered', reason: 'past' };
    }

    // Inside the scheduler's safety margin the job would end without firing.
    const next = result.job.nextExecution(false);
    if (next === null) {
      result.job.cancel();
      log?.info({ userId, at: at.toISOString() }, 'reminder:too close, delivering now');
      await deliver(reminder, { late: false });
      return { kind: 'delivered', reason: 'due' };
    }

    // The job loop would give up on this wait; stop it before it starts.
    if (scheduler.exceedsMaxWait(next)) {
      result.job.cancel();
      log?.info({ userId, at: next.toISOString() }, 'reminder:too far ahead');
      return { kind: 'too-far', at: next };
    }

    log?.info({ userId, jobId: result.job.id, at: next.toISOString() }, 'reminder:scheduled');
    return { kind: 'scheduled', id: result.job.id, at: next };
  }

  list(userId: string): ReminderListing[] {
    return this.entries(userId)
      .map(({ job, reminder }) => ({ id: job.id, at: reminder.at, text: reminder.text }))
      .sort((a, b) => a.at.getTime() - b.at.getTime() || a.id - b.id);
  }

  /** Cancels one of the user's own reminders. False when there is no such reminder. */
  cancel(userId: string, id: number): boolean {
    const entry = this.entries(userId).find((e) => e.job.id === id);
    if (!entry) return false;
    entry.job.cancel();
    this.opts.log?.info({ userId, jobId: id }, 'reminder:cancelled');
    return true;
  }

  private entries(userId: string): Entry[] {
    const out: Entry[] = [];
    for (const job of this.opts.scheduler.search((j) => !j.cancelled && j.state !== 'done')) {
      const data = job.data;
      if (data instanceof Reminder && data.userId === userId) out.push({ job, reminder: data });
    }
    return out;
  }
}

export function formatReminder(reminder: Reminder, opts: { late: boolean }): string {
  const prefix = opts.late ? 'Reminder (late)' : 'Reminder';
  return `<@${reminder.userId}> ${prefix}: ${reminder.text}`;
}
