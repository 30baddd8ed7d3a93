import type { TimerScheduler } from '../timers/scheduler.js';
import { systemClock } from '../timers/types.js';
import type { Clock } from '../timers/types.js';
import { parseRemindCommand } from './remind-command.js';
import type { ReminderBook } from './reminders.js';
import { formatLocalMinute, parseTimersCommand, renderTimersReport } from './timers-command.js';

export type CommandMessage = {
  userId: string;
  channelId: string;
  content: string;
};

export type CommandDeps = {
  scheduler: TimerScheduler;
  /** Absent when reminders are disabled. */
  reminders?: ReminderBook;
  timersCommandEnabled: boolean;
  botDisplayName?: string;
  clock?: Clock;
};

/** Returns the reply text, or null when the message is not a command this bot handles. */
export async function handleCommand(msg: CommandMessage, deps: CommandDeps): Promise<string | null> {
  if (deps.timersCommandEnabled) {
    const mode = parseTimersCommand(msg.content);
    if (mode) {
      return renderTimersReport({ jobs: deps.scheduler.listJobs(), mode, botDisplayName: deps.botDisplayName });
    }
  }

  const reminders = deps.reminders;
  if (!reminders) return null;
  const cmd = parseRemindCommand(msg.content, (deps.clock ?? systemClock).now());
  if (!cmd) return null;

  switch (cmd.kind) {
    case 'invalid':
      return cmd.reason;
    case 'list': {
      const items = reminders.list(msg.userId);
      if (items.length === 0) return 'You have no pending reminders.';
      return items.map((r) => `#${r.id} ${formatLocalMinute(r.at)}: ${r.text}`).join('\n');
    }
    case 'cancel':
      return reminders.cancel(msg.userId, cmd.id)
        ? `Reminder #${cmd.id} cancelled.`
        : `You have no pending reminder #${cmd.id}.`;
    case 'set': {
      const result = await reminders.add(msg.userId, msg.channelId, cmd.at, cmd.text);
      if (result.kind === 'limit') return `You already have ${result.max} pending reminders. Cancel one first.`;
      if (result.kind === 'delivered') {
        return result.reason === 'past'
          ? 'That time has already passed, so the reminder went out now.'
          : 'That time is due now, so the reminder went out now.';
      }
      if (result.kind === 'too-far') return `${formatLocalMinute(result.at)} is too far ahead to schedule a reminder.`;
      return `Reminder #${result.id} set for ${formatLocalMinute(result.at)}.`;
    }
  }
}
