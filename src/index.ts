import pino from 'pino';
import { parseConfig } from './config.js';
import { createDiscordClient, startDiscordBot } from './discord.js';
import { formatReminder, ReminderBook } from './discord/reminders.js';
import { statusErrorReporter } from './discord/status-channel.js';
import type { StatusRef } from './discord/status-channel.js';
import { TimerScheduler } from './timers/scheduler.js';

const log = pino({ level: process.env.LOG_LEVEL ?? 'info' });

let parsedConfig;
try {
  parsedConfig = parseConfig(process.env);
} catch (err) {
  log.error({ err }, 'Invalid configuration');
  process.exit(1);
}
for (const warning of parsedConfig.warnings) {
  log.warn(warning);
}
for (const info of parsedConfig.infos) {
  log.info(info);
}
const cfg = parsedConfig.config;

// Filled in once the client is ready; timer errors before that are only logged.
const statusRef: StatusRef = { current: null };

const scheduler = new TimerScheduler({
  log,
  reportError: statusErrorReporter(statusRef, log),
  safetyMarginMs: cfg.timerSafetyMarginMs,
  maxWaitMs: cfg.timerMaxWaitMs,
});

const client = createDiscordClient();

const reminders = cfg.remindersEnabled
  ? new ReminderBook({
    scheduler,
    maxPerUser: cfg.maxRemindersPerUser,
    log,
    deliver: async (reminder, opts) => {
      const channel = await client.channels.fetch(reminder.channelId);
      if (!channel?.isSendable()) {
        throw new Error(`Reminder channel ${reminder.channelId} is not available`);
      }
      await channel.send(formatReminder(reminder, opts));
    },
  })
  : undefined;

let shuttingDown = false;
const shutdown = async () => {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info({ timers: scheduler.size }, 'shutdown: stopping timers');
  scheduler.stopAll();
  await statusRef.current?.offline();
  await client.destroy();
  process.exit(0);
};
process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

try {
  await startDiscordBot(client, {
    token: cfg.token,
    allowUserIds: cfg.allowUserIds,
    statusChannel: cfg.statusChannel,
    botDisplayName: cfg.botDisplayName,
    log,
    commands: {
      scheduler,
      reminders,
      timersCommandEnabled: cfg.timersCommandEnabled,
      botDisplayName: cfg.botDisplayName,
    },
  }, statusRef);
} catch (err) {
  log.error({ err }, 'discord:login failed');
  scheduler.stopAll();
  process.exit(1);
}

log.info(
  { timersCommand: cfg.timersCommandEnabled, reminders: cfg.remindersEnabled, statusChannel: Boolean(statusRef.current) },
  'bot:started',
);
