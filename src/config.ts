import { parseAllowUserIds } from './discord/allowlist.js';

type ParseResult = {
  config: BotConfig;
  warnings: string[];
  infos: string[];
};

export type BotConfig = {
  token: string;
  allowUserIds: Set<string>;

  statusChannel?: string;
  botDisplayName?: string;

  timersCommandEnabled: boolean;
  remindersEnabled: boolean;
  maxRemindersPerUser: number;

  timerSafetyMarginMs: number;
  timerMaxWaitMs: number;
};

const DAY_MS = 24 * 60 * 60_000;

function parseBoolean(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: boolean,
): boolean {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true') return true;
  if (normalized === '0' || normalized === 'false') return false;
  throw new Error(`${name} must be "0"/"1" or "true"/"false", got "${raw}"`);
}

function parseNonNegativeNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: number,
): number {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 0) {
    throw new Error(`${name} must be a non-negative number, got "${raw}"`);
  }
  return n;
}

function parsePositiveNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: number,
): number {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`${name} must be a positive number, got "${raw}"`);
  }
  return n;
}

function parseNonNegativeInt(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: number,
): number {
  const n = parseNonNegativeNumber(env, name, defaultValue);
  if (!Number.isInteger(n)) {
    throw new Error(`${name} must be an integer, got "${n}"`);
  }
  return n;
}

function parsePositiveInt(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: number,
): number {
  const n = parsePositiveNumber(env, name, defaultValue);
  if (!Number.isInteger(n)) {
    throw new Error(`${name} must be an integer, got "${n}"`);
  }
  return n;
}

function parseTrimmedString(
  env: NodeJS.ProcessEnv,
  name: string,
): string | undefined {
  const raw = env[name];
  if (raw == null) return undefined;
  const trimmed = raw.trim();
  return trimmed || undefined;
}

export function parseConfig(env: NodeJS.ProcessEnv): ParseResult {
  const warnings: string[] = [];
  const infos: string[] = [];

  const token = parseTrimmedString(env, 'DISCORD_TOKEN');
  if (!token) {
    throw new Error('Missing DISCORD_TOKEN');
  }

  const allowUserIdsRaw = env.DISCORD_ALLOW_USER_IDS;
  const allowUserIds = parseAllowUserIds(allowUserIdsRaw);
  if ((allowUserIdsRaw ?? '').trim().length > 0 && allowUserIds.size === 0) {
    warnings.push('DISCORD_ALLOW_USER_IDS was set but no valid IDs were parsed: bot will respond to nobody (fail closed)');
  } else if (allowUserIds.size === 0) {
    warnings.push('DISCORD_ALLOW_USER_IDS is empty: bot will respond to nobody (fail closed)');
  }

  const timersCommandEnabled = parseBoolean(env, 'BOT_TIMERS_ENABLED', true);
  const remindersEnabled = parseBoolean(env, 'BOT_REMINDERS_ENABLED', true);
  const maxRemindersPerUser = parsePositiveInt(env, 'BOT_MAX_REMINDERS_PER_USER', 10);
  const timerSafetyMarginMs = parseNonNegativeInt(env, 'BOT_TIMER_SAFETY_MARGIN_MS', 10_000);
  const timerMaxWaitDays = parsePositiveInt(env, 'BOT_TIMER_MAX_WAIT_DAYS', 36_500);

  if (timerSafetyMarginMs >= 60_000) {
    warnings.push(`BOT_TIMER_SAFETY_MARGIN_MS=${timerSafetyMarginMs} is a minute or more; every-minute timers will skip occurrences`);
  }
  if (!remindersEnabled && env.BOT_MAX_REMINDERS_PER_USER != null) {
    infos.push('BOT_REMINDERS_ENABLED=0; BOT_MAX_REMINDERS_PER_USER is ignored');
  }

  const statusChannel = parseTrimmedString(env, 'BOT_STATUS_CHANNEL');
  if (!statusChannel) {
    infos.push('BOT_STATUS_CHANNEL is unset; timer errors are only logged');
  }

  return {
    config: {
      token,
      allowUserIds,
      statusChannel,
      botDisplayName: parseTrimmedString(env, 'BOT_NAME'),
      timersCommandEnabled,
      remindersEnabled,
      maxRemindersPerUser,
      timerSafetyMarginMs,
      timerMaxWaitMs: timerMaxWaitDays * DAY_MS,
    },
    warnings,
    infos,
  };
}
