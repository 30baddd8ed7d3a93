export type RemindCommand =
  | { kind: 'set'; at: Date; text: string }
  | { kind: 'list' }
  | { kind: 'cancel'; id: number }
  | { kind: 'invalid'; reason: string };

export const REMIND_USAGE =
  'Usage: `!remind <HH:MM | YYYY-MM-DD HH:MM | in <n><m|h|d>> <text>`, `!remind list`, `!remind cancel <id>`';

const UNIT_MS = { m: 60_000, h: 3_600_000, d: 86_400_000 } as const;

const TIME_RE = /^(\d{1,2}):(\d{2})$/;
const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const RELATIVE_RE = /^(\d{1,4})([mhd])$/;

function floorToMinute(ms: number): Date {
  const d = new Date(ms);
  d.setSeconds(0, 0);
  return d;
}

function parseTime(token: string): { hour: number; minute: number } | null {
  const m = TIME_RE.exec(token);
  if (!m) return null;
  const hour = Number(m[1]);
  const minute = Number(m[2]);
  if (hour > 23 || minute > 59) return null;
  return { hour, minute };
}

function isUnit(s: string): s is keyof typeof UNIT_MS {
  return s === 'm' || s === 'h' || s === 'd';
}

function withText(at: Date, rest: string[]): RemindCommand {
  const text = rest.join(' ').trim();
  if (!text) return { kind: 'invalid', reason: 'missing reminder text' };
  return { kind: 'set', at, text };
}

/**
 * Parses `!remind ...`. Times are local wall-clock minutes; a bare `HH:MM`
 * that has already passed today means tomorrow.
 */
export function parseRemindCommand(content: string, now: Date): RemindCommand | null {
  const tokens = String(content ?? '').trim().split(/\s+/);
  if (tokens[0]?.toLowerCase() !== '!remind') return null;
  const args = tokens.slice(1).filter(Boolean);
  if (args.length === 0) return { kind: 'invalid', reason: REMIND_USAGE };

  const head = args[0].toLowerCase();
  if (head === 'list' && args.length === 1) return { kind: 'list' };

  if (head === 'cancel' && args.length <= 2) {
    const id = Number((args[1] ?? '').replace(/^#/, ''));
    if (!Number.isInteger(id) || id <= 0) return { kind: 'invalid', reason: 'cancel needs a reminder id, e.g. `!remind cancel 3`' };
    return { kind: 'cancel', id };
  }

  if (head === 'in') {
    const m = RELATIVE_RE.exec((args[1] ?? '').toLowerCase());
    if (!m) return { kind: 'invalid', reason: 'relative time must look like `in 10m`, `in 2h` or `in 3d`' };
    const amount = Number(m[1]);
    const unit = m[2];
    if (amount === 0 || !isUnit(unit)) return { kind: 'invalid', reason: 'relative time must be at least 1 minute' };
    return withText(floorToMinute(now.getTime() + amount * UNIT_MS[unit]), args.slice(2));
  }

  const date = DATE_RE.exec(args[0]);
  if (date) {
    const time = parseTime(args[1] ?? '');
    if (!time) return { kind: 'invalid', reason: 'a date must be followed by a time, e.g. `2024-05-17 13:45`' };
    const year = Number(date[1]);
    const month = Number(date[2]);
    const day = Number(date[3]);
    const at = new Date(year, month - 1, day, time.hour, time.minute);
    if (at.getFullYear() !== year || at.getMonth() !== month - 1 || at.getDate() !== day) {
      return { kind: 'invalid', reason: `${args[0]} is not a calendar date` };
    }
    return withText(at, args.slice(2));
  }

  const time = parseTime(args[0]);
  if (time) {
    const at = new Date(now.getFullYear(), now.getMonth(), now.getDate(), time.hour, time.minute);
    if (at.getTime() <= now.getTime()) at.setDate(at.getDate() + 1);
    return withText(at, args.slice(1));
  }

  return { kind: 'invalid', reason: REMIND_USAGE };
}
