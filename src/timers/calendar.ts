import type { RecurrenceSpec } from './types.js';

// Month lengths and weekdays repeat exactly every 400 Gregorian years, so an
// unbounded search that finds nothing within one cycle never will.
const GREGORIAN_CYCLE_YEARS = 400;

type TimeFloor = { day: number; hour: number; minute: number };

/**
 * Forward distance from `a` to `b` on the ring `ringStart..ringEnd`.
 *
 *   ringDistance(1, 3, 1, 12)  === 2   // january -> march
 *   ringDistance(3, 1, 1, 12)  === 10  // march -> january
 *   ringDistance(21, 1, 0, 23) === 4   // 9 pm -> 1 am
 */
export function ringDistance(a: number, b: number, ringStart: number, ringEnd: number): number {
  if (a < ringStart || a > ringEnd || b < ringStart || b > ringEnd) {
    throw new RangeError(`Expecting ${a} and ${b} to be between ${ringStart} and ${ringEnd}`);
  }
  if (a <= b) return b - a;
  return ringEnd - a + b - ringStart + 1;
}

/**
 * Element of `allowed` with the smallest forward ring distance from `value`
 * (distance 0 counts). A null `allowed` is the whole ring, so `value` itself.
 */
export function nearestElement(
  value: number,
  allowed: readonly number[] | null,
  ringStart: number,
  ringEnd: number,
): number {
  if (allowed === null || allowed.length === 0) return value;

  let best = allowed[0];
  let bestDistance = ringDistance(value, best, ringStart, ringEnd);
  for (const candidate of allowed) {
    const d = ringDistance(value, candidate, ringStart, ringEnd);
    if (d < bestDistance) {
      best = candidate;
      bestDistance = d;
    }
  }
  return best;
}

// Smallest allowed value >= from before the ring wraps; null means carry.
function nextInRing(
  allowed: readonly number[] | null,
  from: number,
  ringStart: number,
  ringEnd: number,
): number | null {
  if (from > ringEnd) return null;
  const found = nearestElement(from, allowed, ringStart, ringEnd);
  return found < from ? null : found;
}

function localDate(year: number, month: number, day: number, hour = 0, minute = 0): Date {
  // setFullYear keeps years 0..99 literal (the Date constructor maps them to 19xx).
  const d = new Date(2000, 0, 1);
  d.setFullYear(year, month - 1, day);
  d.setHours(hour, minute, 0, 0);
  return d;
}

function daysInMonth(year: number, month: number): number {
  return localDate(year, month + 1, 0).getDate();
}

/** ISO weekday: Monday=1 ... Sunday=7. */
export function isoWeekday(date: Date): number {
  const day = date.getDay();
  return day === 0 ? 7 : day;
}

function startingMinute(now: Date, skipNow: boolean): Date {
  const start = new Date(now.getTime());
  start.setSeconds(0, 0);
  if (skipNow || start.getTime() !== now.getTime()) {
    start.setMinutes(start.getMinutes() + 1);
  }
  return start;
}

function* candidateYears(years: readonly number[] | null, fromYear: number): Generator<number> {
  if (years) {
    for (const y of years) {
      if (y >= fromYear) yield y;
    }
    return;
  }
  for (let y = fromYear; y <= fromYear + GREGORIAN_CYCLE_YEARS; y++) yield y;
}

function searchDay(spec: RecurrenceSpec, floor: TimeFloor | null): { hour: number; minute: number } | null {
  let hour = nextInRing(spec.hour, floor ? floor.hour : 0, 0, 23);
  while (hour !== null) {
    const fromMinute = floor && hour === floor.hour ? floor.minute : 0;
    const minute = nextInRing(spec.minute, fromMinute, 0, 59);
    if (minute !== null) return { hour, minute };
    hour = nextInRing(spec.hour, hour + 1, 0, 23);
  }
  return null;
}

function searchMonth(spec: RecurrenceSpec, year: number, month: number, floor: TimeFloor | null): Date | null {
  const lastDay = daysInMonth(year, month);
  let day = nextInRing(spec.monthday, floor ? floor.day : 1, 1, 31);
  while (day !== null && day <= lastDay) {
    const weekday = isoWeekday(localDate(year, month, day));
    if (spec.weekday === null || spec.weekday.includes(weekday)) {
      const time = searchDay(spec, floor && day === floor.day ? floor : null);
      if (time) return localDate(year, month, day, time.hour, time.minute);
    }
    day = nextInRing(spec.monthday, day + 1, 1, 31);
  }
  return null;
}

/**
 * Earliest minute at or after `now` (rounded up to the minute) matching every
 * set field of `spec`, in naive local time. With `skipNow`, the minute `now`
 * falls in is never returned. Null when no such minute exists.
 */
export function nextOccurrence(spec: RecurrenceSpec, now: Date = new Date(), skipNow = false): Date | null {
  if (Number.isNaN(now.getTime())) return null;

  const start = startingMinute(now, skipNow);
  const startYear = start.getFullYear();
  const startMonth = start.getMonth() + 1;
  const startFloor: TimeFloor = {
    day: start.getDate(),
    hour: start.getHours(),
    minute: start.getMinutes(),
  };

  for (const year of candidateYears(spec.year, startYear)) {
    const inStartYear = year === startYear;
    let month = nextInRing(spec.month, inStartYear ? startMonth : 1, 1, 12);
    while (month !== null) {
      const floor = inStartYear && month === startMonth ? startFloor : null;
      const found = searchMonth(spec, year, month, floor);
      if (found) return found;
      month = nextInRing(spec.month, month + 1, 1, 12);
    }
  }
  return null;
}
