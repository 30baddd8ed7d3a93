import { describe, expect, it } from 'vitest';
import { isoWeekday, nearestElement, nextOccurrence, ringDistance } from './calendar.js';
import { recurrence } from './recurrence.js';

function at(year: number, month: number, day: number, hour = 0, minute = 0, second = 0): Date {
  return new Date(year, month - 1, day, hour, minute, second);
}

describe('ringDistance', () => {
  it('measures forward distance and wraps around', () => {
    expect(ringDistance(1, 3, 1, 12)).toBe(2);
    expect(ringDistance(3, 1, 1, 12)).toBe(10);
    expect(ringDistance(21, 1, 0, 23)).toBe(4);
    expect(ringDistance(5, 5, 0, 59)).toBe(0);
  });

  it('rejects values off the ring', () => {
    expect(() => ringDistance(0, 3, 1, 12)).toThrow(RangeError);
    expect(() => ringDistance(3, 13, 1, 12)).toThrow(RangeError);
  });
});

describe('nearestElement', () => {
  it('returns the value itself for a wildcard', () => {
    expect(nearestElement(7, null, 0, 23)).toBe(7);
  });

  it('counts a distance of zero', () => {
    expect(nearestElement(9, [3, 9, 15], 0, 23)).toBe(9);
  });

  it('picks the closest element going forward', () => {
    expect(nearestElement(10, [3, 9, 15], 0, 23)).toBe(15);
    expect(nearestElement(16, [3, 9, 15], 0, 23)).toBe(3);
  });
});

describe('isoWeekday', () => {
  it('numbers Monday as 1 and Sunday as 7', () => {
    expect(isoWeekday(at(2024, 1, 1))).toBe(1);
    expect(isoWeekday(at(2024, 1, 7))).toBe(7);
  });
});

describe('nextOccurrence', () => {
  it('finds the same day when the time is still ahead', () => {
    const spec = recurrence({ hour: 9, minute: 0 });
    expect(nextOccurrence(spec, at(2024, 1, 1, 8, 30))).toEqual(at(2024, 1, 1, 9, 0));
  });

  it('moves to the next day with skipNow on an exact match', () => {
    const spec = recurrence({ hour: 9, minute: 0 });
    expect(nextOccurrence(spec, at(2024, 1, 1, 9, 0), true)).toEqual(at(2024, 1, 2, 9, 0));
  });

  it('accepts now itself without skipNow', () => {
    const spec = recurrence({ hour: 9, minute: 0 });
    expect(nextOccurrence(spec, at(2024, 1, 1, 9, 0))).toEqual(at(2024, 1, 1, 9, 0));
  });

  it('rounds a mid-minute reference up for a wildcard spec', () => {
    const spec = recurrence();
    expect(nextOccurrence(spec, at(2024, 1, 1, 8, 30, 15))).toEqual(at(2024, 1, 1, 8, 31));
    expect(nextOccurrence(spec, at(2024, 1, 1, 8, 30, 15), true)).toEqual(at(2024, 1, 1, 8, 31));
    expect(nextOccurrence(spec, at(2024, 1, 1, 8, 30), true)).toEqual(at(2024, 1, 1, 8, 31));
    expect(nextOccurrence(spec, at(2024, 1, 1, 8, 30))).toEqual(at(2024, 1, 1, 8, 30));
  });

  it('finds the following Monday from a Wednesday', () => {
    const spec = recurrence({ weekday: 1, hour: 10, minute: 0 });
    expect(nextOccurrence(spec, at(2024, 1, 3, 12, 0))).toEqual(at(2024, 1, 8, 10, 0));
  });

  it('returns null when every listed year is in the past', () => {
    const spec = recurrence({ year: 2020, month: 1 });
    expect(nextOccurrence(spec, at(2024, 6, 1))).toBeNull();
  });

  it('skips months that are too short for the monthday', () => {
    const spec = recurrence({ monthday: 31 });
    expect(nextOccurrence(spec, at(2024, 2, 1))).toEqual(at(2024, 3, 31, 0, 0));
    expect(nextOccurrence(spec, at(2024, 4, 1))).toEqual(at(2024, 5, 31, 0, 0));
  });

  it('returns null for a day that never exists within the listed years', () => {
    expect(nextOccurrence(recurrence({ year: [2024, 2025], month: 2, monthday: 31 }), at(2024, 1, 1))).toBeNull();
  });

  it('returns null for a day that never exists at all', () => {
    expect(nextOccurrence(recurrence({ month: 2, monthday: 30 }), at(2024, 1, 1))).toBeNull();
  });

  it('carries into the next year', () => {
    const spec = recurrence({ month: 1, monthday: 1, hour: 0, minute: 0 });
    expect(nextOccurrence(spec, at(2024, 6, 1))).toEqual(at(2025, 1, 1, 0, 0));
  });

  it('carries minutes into the next hour', () => {
    expect(nextOccurrence(recurrence({ minute: 15 }), at(2024, 1, 1, 10, 20))).toEqual(at(2024, 1, 1, 11, 15));
  });

  it('carries hours into the next day', () => {
    const spec = recurrence({ hour: 23, minute: 30 });
    expect(nextOccurrence(spec, at(2024, 1, 1, 23, 45))).toEqual(at(2024, 1, 2, 23, 30));
  });

  it('carries the last minute of the year forward', () => {
    const spec = recurrence({ hour: [0, 12], minute: [0, 30] });
    expect(nextOccurrence(spec, at(2024, 12, 31, 23, 59), true)).toEqual(at(2025, 1, 1, 0, 0));
  });

  it('requires monthday and weekday to match together', () => {
    // Friday the 13th; the first one in 2024 is in September.
    const spec = recurrence({ monthday: 13, weekday: 5 });
    expect(nextOccurrence(spec, at(2024, 1, 1))).toEqual(at(2024, 9, 13, 0, 0));
  });

  it('finds the first Monday of March', () => {
    const spec = recurrence({ month: 3, monthday: [1, 2, 3, 4, 5, 6, 7], weekday: 1, hour: 9, minute: 0 });
    expect(nextOccurrence(spec, at(2024, 1, 10))).toEqual(at(2024, 3, 4, 9, 0));
    expect(nextOccurrence(spec, at(2024, 3, 4, 9, 0), true)).toEqual(at(2025, 3, 3, 9, 0));
  });

  it('waits for the next leap day', () => {
    const spec = recurrence({ month: 2, monthday: 29, hour: 12, minute: 0 });
    expect(nextOccurrence(spec, at(2025, 3, 1))).toEqual(at(2028, 2, 29, 12, 0));
  });

  it('jumps to a later listed year', () => {
    const spec = recurrence({ year: [2023, 2027], month: 6, monthday: 1, hour: 8, minute: 0 });
    expect(nextOccurrence(spec, at(2024, 1, 1))).toEqual(at(2027, 6, 1, 8, 0));
  });

  it('returns null for an invalid reference date', () => {
    expect(nextOccurrence(recurrence(), new Date(Number.NaN))).toBeNull();
  });

  it('is a pure function of its arguments', () => {
    const spec = recurrence({ weekday: [2, 4], hour: [7, 19], minute: [5, 35] });
    const now = at(2024, 5, 17, 13, 12);
    const first = nextOccurrence(spec, now, true);
    expect(nextOccurrence(spec, now, true)).toEqual(first);
    expect(now).toEqual(at(2024, 5, 17, 13, 12));
  });

  it('never returns an earlier occurrence for a later reference', () => {
    const specs = [
      recurrence({ weekday: [2, 4], hour: [7, 19], minute: [5, 35] }),
      recurrence({ monthday: [1, 15, 31], hour: 6, minute: 0 }),
      recurrence({ month: [2, 11], minute: [0, 45] }),
    ];
    for (const spec of specs) {
      let previous = 0;
      for (let step = 0; step < 200; step++) {
        const now = new Date(at(2024, 1, 1).getTime() + step * 7 * 3_600_000 + step * 61_000);
        const next = nextOccurrence(spec, now);
        expect(next).not.toBeNull();
        const t = next ? next.getTime() : 0;
        expect(t).toBeGreaterThanOrEqual(previous);
        expect(t).toBeGreaterThanOrEqual(now.getTime());
        previous = t;
      }
    }
  });
});
