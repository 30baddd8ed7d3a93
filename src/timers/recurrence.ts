import { RecurrenceSpecError } from './errors.js';
import { SPEC_FIELDS } from './types.js';
import type { RecurrenceFieldInput, RecurrenceInput, RecurrenceSpec, SpecField } from './types.js';

const FIELD_RANGES: Record<SpecField, readonly [number, number] | null> = {
  year: null,
  month: [1, 12],
  monthday: [1, 31],
  weekday: [1, 7],
  hour: [0, 23],
  minute: [0, 59],
};

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === 'function'
  );
}

function checkValue(field: SpecField, value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new RecurrenceSpecError(field, `expected an integer or a list of integers, got ${String(value)}`);
  }
  const range = FIELD_RANGES[field];
  if (range && (value < range[0] || value > range[1])) {
    throw new RecurrenceSpecError(field, `${value} is outside ${range[0]}..${range[1]}`);
  }
  return value;
}

function normalizeField(field: SpecField, raw: unknown): readonly number[] | null {
  if (raw == null) return null;
  if (typeof raw === 'number') return Object.freeze([checkValue(field, raw)]);
  if (!isIterable(raw)) {
    throw new RecurrenceSpecError(field, `expected an integer or a list of integers, got ${typeof raw}`);
  }

  const values = new Set<number>();
  for (const v of raw) values.add(checkValue(field, v));
  if (values.size === 0) {
    throw new RecurrenceSpecError(field, 'empty list (use null for "any")');
  }
  return Object.freeze([...values].sort((a, b) => a - b));
}

/**
 * Validate and normalize a recurrence spec. Bare integers become one-element
 * lists, lists are sorted and deduplicated, missing fields become wildcards.
 */
export function normalizeSpec(input: RecurrenceInput): RecurrenceSpec {
  if (typeof input !== 'object' || input === null) {
    throw new RecurrenceSpecError('spec', `expected an object, got ${input === null ? 'null' : typeof input}`);
  }
  const raw: Partial<Record<SpecField, unknown>> = input;
  return Object.freeze({
    year: normalizeField('year', raw.year),
    month: normalizeField('month', raw.month),
    monthday: normalizeField('monthday', raw.monthday),
    weekday: normalizeField('weekday', raw.weekday),
    hour: normalizeField('hour', raw.hour),
    minute: normalizeField('minute', raw.minute),
  });
}

export function recurrence(fields: {
  year?: RecurrenceFieldInput;
  month?: RecurrenceFieldInput;
  monthday?: RecurrenceFieldInput;
  weekday?: RecurrenceFieldInput;
  hour?: RecurrenceFieldInput;
  minute?: RecurrenceFieldInput;
} = {}): RecurrenceSpec {
  return normalizeSpec(fields);
}

/**
 * Spec matching exactly the minute of `date` (local time). With `dateOnly`,
 * matches every minute of that calendar day.
 */
export function specFromDate(date: Date, opts?: { dateOnly?: boolean }): RecurrenceSpec {
  if (Number.isNaN(date.getTime())) {
    throw new RecurrenceSpecError('spec', 'invalid date');
  }
  const day = {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    monthday: date.getDate(),
  };
  if (opts?.dateOnly) return normalizeSpec(day);
  return normalizeSpec({ ...day, hour: date.getHours(), minute: date.getMinutes() });
}

export function copySpec(spec: RecurrenceSpec): RecurrenceSpec {
  return {
    year: spec.year ? [...spec.year] : null,
    month: spec.month ? [...spec.month] : null,
    monthday: spec.monthday ? [...spec.monthday] : null,
    weekday: spec.weekday ? [...spec.weekday] : null,
    hour: spec.hour ? [...spec.hour] : null,
    minute: spec.minute ? [...spec.minute] : null,
  };
}

export function describeSpec(spec: RecurrenceSpec): string {
  return SPEC_FIELDS.map((field) => {
    const values = spec[field];
    return `${field}=${values ? values.join(',') : '*'}`;
  }).join(' ');
}
