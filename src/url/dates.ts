import { DateTime } from 'luxon';
import { usageError } from '../shared/errors.js';

const RELATIVE_OFFSETS: Record<string, number> = {
  today: 0,
  tomorrow: 1,
  yesterday: -1,
};

/** Resolves a `show` date argument to local midnight. */
export function parseDateArg(value: string, now: DateTime): DateTime {
  const input = value.trim();
  if (input === '') {
    throw usageError('empty date');
  }

  const offset = RELATIVE_OFFSETS[input.toLowerCase()];
  if (offset !== undefined) {
    return now.plus({ days: offset }).startOf('day');
  }

  const parsed = /^\d{4}-\d{2}-\d{2}$/.test(input)
    ? DateTime.fromFormat(input, 'yyyy-MM-dd', { zone: now.zone })
    : null;
  if (!parsed?.isValid) {
    throw usageError(
      `invalid date "${input}"; want yyyy-mm-dd (e.g. 2026-01-03) or today/tomorrow/yesterday`
    );
  }
  return parsed;
}

export function formatDateArg(date: DateTime): string {
  return date.toFormat('yyyy-MM-dd');
}
