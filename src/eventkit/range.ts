import { DateTime } from 'luxon';
import { usageError } from '../shared/errors.js';

export interface RangeOptions {
  from?: string;
  to?: string;
  days?: number;
  today?: boolean;
  tomorrow?: boolean;
  thisWeek?: boolean;
  nextWeek?: boolean;
}

export interface DateRange {
  from: DateTime;
  to: DateTime;
}

const INPUT_FORMATS = ["yyyy-MM-dd'T'HH:mm:ss", "yyyy-MM-dd'T'HH:mm", 'yyyy-MM-dd'] as const;

interface ParsedInput {
  value: DateTime;
  dateOnly: boolean;
}

export function parseRangeInput(value: string, now: DateTime): ParsedInput | null {
  for (const format of INPUT_FORMATS) {
    const parsed = DateTime.fromFormat(value.trim(), format, { zone: now.zone });
    if (parsed.isValid) {
      return { value: parsed, dateOnly: format === 'yyyy-MM-dd' };
    }
  }
  return null;
}

function startOfDay(date: DateTime): DateTime {
  return date.startOf('day');
}

/** Last whole second of the day. */
function endOfDay(date: DateTime): DateTime {
  return date.startOf('day').plus({ days: 1 }).minus({ seconds: 1 });
}

function weekOf(date: DateTime): DateRange {
  const start = date.startOf('week');
  return { from: start, to: start.plus({ weeks: 1 }).minus({ seconds: 1 }) };
}

export function resolveDateRange(options: RangeOptions, now: DateTime): DateRange {
  const presets = [options.today, options.tomorrow, options.thisWeek, options.nextWeek].filter(Boolean).length;
  const hasFrom = options.from !== undefined;
  const hasTo = options.to !== undefined;
  const hasDays = options.days !== undefined;

  if (presets > 1) {
    throw usageError('only one of --today/--tomorrow/--this-week/--next-week can be used');
  }
  if (presets > 0 && (hasFrom || hasTo || hasDays)) {
    throw usageError('--from/--to/--days cannot be combined with date shortcuts');
  }
  if (hasDays && (hasFrom || hasTo)) {
    throw usageError('--days cannot be combined with --from/--to');
  }

  if (options.days !== undefined) {
    if (!Number.isInteger(options.days) || options.days <= 0) {
      throw usageError('--days must be greater than 0');
    }
    return { from: now, to: now.plus({ days: options.days }) };
  }

  if (options.today) {
    return { from: startOfDay(now), to: endOfDay(now) };
  }
  if (options.tomorrow) {
    const tomorrow = now.plus({ days: 1 });
    return { from: startOfDay(tomorrow), to: endOfDay(tomorrow) };
  }
  if (options.thisWeek) {
    return weekOf(now);
  }
  if (options.nextWeek) {
    return weekOf(now.plus({ days: 7 }));
  }

  let from = startOfDay(now);
  let to = endOfDay(now);
  let fromDateOnly = false;
  let toDateOnly = false;

  if (options.from !== undefined) {
    const parsed = parseRangeInput(options.from, now);
    if (!parsed) {
      throw usageError(`invalid --from value: ${options.from}`);
    }
    fromDateOnly = parsed.dateOnly;
    from = parsed.dateOnly ? startOfDay(parsed.value) : parsed.value;
  }

  if (options.to !== undefined) {
    const parsed = parseRangeInput(options.to, now);
    if (!parsed) {
      throw usageError(`invalid --to value: ${options.to}`);
    }
    toDateOnly = parsed.dateOnly;
    to = parsed.dateOnly ? endOfDay(parsed.value) : parsed.value;
  }

  if (hasFrom && !hasTo) {
    to = fromDateOnly ? endOfDay(from) : from.plus({ days: 1 });
  }
  if (hasTo && !hasFrom) {
    from = toDateOnly ? startOfDay(to) : to.minus({ days: 1 });
  }

  if (to.toMillis() < from.toMillis()) {
    throw usageError('--to must be after --from');
  }
  return { from, to };
}

/** Wire format handed to the helper. */
export function formatRangeBound(date: DateTime): string {
  return date.set({ millisecond: 0 }).toISO({ suppressMilliseconds: true }) ?? date.toString();
}
