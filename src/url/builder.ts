import type { DateTime } from 'luxon';
import { usageError } from '../shared/errors.js';
import { formatDateArg, parseDateArg } from './dates.js';
import { encodeQuery } from './query.js';

export const FANTASTICAL_SCHEME = 'x-fantastical3://';

export interface ParseUrlOptions {
  sentence: string;
  note?: string;
  calendar?: string;
  add?: boolean;
  extra?: Map<string, string>;
}

export function buildParseUrl(options: ParseUrlOptions): string {
  const params = new Map<string, string>([['s', options.sentence]]);
  if (options.note?.trim()) {
    params.set('n', options.note);
  }
  if (options.calendar?.trim()) {
    params.set('calendarName', options.calendar);
  }
  if (options.add) {
    params.set('add', '1');
  }
  for (const [key, value] of options.extra ?? []) {
    params.set(key, value);
  }
  return `${FANTASTICAL_SCHEME}parse?${encodeQuery(params)}`;
}

/** Splits a `key=value` parameter at the first '='. */
export function parseParam(raw: string): [string, string] {
  const index = raw.indexOf('=');
  if (index < 0) {
    throw usageError(`invalid --param "${raw}"; want key=value`);
  }
  const key = raw.slice(0, index).trim();
  if (key === '') {
    throw usageError(`invalid --param "${raw}"; key must not be empty`);
  }
  return [key, raw.slice(index + 1)];
}

export function collectParams(raw: string[]): Map<string, string> {
  const params = new Map<string, string>();
  for (const entry of raw) {
    const [key, value] = parseParam(entry);
    params.set(key, value);
  }
  return params;
}

const VIEW_NAME = /^[a-z][a-z0-9-]*$/;

/**
 * `set <name...>` opens a calendar set by name; every other view takes an
 * optional date (`mini`, `calendar`, `day`, `week`, `month`, ...).
 */
export function buildShowUrl(view: string, rest: string[], now: DateTime): string {
  const target = view.trim().toLowerCase();

  if (target === 'set') {
    const name = rest.join(' ').trim();
    if (name === '') {
      throw usageError('missing calendar set name');
    }
    return `${FANTASTICAL_SCHEME}show/set?${encodeQuery({ name })}`;
  }

  if (!VIEW_NAME.test(target)) {
    throw usageError(`unknown show target "${view}" (want: mini, calendar, set, or a view name)`);
  }
  if (rest.length > 1) {
    throw usageError(`too many args for "${target}"; expected: fantastical show ${target} [date]`);
  }
  const dateArg = rest[0];
  if (dateArg !== undefined) {
    const date = parseDateArg(dateArg, now);
    return `${FANTASTICAL_SCHEME}show/${target}/${formatDateArg(date)}`;
  }
  return `${FANTASTICAL_SCHEME}show/${target}`;
}
