import { DateTime } from 'luxon';
import type { CalendarInfo, HelperEvent, SortKey } from './types.js';

export interface SelectOptions {
  query?: string;
  includeAllDay: boolean;
  includeDeclined: boolean;
  sort: SortKey;
  limit?: number;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function instant(iso: string): number {
  return DateTime.fromISO(iso, { setZone: true }).toMillis();
}

function matchesQuery(event: HelperEvent, query: string): boolean {
  return [event.title, event.location ?? '', event.notes ?? ''].some((field) => field.toLowerCase().includes(query));
}

const COMPARATORS: Record<SortKey, (a: HelperEvent, b: HelperEvent) => number> = {
  start: (a, b) => instant(a.start) - instant(b.start),
  end: (a, b) => instant(a.end) - instant(b.end),
  title: (a, b) => compareStrings(a.title.toLowerCase(), b.title.toLowerCase()),
  calendar: (a, b) =>
    compareStrings(a.calendar.toLowerCase(), b.calendar.toLowerCase()) || instant(a.start) - instant(b.start),
};

/** Filters, sorts and truncates the helper's events for display. */
export function selectEvents(events: HelperEvent[], options: SelectOptions): HelperEvent[] {
  const query = options.query?.trim().toLowerCase();
  let selected = events;

  if (query) {
    selected = selected.filter((event) => matchesQuery(event, query));
  }
  if (!options.includeAllDay) {
    selected = selected.filter((event) => !event.allDay);
  }
  if (!options.includeDeclined) {
    selected = selected.filter((event) => !event.declined);
  }

  selected = [...selected].sort(COMPARATORS[options.sort]);

  if (options.limit !== undefined && options.limit > 0 && selected.length > options.limit) {
    selected = selected.slice(0, options.limit);
  }
  return selected;
}

export function sortCalendars(calendars: CalendarInfo[]): CalendarInfo[] {
  return [...calendars].sort((a, b) => compareStrings(a.title.toLowerCase(), b.title.toLowerCase()));
}
