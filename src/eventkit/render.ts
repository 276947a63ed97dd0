import { DateTime } from 'luxon';
import type { CalendarInfo, HelperEvent, HelperStatus, OutputFormat } from './types.js';

/** Left-aligned columns, two spaces apart, with a dashed rule under the header. */
export function renderTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((header) => header.length);
  for (const row of rows) {
    row.forEach((value, index) => {
      widths[index] = Math.max(widths[index] ?? 0, value.length);
    });
  }

  const line = (cells: string[]) => cells.map((cell, index) => cell.padEnd(widths[index] ?? 0)).join('  ');
  return [line(headers), widths.map((width) => '-'.repeat(width)).join('  '), ...rows.map(line)].join('\n');
}

export function renderStatus(status: HelperStatus, format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify({ status: status.status, canPrompt: status.canPrompt });
  }
  return status.status;
}

export function renderCalendars(calendars: CalendarInfo[], format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(
      calendars.map(({ id, title, source, type, allowsModifications }) => ({ id, title, source, type, allowsModifications }))
    );
  }
  if (format === 'table') {
    return renderTable(
      ['Title', 'Source', 'Type', 'ID'],
      calendars.map((calendar) => [calendar.title, calendar.source, calendar.type, calendar.id])
    );
  }
  return calendars.map((calendar) => `${calendar.title}\t(${calendar.source})`).join('\n');
}

function inZone(iso: string, zone: string): DateTime {
  return DateTime.fromISO(iso, { setZone: true }).setZone(zone).set({ millisecond: 0 });
}

function isoInZone(iso: string, zone: string): string {
  return inZone(iso, zone).toISO({ suppressMilliseconds: true }) ?? iso;
}

function displayInZone(iso: string, zone: string): string {
  return inZone(iso, zone).toFormat('yyyy-MM-dd HH:mm');
}

export function renderEvents(events: HelperEvent[], format: OutputFormat, zone: string): string {
  if (format === 'json') {
    return JSON.stringify(
      events.map((event) => ({
        id: event.id,
        title: event.title,
        calendar: event.calendar,
        calendarId: event.calendarId,
        start: isoInZone(event.start, zone),
        end: isoInZone(event.end, zone),
        allDay: event.allDay,
        location: event.location ?? undefined,
        notes: event.notes ?? undefined,
      }))
    );
  }

  const rows = events.map((event) => [
    displayInZone(event.start, zone),
    displayInZone(event.end, zone),
    event.calendar,
    event.title,
  ]);
  if (format === 'table') {
    return renderTable(['Start', 'End', 'Calendar', 'Title'], rows);
  }
  return rows.map((row) => row.join('\t')).join('\n');
}
