import { Command, InvalidArgumentError, Option } from 'commander';
import type { z } from 'zod';
import { FantasticalError, FantasticalErrorCode } from '../shared/errors.js';
import { writeLine, type Runtime } from '../shared/runtime.js';
import { helperCache, resolveHelper, runHelper } from '../eventkit/helper.js';
import { resolveFormat, resolveZone } from '../eventkit/format.js';
import { formatRangeBound, resolveDateRange } from '../eventkit/range.js';
import { renderCalendars, renderEvents, renderStatus } from '../eventkit/render.js';
import { selectEvents, sortCalendars } from '../eventkit/select.js';
import {
  HelperCalendarSchema,
  HelperEventSchema,
  HelperStatusSchema,
  SORT_KEYS,
  type SortKey,
} from '../eventkit/types.js';
import { collect, commandContext, type CommandContext } from './options.js';

type FormatOptions = {
  format?: string;
  json?: boolean;
  plain?: boolean;
};

type CalendarsOptions = FormatOptions & {
  input: boolean;
};

type EventsOptions = CalendarsOptions & {
  calendar: string[];
  calendarId: string[];
  from?: string;
  to?: string;
  days?: number;
  today?: boolean;
  tomorrow?: boolean;
  thisWeek?: boolean;
  nextWeek?: boolean;
  limit?: number;
  allDay: boolean;
  includeDeclined?: boolean;
  sort: SortKey;
  tz?: string;
  query?: string;
};

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!/^-?\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parseHelperOutput<T extends z.ZodTypeAny>(schema: T, stdout: string, what: string): z.infer<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch (err) {
    throw new FantasticalError(
      FantasticalErrorCode.HELPER_OUTPUT_INVALID,
      `eventkit helper returned invalid JSON for ${what}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new FantasticalError(FantasticalErrorCode.HELPER_OUTPUT_INVALID, `eventkit helper returned unexpected ${what}`, {
      issues: result.error.issues,
    });
  }
  return result.data;
}

function emit(runtime: Runtime, text: string): void {
  if (text !== '') {
    writeLine(runtime.io.stdout, text);
  }
}

/** Runs the helper, or in dry-run mode only reports what would run. */
async function callHelper(runtime: Runtime, context: CommandContext, args: string[]): Promise<string | null> {
  if (context.dryRun) {
    const helper = runtime.env['FANTASTICAL_EVENTKIT_HELPER']?.trim() || helperCache(runtime).binary;
    writeLine(runtime.io.stderr, `dry-run: would run ${[helper, ...args].join(' ')}`);
    return null;
  }
  const helper = await resolveHelper(runtime);
  return runHelper(runtime, helper, args);
}

function withFormatOptions(command: Command, formats: string): Command {
  return command
    .option('--format <format>', `output format (${formats})`)
    .option('--json', 'print machine-readable JSON output')
    .option('--plain', 'print stable plain-text output');
}

function createStatusCommand(runtime: Runtime): Command {
  return withFormatOptions(new Command('status').description('Show Calendar access status'), 'plain|json').action(
    async (options: FormatOptions, command: Command) => {
      const context = await commandContext(runtime, command);
      const format = resolveFormat(options, ['plain', 'json'], context.config);
      const stdout = await callHelper(runtime, context, ['status']);
      if (stdout === null) return;
      emit(runtime, renderStatus(parseHelperOutput(HelperStatusSchema, stdout, 'status'), format));
    }
  );
}

function createCalendarsCommand(runtime: Runtime): Command {
  return withFormatOptions(new Command('calendars').description('List calendars'), 'plain|json|table')
    .option('--no-input', 'do not prompt for Calendar access')
    .addHelpText('after', '\nNote:\n  Requires Calendar access; macOS will prompt on first use.')
    .action(async (options: CalendarsOptions, command: Command) => {
      const context = await commandContext(runtime, command);
      const format = resolveFormat(options, ['plain', 'json', 'table'], context.config);
      const args = ['calendars'];
      if (!options.input) args.push('--no-input');

      const stdout = await callHelper(runtime, context, args);
      if (stdout === null) return;
      const calendars = parseHelperOutput(HelperCalendarSchema.array(), stdout, 'calendars');
      emit(runtime, renderCalendars(sortCalendars(calendars), format));
    });
}

function createEventsCommand(runtime: Runtime): Command {
  return withFormatOptions(new Command('events').description('List events in a date range'), 'plain|json|table')
    .option('--no-input', 'do not prompt for Calendar access')
    .option('--calendar <name>', 'calendar name (repeatable)', collect, [])
    .option('--calendar-id <id>', 'calendar identifier (repeatable)', collect, [])
    .option('--from <date>', 'start date/time (YYYY-MM-DD or YYYY-MM-DDTHH:MM)')
    .option('--to <date>', 'end date/time (YYYY-MM-DD or YYYY-MM-DDTHH:MM)')
    .option('--days <n>', 'days from now (shortcut for --from now --to now+days)', parseInteger)
    .option('--today', "use today's date range")
    .option('--tomorrow', "use tomorrow's date range")
    .option('--this-week', "use this week's date range")
    .option('--next-week', "use next week's date range")
    .option('--limit <n>', 'limit number of events returned', parseInteger)
    .option('--no-all-day', 'exclude all-day events')
    .option('--include-declined', 'include declined events')
    .addOption(new Option('--sort <key>', 'sort order').choices(SORT_KEYS).default('start'))
    .option('--tz <zone>', 'timezone for output (IANA name)')
    .option('--query <text>', 'filter by title/location/notes (case-insensitive)')
    .addHelpText(
      'after',
      '\nNotes:\n  Requires Calendar access; macOS will prompt on first use.\n' +
        '  Date shortcuts (--today/--tomorrow/--this-week/--next-week/--days) are mutually exclusive with --from/--to.'
    )
    .action(async (options: EventsOptions, command: Command) => {
      const context = await commandContext(runtime, command);
      const format = resolveFormat(options, ['plain', 'json', 'table'], context.config);
      const now = runtime.now();
      const zone = resolveZone(options.tz, now.zone.name);
      const range = resolveDateRange(options, now);

      const args = ['events', '--from', formatRangeBound(range.from), '--to', formatRangeBound(range.to)];
      for (const name of options.calendar) args.push('--calendar', name);
      for (const id of options.calendarId) args.push('--calendar-id', id);
      if (!options.input) args.push('--no-input');

      const stdout = await callHelper(runtime, context, args);
      if (stdout === null) return;
      const events = selectEvents(parseHelperOutput(HelperEventSchema.array(), stdout, 'events'), {
        query: options.query,
        includeAllDay: options.allDay,
        includeDeclined: options.includeDeclined ?? false,
        sort: options.sort,
        limit: options.limit,
      });
      emit(runtime, renderEvents(events, format, zone));
    });
}

export function createEventKitCommand(runtime: Runtime): Command {
  return new Command('eventkit')
    .description('Query the macOS calendar store through the EventKit helper')
    .addCommand(createStatusCommand(runtime))
    .addCommand(createCalendarsCommand(runtime))
    .addCommand(createEventsCommand(runtime))
    .addHelpText(
      'after',
      '\nExamples:\n  fantastical eventkit status --json\n  fantastical eventkit calendars --json\n' +
        '  fantastical eventkit events --next-week --calendar "Work"'
    );
}
