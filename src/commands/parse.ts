import { Command, Option } from 'commander';
import type { Runtime } from '../shared/runtime.js';
import { buildParseUrl, collectParams } from '../url/builder.js';
import { deliverUrl } from './deliver.js';
import { collect, commandContext, readSentence, resolveOutputMode } from './options.js';

type ParseOptions = {
  note?: string;
  calendar?: string;
  calendarName?: string;
  add?: boolean;
  param: string[];
  stdin?: boolean;
  open?: boolean;
  print?: boolean;
  copy?: boolean;
  json?: boolean;
  plain?: boolean;
};

export function createParseCommand(runtime: Runtime): Command {
  return new Command('parse')
    .description('Build (and optionally open) x-fantastical3://parse?... URLs')
    .argument('[sentence...]', 'natural-language event or task')
    .option('-n, --note <text>', 'optional note (maps to n=...)')
    .option('--calendar <name>', 'calendar name (maps to calendarName=...)')
    .addOption(new Option('--calendarName <name>', 'alias for --calendar').hideHelp())
    .option('--add', 'add immediately without interaction (maps to add=1)')
    .option('--no-add', 'do not add immediately')
    .option('--param <key=value>', 'extra query parameter (repeatable)', collect, [])
    .option('--stdin', 'read the sentence from stdin')
    .option('--open', 'open the generated URL via the system opener')
    .option('--no-open', 'do not open the generated URL')
    .option('--print', 'print the generated URL to stdout')
    .option('--no-print', 'do not print the generated URL')
    .option('--copy', 'copy the generated URL to the clipboard')
    .option('--no-copy', 'do not copy the generated URL')
    .option('--json', 'print a JSON description of the result')
    .option('--plain', 'print plain text output')
    .addHelpText('after', '\nExample:\n  fantastical parse "Wake up at 8am" --add --calendar Work --note "Alarm"')
    .action(async (words: string[], options: ParseOptions, command: Command) => {
      const { config, dryRun } = await commandContext(runtime, command);
      const mode = resolveOutputMode(options.json, options.plain, config);
      const extra = collectParams(options.param);
      const sentence = await readSentence(runtime, words, options.stdin);

      const url = buildParseUrl({
        sentence,
        note: options.note ?? config.parse.note,
        calendar: options.calendar ?? options.calendarName ?? config.parse.calendar,
        add: options.add ?? config.parse.add,
        extra,
      });

      await deliverUrl(runtime, {
        command: 'parse',
        url,
        open: options.open ?? config.output.open,
        print: options.print ?? config.output.print,
        copy: options.copy ?? config.output.copy,
        mode,
        dryRun,
      });
    });
}
