import { Command } from 'commander';
import type { Runtime } from '../shared/runtime.js';
import { buildShowUrl } from '../url/builder.js';
import { deliverUrl } from './deliver.js';
import { commandContext, resolveOutputMode } from './options.js';

type ShowOptions = {
  open?: boolean;
  print?: boolean;
  copy?: boolean;
  json?: boolean;
  plain?: boolean;
};

export function createShowCommand(runtime: Runtime): Command {
  return new Command('show')
    .description('Build (and optionally open) x-fantastical3://show/... URLs')
    .argument('<view>', 'mini, calendar, set, or another view name (day, week, month, ...)')
    .argument('[args...]', 'yyyy-mm-dd|today|tomorrow|yesterday, or the calendar set name')
    .option('--open', 'open the generated URL via the system opener')
    .option('--no-open', 'do not open the generated URL')
    .option('--print', 'print the generated URL to stdout')
    .option('--no-print', 'do not print the generated URL')
    .option('--copy', 'copy the generated URL to the clipboard')
    .option('--no-copy', 'do not copy the generated URL')
    .option('--json', 'print a JSON description of the result')
    .option('--plain', 'print plain text output')
    .addHelpText(
      'after',
      '\nExamples:\n  fantastical show mini today\n  fantastical show calendar 2026-01-03\n  fantastical show set "My Calendar Set"'
    )
    .action(async (view: string, rest: string[], options: ShowOptions, command: Command) => {
      const { config, dryRun } = await commandContext(runtime, command);
      const mode = resolveOutputMode(options.json, options.plain, config);
      const url = buildShowUrl(view, rest, runtime.now());

      await deliverUrl(runtime, {
        command: 'show',
        url,
        open: options.open ?? config.output.open,
        print: options.print ?? config.output.print,
        copy: options.copy ?? config.output.copy,
        mode,
        dryRun,
      });
    });
}
