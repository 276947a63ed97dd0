import { Command } from 'commander';
import { buildOsascriptArgs, renderScript } from '../applescript/script.js';
import { runOsascript } from '../system/platform.js';
import { writeLine, type Runtime } from '../shared/runtime.js';
import { commandContext, readSentence, resolveOutputMode } from './options.js';

type AppleScriptOptions = {
  add?: boolean;
  run?: boolean;
  print?: boolean;
  stdin?: boolean;
  json?: boolean;
  plain?: boolean;
};

export function createAppleScriptCommand(runtime: Runtime): Command {
  return new Command('applescript')
    .alias('as')
    .description('Send "parse sentence" to Fantastical via osascript (macOS)')
    .argument('[sentence...]', 'natural-language event or task')
    .option('--add', "use Fantastical's 'with add immediately'")
    .option('--no-add', 'let Fantastical show its editor')
    .option('--run', 'run osascript (macOS only)')
    .option('--no-run', 'do not run osascript')
    .option('--print', 'print the AppleScript instead of (or in addition to) running it')
    .option('--no-print', 'do not print the AppleScript')
    .option('--stdin', 'read the sentence from stdin')
    .option('--json', 'print a JSON description of the result')
    .option('--plain', 'print plain text output')
    .addHelpText('after', '\nExample:\n  fantastical applescript --add "Wake up at 8am"')
    .action(async (words: string[], options: AppleScriptOptions, command: Command) => {
      const { config, dryRun } = await commandContext(runtime, command);
      const mode = resolveOutputMode(options.json, options.plain, config);
      const sentence = await readSentence(runtime, words, options.stdin);
      const add = options.add ?? config.applescript.add;
      const run = options.run ?? config.applescript.run;
      const print = options.print ?? config.applescript.print;
      const script = renderScript();

      if (mode === 'json') {
        writeLine(runtime.io.stdout, JSON.stringify({ command: 'applescript', sentence, add, run, dryRun, script }));
      } else if (print || !run) {
        writeLine(runtime.io.stdout, script);
      }

      if (!run) return;

      const args = buildOsascriptArgs(sentence, add);
      if (dryRun) {
        writeLine(runtime.io.stderr, 'dry-run: would run osascript');
        return;
      }
      await runOsascript(runtime, args);
    });
}
