import { Command, CommanderError } from 'commander';
import { createAppleScriptCommand } from './commands/applescript.js';
import { createConfigCommand } from './commands/config.js';
import { createEventKitCommand } from './commands/eventkit.js';
import { createParseCommand } from './commands/parse.js';
import { createShowCommand } from './commands/show.js';
import { FantasticalError, isUsageError } from './shared/errors.js';
import { logger } from './shared/logger.js';
import { writeLine, type Runtime } from './shared/runtime.js';
import { APP_NAME, versionString } from './version.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const EXAMPLES = `
Examples:
  fantastical parse "Wake up at 8am" --add --calendar "Work" --note "Alarm"
  fantastical parse --print "Dinner with Sam tomorrow 7pm"
  fantastical show mini today
  fantastical show calendar 2026-01-03
  fantastical show set "My Calendar Set"
  fantastical applescript --add "Wake up at 8am"
  fantastical eventkit events --today --format table

Notes:
  On macOS, --open defaults to true (uses "open <url>").
  On other platforms, --open defaults to false, so you'll typically use --print.`;

// addCommand() does not inherit settings, so they are pushed down explicitly.
function configureTree(command: Command, runtime: Runtime): void {
  command.exitOverride();
  command.configureOutput({
    writeOut: (str) => runtime.io.stdout.write(str),
    writeErr: (str) => runtime.io.stderr.write(str),
  });
  for (const sub of command.commands) {
    configureTree(sub, runtime);
  }
}

export function createProgram(runtime: Runtime): Command {
  const version = versionString();
  const program = new Command(APP_NAME)
    .description('CLI for the Fantastical URL handler, AppleScript bridge and EventKit calendar queries')
    .version(version, '-V, --version', 'print version information')
    .option('--config <path>', 'user config file (default: $FANTASTICAL_CONFIG or the user config dir)')
    .option('--verbose', 'verbose output to stderr')
    .option('--dry-run', 'print what would run without opening, copying or running anything')
    .addHelpText('after', EXAMPLES);

  program.addCommand(createParseCommand(runtime));
  program.addCommand(createShowCommand(runtime));
  program.addCommand(createAppleScriptCommand(runtime));
  program.addCommand(createEventKitCommand(runtime));
  program.addCommand(createConfigCommand(runtime));
  program
    .command('version')
    .description('print version information')
    .action(() => {
      writeLine(runtime.io.stdout, version);
    });

  configureTree(program, runtime);
  return program;
}

function commanderExitCode(err: CommanderError): number {
  switch (err.code) {
    case 'commander.helpDisplayed':
    case 'commander.version':
      return EXIT_OK;
    case 'commander.help':
      // bare `help`/no-subcommand help carries 0; help shown because of a mistake carries 1
      return err.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
    default:
      return EXIT_USAGE;
  }
}

/** Parses `argv` (without the node and script entries) and returns the exit code. */
export async function run(argv: string[], runtime: Runtime): Promise<number> {
  const program = createProgram(runtime);
  try {
    await program.parseAsync(argv, { from: 'user' });
    return EXIT_OK;
  } catch (err) {
    if (err instanceof CommanderError) {
      return commanderExitCode(err);
    }
    if (err instanceof FantasticalError) {
      logger.debug({ code: err.code, context: err.context }, 'command failed');
      writeLine(runtime.io.stderr, `Error: ${err.message}`);
      return isUsageError(err) ? EXIT_USAGE : EXIT_FAILURE;
    }
    writeLine(runtime.io.stderr, `Error: ${err instanceof Error ? err.message : String(err)}`);
    return EXIT_FAILURE;
  }
}
