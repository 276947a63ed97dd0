import type { Command } from 'commander';
import { usageError } from '../shared/errors.js';
import { readAll, type Runtime } from '../shared/runtime.js';
import { loadConfig, resolveDefaults } from '../config/loader.js';
import type { ResolvedConfig } from '../config/schema.js';
import { setVerbose } from '../shared/logger.js';

export type GlobalOptions = {
  config?: string;
  verbose?: boolean;
  dryRun?: boolean;
};

export interface CommandContext {
  config: ResolvedConfig;
  dryRun: boolean;
}

/** Loads layered config and applies the global flags on top. */
export async function commandContext(runtime: Runtime, command: Command): Promise<CommandContext> {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const config = resolveDefaults(await loadConfig(runtime, globals.config), runtime.platform);
  const verbose = globals.verbose ?? config.output.verbose;
  setVerbose(verbose);
  return {
    config: { ...config, output: { ...config.output, verbose } },
    dryRun: globals.dryRun ?? config.output.dry_run,
  };
}

export type OutputMode = 'json' | 'text';

export function resolveOutputMode(json: boolean | undefined, plain: boolean | undefined, config: ResolvedConfig): OutputMode {
  if (json && plain) {
    throw usageError('--json and --plain are mutually exclusive');
  }
  if (json) return 'json';
  if (plain) return 'text';
  return config.output.json ? 'json' : 'text';
}

/**
 * Sentence words joined by spaces, or stdin with `--stdin`.
 */
export async function readSentence(runtime: Runtime, words: string[], fromStdin: boolean | undefined): Promise<string> {
  if (fromStdin) {
    if (words.length > 0) {
      throw usageError('cannot combine --stdin with sentence arguments');
    }
    const sentence = (await readAll(runtime.io.stdin)).trim();
    if (sentence === '') {
      throw usageError('missing <sentence...> on stdin');
    }
    return sentence;
  }
  const sentence = words.join(' ').trim();
  if (sentence === '') {
    throw usageError('missing <sentence...>');
  }
  return sentence;
}

export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}
