import fs from 'fs/promises';
import { Command } from 'commander';
import { configPaths } from '../config/loader.js';
import { writeLine, type Runtime } from '../shared/runtime.js';
import { commandContext, type GlobalOptions } from './options.js';

async function describePath(filePath: string): Promise<string> {
  try {
    await fs.access(filePath);
    return filePath;
  } catch {
    return `${filePath} (missing)`;
  }
}

export function createConfigCommand(runtime: Runtime): Command {
  const config = new Command('config').description('Inspect configuration files and resolved defaults');

  config
    .command('path')
    .description('Print the user and project config file locations')
    .action(async (_options: unknown, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const paths = configPaths(runtime, globals.config);
      writeLine(runtime.io.stdout, `user: ${await describePath(paths.user)}`);
      writeLine(runtime.io.stdout, `project: ${await describePath(paths.project)}`);
    });

  config
    .command('show')
    .description('Print the resolved configuration (defaults, files, environment) as JSON')
    .action(async (_options: unknown, command: Command) => {
      const { config: resolved } = await commandContext(runtime, command);
      writeLine(runtime.io.stdout, JSON.stringify(resolved, null, 2));
    });

  return config;
}
