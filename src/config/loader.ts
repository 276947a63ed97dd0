// Config layering: user file, then project file, then environment.
// Command-line flags are applied by each command on top of the result.
import fs from 'fs/promises';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { FantasticalError, FantasticalErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { userConfigDir } from '../shared/paths.js';
import type { Runtime } from '../shared/runtime.js';
import { ConfigFileSchema, type ConfigFile, type PartialConfig, type ResolvedConfig } from './schema.js';

export const PROJECT_CONFIG_FILE = '.fantastical.json';

export interface ConfigPaths {
  user: string;
  project: string;
}

type Env = Record<string, string | undefined>;

export function emptyConfig(): PartialConfig {
  return { output: {}, parse: {}, applescript: {} };
}

export function configPaths(runtime: Runtime, override?: string): ConfigPaths {
  const fromEnv = runtime.env['FANTASTICAL_CONFIG']?.trim();
  let user = fromEnv || path.join(userConfigDir(runtime.platform, runtime.env, runtime.homeDir), 'fantastical', 'config.json');
  if (override?.trim()) {
    user = override.trim();
  }
  return { user, project: path.join(runtime.cwd, PROJECT_CONFIG_FILE) };
}

export async function readConfigFile(filePath: string): Promise<ConfigFile | null> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return null;
    throw new FantasticalError(FantasticalErrorCode.CONFIG_INVALID, `read config ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (raw.trim() === '') return null;

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new FantasticalError(
      FantasticalErrorCode.CONFIG_INVALID,
      `parse config ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : result.error.message;
    throw new FantasticalError(FantasticalErrorCode.CONFIG_INVALID, `parse config ${filePath}: ${where}`, {
      issues: result.error.issues,
    });
  }
  return result.data;
}

function nonBlank(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== '';
}

const OUTPUT_KEYS = ['open', 'print', 'copy', 'json', 'plain', 'dry_run', 'verbose'] as const;
const APPLESCRIPT_KEYS = ['add', 'run', 'print'] as const;

/** Booleans override when present; strings only when non-blank. */
export function mergeConfig(dst: PartialConfig, src: ConfigFile | PartialConfig | null): PartialConfig {
  if (!src) return dst;
  const merged: PartialConfig = {
    output: { ...dst.output },
    parse: { ...dst.parse },
    applescript: { ...dst.applescript },
  };

  for (const key of OUTPUT_KEYS) {
    const value = src.output?.[key];
    if (value !== undefined) merged.output[key] = value;
  }

  const calendar = src.parse?.calendar;
  if (nonBlank(calendar)) merged.parse.calendar = calendar;
  const note = src.parse?.note;
  if (nonBlank(note)) merged.parse.note = note;
  const add = src.parse?.add;
  if (add !== undefined) merged.parse.add = add;

  for (const key of APPLESCRIPT_KEYS) {
    const value = src.applescript?.[key];
    if (value !== undefined) merged.applescript[key] = value;
  }
  return merged;
}

const TRUE_VALUES = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);
const FALSE_VALUES = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False']);

export function parseBool(value: string): boolean | undefined {
  if (TRUE_VALUES.has(value)) return true;
  if (FALSE_VALUES.has(value)) return false;
  return undefined;
}

export function envBool(env: Env, key: string): boolean | undefined {
  const raw = env[key]?.trim();
  if (!raw) return undefined;
  const value = parseBool(raw);
  if (value === undefined) {
    logger.warn({ key, value: raw }, 'ignoring unparsable boolean environment variable');
  }
  return value;
}

export function envString(env: Env, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

const OUTPUT_ENV: Array<[keyof PartialConfig['output'], string]> = [
  ['open', 'FANTASTICAL_DEFAULT_OPEN'],
  ['print', 'FANTASTICAL_DEFAULT_PRINT'],
  ['copy', 'FANTASTICAL_DEFAULT_COPY'],
  ['json', 'FANTASTICAL_DEFAULT_JSON'],
  ['plain', 'FANTASTICAL_DEFAULT_PLAIN'],
  ['dry_run', 'FANTASTICAL_DRY_RUN'],
  ['verbose', 'FANTASTICAL_VERBOSE'],
];

const APPLESCRIPT_ENV: Array<[keyof PartialConfig['applescript'], string]> = [
  ['add', 'FANTASTICAL_APPLESCRIPT_ADD'],
  ['run', 'FANTASTICAL_APPLESCRIPT_RUN'],
  ['print', 'FANTASTICAL_APPLESCRIPT_PRINT'],
];

export function applyEnvOverrides(config: PartialConfig, env: Env): PartialConfig {
  const result: PartialConfig = {
    output: { ...config.output },
    parse: { ...config.parse },
    applescript: { ...config.applescript },
  };

  for (const [key, name] of OUTPUT_ENV) {
    const value = envBool(env, name);
    if (value !== undefined) result.output[key] = value;
  }

  const calendar = envString(env, 'FANTASTICAL_DEFAULT_CALENDAR');
  if (calendar !== undefined) result.parse.calendar = calendar;
  const note = envString(env, 'FANTASTICAL_DEFAULT_NOTE');
  if (note !== undefined) result.parse.note = note;
  const add = envBool(env, 'FANTASTICAL_DEFAULT_ADD');
  if (add !== undefined) result.parse.add = add;

  for (const [key, name] of APPLESCRIPT_ENV) {
    const value = envBool(env, name);
    if (value !== undefined) result.applescript[key] = value;
  }
  return result;
}

export async function loadConfig(runtime: Runtime, override?: string): Promise<PartialConfig> {
  const paths = configPaths(runtime, override);
  let config = emptyConfig();

  const user = await readConfigFile(paths.user);
  if (user) logger.debug({ path: paths.user }, 'loaded user config');
  config = mergeConfig(config, user);

  const project = await readConfigFile(paths.project);
  if (project) logger.debug({ path: paths.project }, 'loaded project config');
  config = mergeConfig(config, project);

  return applyEnvOverrides(config, runtime.env);
}

export function resolveDefaults(config: PartialConfig, platform: NodeJS.Platform): ResolvedConfig {
  const isMac = platform === 'darwin';
  return {
    output: {
      open: config.output.open ?? isMac,
      print: config.output.print ?? false,
      copy: config.output.copy ?? false,
      json: config.output.json ?? false,
      plain: config.output.plain ?? false,
      dry_run: config.output.dry_run ?? false,
      verbose: config.output.verbose ?? false,
    },
    parse: {
      calendar: config.parse.calendar ?? '',
      note: config.parse.note ?? '',
      add: config.parse.add ?? false,
    },
    applescript: {
      add: config.applescript.add ?? false,
      run: config.applescript.run ?? isMac,
      print: config.applescript.print ?? false,
    },
  };
}
