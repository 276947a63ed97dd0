import { IANAZone } from 'luxon';
import { usageError } from '../shared/errors.js';
import type { ResolvedConfig } from '../config/schema.js';
import type { OutputFormat } from './types.js';

export interface FormatFlags {
  format?: string;
  json?: boolean;
  plain?: boolean;
}

function isAllowed(value: string, allowed: readonly OutputFormat[]): value is OutputFormat {
  return allowed.some((format) => format === value);
}

export function resolveFormat(flags: FormatFlags, allowed: readonly OutputFormat[], config: ResolvedConfig): OutputFormat {
  if (flags.format !== undefined) {
    if (flags.json || flags.plain) {
      throw usageError('cannot combine --format with --json/--plain');
    }
    const format = flags.format.trim().toLowerCase();
    if (!isAllowed(format, allowed)) {
      throw usageError(`invalid --format "${format}" (want: ${allowed.join('|')})`);
    }
    return format;
  }
  if (flags.json && flags.plain) {
    throw usageError('--json and --plain are mutually exclusive');
  }
  if (flags.json) return 'json';
  if (flags.plain) return 'plain';
  if (config.output.json) return 'json';
  return 'plain';
}

export function resolveZone(value: string | undefined, fallback: string): string {
  const zone = value?.trim();
  if (!zone) return fallback;
  if (!IANAZone.isValidZone(zone)) {
    throw usageError(`invalid --tz value: ${zone}`);
  }
  return zone;
}
