import fs from 'fs';
import path from 'path';
import { z } from 'zod';

export const APP_NAME = 'fantastical';

const PackageJsonSchema = z.object({ version: z.string() });

let cached: string | undefined;

/** Version from the package manifest one level above src/ (or dist/). */
export function packageVersion(): string {
  if (cached === undefined) {
    const raw = fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf-8');
    const parsed = PackageJsonSchema.safeParse(JSON.parse(raw));
    cached = parsed.success && parsed.data.version.trim() !== '' ? parsed.data.version : 'dev';
  }
  return cached;
}

export function versionString(version: string = packageVersion()): string {
  return `${APP_NAME} ${version.trim() || 'dev'}`;
}
