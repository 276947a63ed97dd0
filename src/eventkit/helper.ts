// EventKit helper lifecycle. The Swift source ships with the package and is
// compiled once per content hash into the user cache directory.
import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { FantasticalError, FantasticalErrorCode } from '../shared/errors.js';
import { commandExists, type ExecResult } from '../shared/exec.js';
import { logger } from '../shared/logger.js';
import { userCacheDir } from '../shared/paths.js';
import type { Runtime } from '../shared/runtime.js';

export const HELPER_SOURCE_PATH = path.join(__dirname, '..', '..', 'helper', 'eventkit-helper.swift');

const COMPILE_TIMEOUT_MS = 300_000;
// Covers the first-run Calendar permission prompt.
const HELPER_TIMEOUT_MS = 120_000;

export interface HelperCache {
  root: string;
  binary: string;
  source: string;
  hash: string;
}

export function helperCache(runtime: Runtime): HelperCache {
  const root = path.join(userCacheDir(runtime.platform, runtime.env, runtime.homeDir), 'fantastical');
  return {
    root,
    binary: path.join(root, 'eventkit-helper'),
    source: path.join(root, 'eventkit-helper.swift'),
    hash: path.join(root, 'eventkit-helper.hash'),
  };
}

/** First 8 bytes of the SHA-256, hex encoded. */
export function sourceHash(source: string): string {
  return crypto.createHash('sha256').update(source).digest().subarray(0, 8).toString('hex');
}

async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return null;
    throw err;
  }
}

async function fileExists(p: string): Promise<boolean> {
  try { await fs.access(p); return true; } catch { return false; }
}

async function compileHelper(runtime: Runtime, sourcePath: string, outputPath: string): Promise<void> {
  const swiftcArgs = ['-O', '-framework', 'EventKit', '-o', outputPath, sourcePath];
  const attempts: Array<{ command: string; args: string[] }> = [
    { command: 'xcrun', args: ['swiftc', ...swiftcArgs] },
    { command: 'swiftc', args: swiftcArgs },
  ];

  for (const attempt of attempts) {
    if (!(await commandExists(runtime.executor, attempt.command))) continue;
    logger.debug({ compiler: attempt.command }, 'compiling eventkit helper');
    const result = await runtime.executor.run(attempt.command, attempt.args, { timeoutMs: COMPILE_TIMEOUT_MS });
    if (result.exitCode === 0) return;
    logger.warn({ compiler: attempt.command, stderr: result.stderr.trim() }, 'eventkit helper compile failed');
  }

  throw new FantasticalError(
    FantasticalErrorCode.HELPER_BUILD_FAILED,
    'eventkit helper build failed; install Xcode Command Line Tools (xcode-select --install)'
  );
}

/** Returns a helper binary whose build matches the bundled source, compiling when needed. */
export async function ensureHelper(runtime: Runtime, sourcePath: string = HELPER_SOURCE_PATH): Promise<string> {
  const source = await fs.readFile(sourcePath, 'utf-8');
  const hash = sourceHash(source);
  const cache = helperCache(runtime);

  if (await fileExists(cache.binary)) {
    const current = await readIfExists(cache.hash);
    if (current?.trim() === hash) {
      return cache.binary;
    }
    logger.debug({ binary: cache.binary }, 'eventkit helper hash mismatch; recompiling');
  }

  await fs.mkdir(cache.root, { recursive: true });
  await fs.writeFile(cache.source, source, 'utf-8');
  await compileHelper(runtime, cache.source, cache.binary);

  try {
    await fs.writeFile(cache.hash, `${hash}\n`, 'utf-8');
  } catch (err) {
    // next run recompiles; the binary itself is usable
    logger.warn({ path: cache.hash, err }, 'could not record eventkit helper hash');
  }
  return cache.binary;
}

/** The `FANTASTICAL_EVENTKIT_HELPER` override, or the cached build (macOS only). */
export async function resolveHelper(runtime: Runtime, sourcePath?: string): Promise<string> {
  const override = runtime.env['FANTASTICAL_EVENTKIT_HELPER']?.trim();
  if (override) {
    logger.debug({ helper: override }, 'eventkit helper override');
    return override;
  }
  if (runtime.platform !== 'darwin') {
    throw new FantasticalError(
      FantasticalErrorCode.UNSUPPORTED_PLATFORM,
      'eventkit requires macOS (or FANTASTICAL_EVENTKIT_HELPER pointing at a helper)'
    );
  }
  const helper = await ensureHelper(runtime, sourcePath);
  logger.debug({ helper }, 'eventkit helper');
  return helper;
}

export async function runHelper(runtime: Runtime, helper: string, args: string[]): Promise<string> {
  let result: ExecResult;
  try {
    result = await runtime.executor.run(helper, args, { timeoutMs: HELPER_TIMEOUT_MS });
  } catch (err) {
    if (err instanceof FantasticalError) {
      throw new FantasticalError(FantasticalErrorCode.HELPER_FAILED, `eventkit helper could not start: ${helper}`, {
        cause: err.message,
      });
    }
    throw err;
  }
  if (result.exitCode !== 0) {
    const detail = result.stderr.trim() || `exit status ${result.exitCode}`;
    throw new FantasticalError(FantasticalErrorCode.HELPER_FAILED, detail, {
      helper,
      args,
      exitCode: result.exitCode,
    });
  }
  return result.stdout;
}
