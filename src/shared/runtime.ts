import os from 'os';
import { DateTime } from 'luxon';
import { ExecaExecutor, type Executor } from './exec.js';

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface CliIO {
  stdout: OutputStream;
  stderr: OutputStream;
  stdin: NodeJS.ReadableStream;
}

/**
 * Everything a command touches outside its own arguments. Commands read the
 * environment, platform and clock from here rather than from `process`.
 */
export interface Runtime {
  io: CliIO;
  env: Record<string, string | undefined>;
  cwd: string;
  platform: NodeJS.Platform;
  homeDir: string;
  executor: Executor;
  now(): DateTime;
}

export function createNodeRuntime(): Runtime {
  return {
    io: {
      stdout: process.stdout,
      stderr: process.stderr,
      stdin: process.stdin,
    },
    env: process.env,
    cwd: process.cwd(),
    platform: process.platform,
    homeDir: os.homedir(),
    executor: new ExecaExecutor(),
    now: () => DateTime.local(),
  };
}

export function writeLine(stream: OutputStream, line: string): void {
  stream.write(`${line}\n`);
}

export async function readAll(stream: NodeJS.ReadableStream): Promise<string> {
  // decode once so multibyte characters split across chunks survive
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf-8');
}
