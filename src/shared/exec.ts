import execa from 'execa';
import { FantasticalError, FantasticalErrorCode } from './errors.js';
import { logger } from './logger.js';

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  signal?: string;
}

export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
  input?: string;
  timeoutMs?: number;
}

/** Process boundary. Commands never spawn directly; they go through a Runtime's executor. */
export interface Executor {
  run(command: string, args: string[], options?: ExecOptions): Promise<ExecResult>;
}

export class ExecaExecutor implements Executor {
  async run(command: string, args: string[], options?: ExecOptions): Promise<ExecResult> {
    logger.debug({ command, args }, 'exec');
    const result = await execa(command, args, {
      cwd: options?.cwd,
      env: options?.env,
      input: options?.input,
      timeout: options?.timeoutMs,
      reject: false,
    });
    // execa reports a spawn failure (ENOENT, EACCES) as a failed result with no exit code and no signal
    if (result.failed && typeof result.exitCode !== 'number' && !result.timedOut && !result.killed && !result.signal) {
      throw new FantasticalError(FantasticalErrorCode.COMMAND_NOT_FOUND, `Command failed to spawn: ${command}`, {
        command,
        cause: result.stderr || result.command,
      });
    }
    return {
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      exitCode: result.exitCode ?? (result.killed || result.signal ? 128 : 1),
      signal: result.signal ?? undefined,
    };
  }
}

export async function runOrThrow(
  executor: Executor,
  command: string,
  args: string[],
  options?: ExecOptions
): Promise<ExecResult> {
  const result = await executor.run(command, args, options);
  if (result.exitCode !== 0) {
    const detail = result.stderr.trim();
    throw new FantasticalError(
      FantasticalErrorCode.COMMAND_FAILED,
      `Command exited with ${result.exitCode}: ${command}${detail ? `: ${detail}` : ''}`,
      {
        stdout: result.stdout,
        stderr: result.stderr,
      }
    );
  }
  return result;
}

/** Mirrors a PATH lookup with the POSIX `command -v` builtin. */
export async function commandExists(executor: Executor, name: string): Promise<boolean> {
  try {
    const result = await executor.run('sh', ['-c', `command -v ${name}`]);
    return result.exitCode === 0 && result.stdout.trim() !== '';
  } catch (err) {
    logger.debug({ name, err }, 'command lookup failed');
    return false;
  }
}
