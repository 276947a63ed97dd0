import { FantasticalError, FantasticalErrorCode } from '../../../src/shared/errors.js';
import { ExecaExecutor, commandExists, runOrThrow } from '../../../src/shared/exec.js';
import { FakeExecutor, failed, ok } from '../../helpers/fake-runtime.js';

jest.mock('execa', () => jest.fn());

const execaMock = jest.requireMock<jest.Mock>('execa');

function execaResult(overrides: Record<string, unknown>): Record<string, unknown> {
  return {
    command: 'helper',
    stdout: '',
    stderr: '',
    exitCode: 0,
    failed: false,
    timedOut: false,
    killed: false,
    signal: undefined,
    ...overrides,
  };
}

describe('ExecaExecutor', () => {
  afterEach(() => {
    execaMock.mockReset();
  });

  it('passes options through without rejecting', async () => {
    execaMock.mockResolvedValue(execaResult({ stdout: 'ok' }));
    const result = await new ExecaExecutor().run('pbcopy', [], { input: 'text', timeoutMs: 500 });
    expect(result).toEqual({ stdout: 'ok', stderr: '', exitCode: 0, signal: undefined });
    expect(execaMock).toHaveBeenCalledWith('pbcopy', [], {
      cwd: undefined,
      env: undefined,
      input: 'text',
      timeout: 500,
      reject: false,
    });
  });

  it('reports a non-zero exit as a result', async () => {
    execaMock.mockResolvedValue(execaResult({ exitCode: 2, failed: true, stderr: 'bad flag' }));
    await expect(new ExecaExecutor().run('xdg-open', ['x'])).resolves.toMatchObject({ exitCode: 2, stderr: 'bad flag' });
  });

  it('throws COMMAND_NOT_FOUND when the command cannot be spawned', async () => {
    execaMock.mockResolvedValue(
      execaResult({ command: 'missing-tool', exitCode: undefined, failed: true, stderr: 'spawn missing-tool ENOENT' })
    );
    await expect(new ExecaExecutor().run('missing-tool', [])).rejects.toMatchObject({
      code: FantasticalErrorCode.COMMAND_NOT_FOUND,
      message: 'Command failed to spawn: missing-tool',
    });
  });

  it('maps a killed process to exit code 128', async () => {
    execaMock.mockResolvedValue(
      execaResult({ exitCode: undefined, failed: true, timedOut: true, killed: true, signal: 'SIGTERM' })
    );
    await expect(new ExecaExecutor().run('osascript', [])).resolves.toEqual({
      stdout: '',
      stderr: '',
      exitCode: 128,
      signal: 'SIGTERM',
    });
  });

  it('maps a process ended by a signal to exit code 128', async () => {
    execaMock.mockResolvedValue(execaResult({ exitCode: undefined, failed: true, signal: 'SIGKILL' }));
    await expect(new ExecaExecutor().run('swiftc', [])).resolves.toMatchObject({ exitCode: 128, signal: 'SIGKILL' });
  });
});

describe('runOrThrow', () => {
  it('returns the result of a successful command', async () => {
    const executor = new FakeExecutor(() => ok('done\n'));
    const result = await runOrThrow(executor, 'xdg-open', ['x-fantastical3://show/mini'], { timeoutMs: 1000 });
    expect(result.stdout).toBe('done\n');
    expect(executor.calls).toEqual([
      { command: 'xdg-open', args: ['x-fantastical3://show/mini'], options: { timeoutMs: 1000 } },
    ]);
  });

  it('throws COMMAND_FAILED with trimmed stderr', async () => {
    const executor = new FakeExecutor(() => failed('no handler\n', 4));
    await expect(runOrThrow(executor, 'xdg-open', ['x'])).rejects.toMatchObject({
      code: FantasticalErrorCode.COMMAND_FAILED,
      message: 'Command exited with 4: xdg-open: no handler',
    });
  });

  it('omits empty stderr from the message', async () => {
    const executor = new FakeExecutor(() => failed('', 1));
    await expect(runOrThrow(executor, 'pbcopy', [])).rejects.toThrow('Command exited with 1: pbcopy');
  });
});

describe('commandExists', () => {
  it('asks the shell for the command path', async () => {
    const executor = new FakeExecutor(() => ok('/usr/bin/xclip\n'));
    await expect(commandExists(executor, 'xclip')).resolves.toBe(true);
    expect(executor.calls[0]).toMatchObject({ command: 'sh', args: ['-c', 'command -v xclip'] });
  });

  it('is false on a non-zero exit', async () => {
    const executor = new FakeExecutor(() => failed('', 1));
    await expect(commandExists(executor, 'wl-copy')).resolves.toBe(false);
  });

  it('is false when the shell cannot be spawned', async () => {
    const executor = new FakeExecutor(() => {
      throw new FantasticalError(FantasticalErrorCode.COMMAND_NOT_FOUND, 'Command failed to spawn: sh');
    });
    await expect(commandExists(executor, 'xsel')).resolves.toBe(false);
  });
});
