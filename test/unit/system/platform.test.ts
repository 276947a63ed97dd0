import { FantasticalErrorCode } from '../../../src/shared/errors.js';
import {
  clipboardCommand,
  copyToClipboard,
  openCommand,
  openUrl,
  osascriptCommand,
  runOsascript,
} from '../../../src/system/platform.js';
import { FakeExecutor, createTestRuntime, failed, ok } from '../../helpers/fake-runtime.js';

const URL = 'x-fantastical3://show/mini';

describe('openCommand', () => {
  it.each([
    ['darwin', 'open', [URL]],
    ['linux', 'xdg-open', [URL]],
    ['win32', 'rundll32', ['url.dll,FileProtocolHandler', URL]],
  ] as const)('uses the %s opener', (platform, command, args) => {
    expect(openCommand(createTestRuntime({ platform }), URL)).toEqual({ command, args: [...args] });
  });

  it('honours FANTASTICAL_OPEN_COMMAND', () => {
    const runtime = createTestRuntime({ platform: 'aix', env: { FANTASTICAL_OPEN_COMMAND: 'my-opener' } });
    expect(openCommand(runtime, URL)).toEqual({ command: 'my-opener', args: [URL] });
  });

  it('fails on platforms without an opener', () => {
    expect(() => openCommand(createTestRuntime({ platform: 'aix' }), URL)).toThrow(
      "don't know how to open URLs on aix (use --print)"
    );
  });
});

describe('openUrl', () => {
  it('runs the opener with a timeout', async () => {
    const runtime = createTestRuntime({ platform: 'darwin' });
    await openUrl(runtime, URL);
    expect(runtime.executor.calls).toEqual([{ command: 'open', args: [URL], options: { timeoutMs: 15_000 } }]);
  });

  it('propagates opener failures', async () => {
    const runtime = createTestRuntime({ platform: 'linux', executor: new FakeExecutor(() => failed('no handler', 3)) });
    await expect(openUrl(runtime, URL)).rejects.toMatchObject({
      code: FantasticalErrorCode.COMMAND_FAILED,
      message: 'Command exited with 3: xdg-open: no handler',
    });
  });
});

describe('clipboardCommand', () => {
  it('uses pbcopy on macOS and clip on Windows', async () => {
    await expect(clipboardCommand(createTestRuntime({ platform: 'darwin' }))).resolves.toEqual({
      command: 'pbcopy',
      args: [],
    });
    await expect(clipboardCommand(createTestRuntime({ platform: 'win32' }))).resolves.toEqual({
      command: 'cmd',
      args: ['/c', 'clip'],
    });
  });

  it('picks the first installed tool on Linux', async () => {
    const executor = new FakeExecutor((_command, args) =>
      args[1] === 'command -v xclip' ? ok('/usr/bin/xclip\n') : failed('', 1)
    );
    const runtime = createTestRuntime({ platform: 'linux', executor });
    await expect(clipboardCommand(runtime)).resolves.toEqual({ command: 'xclip', args: ['-selection', 'clipboard'] });
    expect(executor.calls.map((call) => call.args[1])).toEqual(['command -v wl-copy', 'command -v xclip']);
  });

  it('fails when no tool is installed', async () => {
    const runtime = createTestRuntime({ platform: 'linux', executor: new FakeExecutor(() => failed('', 1)) });
    await expect(clipboardCommand(runtime)).rejects.toMatchObject({
      code: FantasticalErrorCode.CLIPBOARD_UNAVAILABLE,
      message: 'clipboard tool not found (need wl-copy, xclip, or xsel)',
    });
  });

  it('honours FANTASTICAL_COPY_COMMAND', async () => {
    const runtime = createTestRuntime({ platform: 'linux', env: { FANTASTICAL_COPY_COMMAND: 'tee-clip' } });
    await expect(clipboardCommand(runtime)).resolves.toEqual({ command: 'tee-clip', args: [] });
    expect(runtime.executor.calls).toEqual([]);
  });
});

describe('copyToClipboard', () => {
  it('writes the text to the tool on stdin', async () => {
    const runtime = createTestRuntime({ platform: 'darwin' });
    await copyToClipboard(runtime, URL);
    expect(runtime.executor.calls).toEqual([
      { command: 'pbcopy', args: [], options: { input: URL, timeoutMs: 15_000 } },
    ]);
  });
});

describe('osascript', () => {
  it('is macOS only unless overridden', () => {
    expect(osascriptCommand(createTestRuntime({ platform: 'darwin' }))).toBe('osascript');
    expect(
      osascriptCommand(createTestRuntime({ platform: 'linux', env: { FANTASTICAL_OSASCRIPT_COMMAND: 'fake-osa' } }))
    ).toBe('fake-osa');
    expect(() => osascriptCommand(createTestRuntime({ platform: 'linux' }))).toThrow(
      'applescript --run is only supported on macOS (osascript); use --print to output the script'
    );
  });

  it('forwards script output with a trailing newline', async () => {
    const runtime = createTestRuntime({ platform: 'darwin', executor: new FakeExecutor(() => ok('event added')) });
    await runOsascript(runtime, ['-e', 'return "event added"']);
    expect(runtime.stdout.text).toBe('event added\n');
    expect(runtime.executor.calls[0]).toEqual({
      command: 'osascript',
      args: ['-e', 'return "event added"'],
      options: { timeoutMs: 60_000 },
    });
  });

  it('writes nothing for empty output', async () => {
    const runtime = createTestRuntime({ platform: 'darwin' });
    await runOsascript(runtime, []);
    expect(runtime.stdout.text).toBe('');
  });
});
