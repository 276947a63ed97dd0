import { FantasticalError, FantasticalErrorCode } from '../shared/errors.js';
import { commandExists, runOrThrow } from '../shared/exec.js';
import { logger } from '../shared/logger.js';
import type { Runtime } from '../shared/runtime.js';

const OPEN_TIMEOUT_MS = 15_000;
const CLIPBOARD_TIMEOUT_MS = 15_000;
const OSASCRIPT_TIMEOUT_MS = 60_000;

interface Invocation {
  command: string;
  args: string[];
}

function override(runtime: Runtime, key: string): string | undefined {
  const value = runtime.env[key]?.trim();
  return value ? value : undefined;
}

export function openCommand(runtime: Runtime, url: string): Invocation {
  const custom = override(runtime, 'FANTASTICAL_OPEN_COMMAND');
  if (custom) {
    return { command: custom, args: [url] };
  }
  switch (runtime.platform) {
    case 'darwin':
      return { command: 'open', args: [url] };
    case 'linux':
      return { command: 'xdg-open', args: [url] };
    case 'win32':
      return { command: 'rundll32', args: ['url.dll,FileProtocolHandler', url] };
    default:
      throw new FantasticalError(
        FantasticalErrorCode.UNSUPPORTED_PLATFORM,
        `don't know how to open URLs on ${runtime.platform} (use --print)`
      );
  }
}

export async function openUrl(runtime: Runtime, url: string): Promise<void> {
  const { command, args } = openCommand(runtime, url);
  await runOrThrow(runtime.executor, command, args, { timeoutMs: OPEN_TIMEOUT_MS });
}

const LINUX_CLIPBOARD_TOOLS: readonly Invocation[] = [
  { command: 'wl-copy', args: [] },
  { command: 'xclip', args: ['-selection', 'clipboard'] },
  { command: 'xsel', args: ['--clipboard', '--input'] },
];

export async function clipboardCommand(runtime: Runtime): Promise<Invocation> {
  const custom = override(runtime, 'FANTASTICAL_COPY_COMMAND');
  if (custom) {
    return { command: custom, args: [] };
  }
  switch (runtime.platform) {
    case 'darwin':
      return { command: 'pbcopy', args: [] };
    case 'win32':
      return { command: 'cmd', args: ['/c', 'clip'] };
    case 'linux':
      // Wayland first, then X11
      for (const tool of LINUX_CLIPBOARD_TOOLS) {
        if (await commandExists(runtime.executor, tool.command)) {
          return tool;
        }
      }
      throw new FantasticalError(
        FantasticalErrorCode.CLIPBOARD_UNAVAILABLE,
        'clipboard tool not found (need wl-copy, xclip, or xsel)'
      );
    default:
      throw new FantasticalError(
        FantasticalErrorCode.UNSUPPORTED_PLATFORM,
        `clipboard copy not supported on ${runtime.platform}`
      );
  }
}

export async function copyToClipboard(runtime: Runtime, text: string): Promise<void> {
  const { command, args } = await clipboardCommand(runtime);
  logger.debug({ command }, 'copying to clipboard');
  await runOrThrow(runtime.executor, command, args, { input: text, timeoutMs: CLIPBOARD_TIMEOUT_MS });
}

export function osascriptCommand(runtime: Runtime): string {
  const custom = override(runtime, 'FANTASTICAL_OSASCRIPT_COMMAND');
  if (custom) {
    return custom;
  }
  if (runtime.platform !== 'darwin') {
    throw new FantasticalError(
      FantasticalErrorCode.UNSUPPORTED_PLATFORM,
      'applescript --run is only supported on macOS (osascript); use --print to output the script'
    );
  }
  return 'osascript';
}

/** Runs osascript and forwards whatever the script returns to stdout. */
export async function runOsascript(runtime: Runtime, args: string[]): Promise<void> {
  const command = osascriptCommand(runtime);
  const result = await runOrThrow(runtime.executor, command, args, { timeoutMs: OSASCRIPT_TIMEOUT_MS });
  if (result.stdout !== '') {
    runtime.io.stdout.write(result.stdout.endsWith('\n') ? result.stdout : `${result.stdout}\n`);
  }
}
