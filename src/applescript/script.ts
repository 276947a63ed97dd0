// The sentence and the add flag travel as osascript arguments, so user text
// never becomes part of the script source.
export const APPLESCRIPT_LINES: readonly string[] = [
  'on run argv',
  'set theSentence to item 1 of argv',
  'set addImmediately to false',
  'if (count of argv) > 1 then',
  'set addImmediately to (item 2 of argv is "1")',
  'end if',
  'tell application "Fantastical"',
  'if addImmediately then',
  'parse sentence theSentence with add immediately',
  'else',
  'parse sentence theSentence',
  'end if',
  'end tell',
  'end run',
];

export function renderScript(): string {
  return APPLESCRIPT_LINES.join('\n');
}

export function buildOsascriptArgs(sentence: string, add: boolean): string[] {
  const args: string[] = [];
  for (const line of APPLESCRIPT_LINES) {
    args.push('-e', line);
  }
  args.push('--', sentence, add ? '1' : '0');
  return args;
}
