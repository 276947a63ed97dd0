export enum FantasticalErrorCode {
  USAGE = 'USAGE',
  CONFIG_INVALID = 'CONFIG_INVALID',
  UNSUPPORTED_PLATFORM = 'UNSUPPORTED_PLATFORM',
  COMMAND_NOT_FOUND = 'COMMAND_NOT_FOUND',
  COMMAND_FAILED = 'COMMAND_FAILED',
  CLIPBOARD_UNAVAILABLE = 'CLIPBOARD_UNAVAILABLE',
  HELPER_BUILD_FAILED = 'HELPER_BUILD_FAILED',
  HELPER_FAILED = 'HELPER_FAILED',
  HELPER_OUTPUT_INVALID = 'HELPER_OUTPUT_INVALID',
}

export class FantasticalError extends Error {
  readonly code: FantasticalErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: FantasticalErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'FantasticalError';
    this.code = code;
    this.context = context;
  }
}

export function usageError(message: string, context?: Record<string, unknown>): FantasticalError {
  return new FantasticalError(FantasticalErrorCode.USAGE, message, context);
}

export function isUsageError(err: unknown): boolean {
  return err instanceof FantasticalError && err.code === FantasticalErrorCode.USAGE;
}
