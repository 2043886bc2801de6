/**
 * Malformed command line: unknown flag, missing option value, bad port.
 * Carries the usage text so the entry point can print both.
 */
export class UsageError extends Error {
  readonly exitCode = 2;

  constructor(
    message: string,
    readonly usage: string = ''
  ) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Input ended before the user picked anything
 */
export class PromptAbortedError extends Error {
  constructor(message: string = 'Selection aborted: input closed') {
    super(message);
    this.name = 'PromptAbortedError';
  }
}

/**
 * Non-fatal: the positional file is missing or unreadable. Logged and recorded, never thrown.
 */
export class FileWarning extends Error {
  constructor(readonly path: string) {
    super(`Input file does not exist or is not readable: ${path}`);
    this.name = 'FileWarning';
  }
}
