/**
 * Error types raised by the runtime
 */

export class TerminalSetupError extends Error {
  constructor(message = 'failed to enter raw mode', options?: ErrorOptions) {
    super(message, options);
    this.name = 'TerminalSetupError';
  }
}

export class InputClosedError extends Error {
  constructor(message = 'input stream ended', options?: ErrorOptions) {
    super(message, options);
    this.name = 'InputClosedError';
  }
}

export class CommandError extends Error {
  constructor(cause: unknown) {
    super(`command failed: ${getErrorMessage(cause)}`, { cause });
    this.name = 'CommandError';
  }
}

export class ProgramStateError extends Error {
  constructor(message = 'program is not idle', options?: ErrorOptions) {
    super(message, options);
    this.name = 'ProgramStateError';
  }
}

/**
 * Safely extracts the message from an error object
 * Works with both Error objects and unknown types
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }

  return String(error);
}
