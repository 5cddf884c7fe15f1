/**
 * Command helpers
 */

import { QUIT_MSG, isBatchMsg, isQuitMsg } from './signals.js';
import { SIGNAL, type BatchMsg, type Cmd, type Message, type QuitMsg } from './types.js';

/**
 * Create a command that runs multiple commands concurrently, with no
 * ordering guarantee on their results. Absent commands are skipped; with
 * nothing left, the result is the no-op command.
 */
export function batch<Msg>(...cmds: Array<Cmd<Msg> | null | undefined>): Cmd<Msg> | null {
  const valid = cmds.filter((cmd): cmd is Cmd<Msg> => typeof cmd === 'function');
  if (valid.length === 0) {
    return null;
  }
  const msg: BatchMsg<Msg> = { [SIGNAL]: 'batch', cmds: valid };
  return () => msg;
}

/**
 * The quit message. The function itself is also a command:
 * `return [model, quit]`.
 */
export function quit(): QuitMsg {
  return QUIT_MSG;
}

/**
 * Tick command - after a delay, produce a message from the current time.
 * Produces nothing if the program terminates first.
 */
export function tick<Msg>(delayMs: number, fn: (time: Date) => Message<Msg> | null): Cmd<Msg> {
  return async (signal) => {
    const fired = await sleep(delayMs, signal);
    return fired ? fn(new Date()) : null;
  };
}

/**
 * Map - transform the application result of a command
 */
export function map<MsgA, MsgB>(cmd: Cmd<MsgA>, fn: (msg: MsgA) => MsgB): Cmd<MsgB> {
  return async (signal) => {
    const result = await cmd(signal);
    if (result === null || result === undefined) return null;
    if (isQuitMsg(result)) return result;
    if (isBatchMsg<MsgA>(result)) {
      const mapped: BatchMsg<MsgB> = { [SIGNAL]: 'batch', cmds: result.cmds.map((inner) => map(inner, fn)) };
      return mapped;
    }
    return fn(result);
  };
}

export interface RetryOptions<Msg> {
  maxAttempts?: number;
  delayMs?: number;
  onError?: (error: unknown, attempt: number) => Message<Msg> | null;
}

/**
 * Retry - rerun a command that throws
 */
export function retry<Msg>(cmd: Cmd<Msg>, options: RetryOptions<Msg> = {}): Cmd<Msg> {
  const { maxAttempts = 3, delayMs = 1000, onError } = options;

  return async (signal) => {
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await cmd(signal);
      } catch (error) {
        lastError = error;
        if (onError) {
          const errorMsg = onError(error, attempt);
          if (errorMsg !== null) return errorMsg;
        }
        if (attempt < maxAttempts && !(await sleep(delayMs, signal))) {
          return null;
        }
      }
    }

    throw lastError;
  };
}

/**
 * Resolves true after `ms`, or false as soon as the signal aborts
 */
function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) {
    return Promise.resolve(false);
  }
  return new Promise<boolean>((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
