/**
 * Input feeder - forwards keys from the terminal into the message stream
 */

import { logger } from './logger.js';
import type { KeyMsg } from './types.js';

export interface KeySource {
  readKey(signal: AbortSignal): Promise<KeyMsg>;
}

export interface InputSink {
  message(msg: KeyMsg): void;
  error(error: unknown): void;
}

/**
 * Read keys until the first failure or until the signal aborts. A failure is
 * reported once, as-is, on the error stream; cancellation ends quietly.
 */
export async function feedInput(source: KeySource, sink: InputSink, signal: AbortSignal): Promise<void> {
  while (!signal.aborted) {
    let key: KeyMsg;
    try {
      key = await source.readKey(signal);
    } catch (error) {
      if (signal.aborted) {
        return;
      }
      logger.error('Input read failed', error);
      sink.error(error);
      return;
    }

    if (signal.aborted) {
      return;
    }
    sink.message(key);
  }
}
