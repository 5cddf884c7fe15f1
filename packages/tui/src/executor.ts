/**
 * Command executor - runs each command on its own task and forwards its
 * result into the message stream
 */

import { CommandError } from './errors.js';
import { logger } from './logger.js';
import type { Cmd, Message } from './types.js';

export interface ExecutorSink<Msg> {
  message(msg: Message<Msg>): void;
  error(error: unknown): void;
}

export class CommandExecutor<Msg> {
  private running = 0;

  constructor(
    private readonly sink: ExecutorSink<Msg>,
    private readonly signal: AbortSignal
  ) {}

  /**
   * Commands currently executing
   */
  get active(): number {
    return this.running;
  }

  /**
   * Schedule a command. Returns false when nothing was scheduled: the
   * command is absent or the program has terminated.
   */
  dispatch(cmd: Cmd<Msg> | null | undefined): boolean {
    if (!cmd) {
      return false;
    }
    if (this.signal.aborted) {
      logger.debug('Dropped command submitted after termination');
      return false;
    }

    this.running += 1;
    void this.execute(cmd);
    return true;
  }

  private async execute(cmd: Cmd<Msg>): Promise<void> {
    try {
      // Never run user work inline with the caller
      const result = await Promise.resolve().then(() => cmd(this.signal));

      if (result === null || result === undefined) {
        return;
      }
      if (this.signal.aborted) {
        logger.debug('Dropped command result delivered after termination');
        return;
      }
      this.sink.message(result);
    } catch (error) {
      if (this.signal.aborted) {
        logger.debug('Command failed after termination', error);
        return;
      }
      this.sink.error(new CommandError(error));
    } finally {
      this.running -= 1;
    }
  }
}
