import type { CommandExecutor } from './executor.js';
import type { Cmd } from './types.js';

/**
 * Submit every command of a batch, in list order. Completion order is up to
 * the commands. Returns how many were scheduled.
 */
export function expandBatch<Msg>(cmds: readonly Cmd<Msg>[], executor: CommandExecutor<Msg>): number {
  let scheduled = 0;
  for (const cmd of cmds) {
    if (executor.dispatch(cmd)) {
      scheduled += 1;
    }
  }
  return scheduled;
}
