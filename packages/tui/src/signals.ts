/**
 * Classification of incoming messages into the loop's closed set of cases
 */

import { SIGNAL, type BatchMsg, type Cmd, type Message, type QuitMsg } from './types.js';

export type Signal<Msg> =
  | { kind: 'quit' }
  | { kind: 'batch'; cmds: readonly Cmd<Msg>[] }
  | { kind: 'app'; msg: Msg };

export const QUIT_MSG: QuitMsg = Object.freeze({ [SIGNAL]: 'quit' as const });

export function isQuitMsg(value: unknown): value is QuitMsg {
  return typeof value === 'object' && value !== null && SIGNAL in value && value[SIGNAL] === 'quit';
}

export function isBatchMsg<Msg>(value: Message<Msg>): value is BatchMsg<Msg> {
  return typeof value === 'object' && value !== null && SIGNAL in value && value[SIGNAL] === 'batch';
}

export function classify<Msg>(message: Message<Msg>): Signal<Msg> {
  if (isQuitMsg(message)) {
    return { kind: 'quit' };
  }
  if (isBatchMsg<Msg>(message)) {
    return { kind: 'batch', cmds: message.cmds };
  }
  return { kind: 'app', msg: message };
}
