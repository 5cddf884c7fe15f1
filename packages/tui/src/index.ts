/**
 * @loopkit/tui - Elm-architecture runtime for terminal user interfaces
 *
 * A program loop that applies transitions in sequence, runs commands
 * concurrently and redraws only when the rendered frame changes.
 */

export { Program } from './program.js';
export { Renderer, countRows, normalizeLineBreaks } from './renderer.js';
export { CommandExecutor } from './executor.js';
export { expandBatch } from './batch.js';
export { feedInput, type KeySource, type InputSink } from './input.js';
export { Mailbox, MailboxClosedError } from './mailbox.js';
export { Mutex } from './mutex.js';
export {
  NodeTerminal,
  KeyReader,
  type TerminalSession,
  type TerminalInput,
  type TerminalOutput
} from './terminal.js';
export { decodeKeys } from './keys.js';
export { classify, isQuitMsg, isBatchMsg, type Signal } from './signals.js';
export { resolveConfig, type ProgramConfig } from './config.js';
export { logger, setConsoleLoggingEnabled, type LogLevel } from './logger.js';
export * from './errors.js';
export * from './commands.js';
export * from './types.js';
