import type { TerminalSession } from './terminal.js';
import type { LogLevel } from './logger.js';

/**
 * Tag key for the runtime's own messages. Symbol-keyed so that no
 * application message shape can be mistaken for a signal.
 */
export const SIGNAL: unique symbol = Symbol('loopkit.signal');

/**
 * Quit message: terminates the program loop
 */
export interface QuitMsg {
  readonly [SIGNAL]: 'quit';
}

/**
 * Batch message: fan-out instruction carrying commands to schedule
 */
export interface BatchMsg<Msg> {
  readonly [SIGNAL]: 'batch';
  readonly cmds: readonly Cmd<Msg>[];
}

/**
 * Anything that may travel on the message stream
 */
export type Message<Msg> = Msg | QuitMsg | BatchMsg<Msg>;

export type MaybePromise<T> = T | Promise<T>;

/**
 * Command is deferred work that may produce a message.
 *
 * The signal is aborted when the program terminates; long-running commands
 * should stop early when it fires. Commands that ignore it still run to
 * completion, but their results are dropped.
 */
export type Cmd<Msg> = (signal: AbortSignal) => MaybePromise<Message<Msg> | null | undefined>;

/**
 * Model and optional follow-up command
 */
export type Step<Model, Msg> = readonly [model: Model, cmd?: Cmd<Msg> | null];

/**
 * Init function returns the initial model and optional command
 */
export type Init<Model, Msg> = () => Step<Model, Msg>;

/**
 * Update function handles messages and returns updated model + optional command
 */
export type Update<Model, Msg> = (model: Model, msg: Msg | KeyMsg) => Step<Model, Msg>;

/**
 * View function renders the current model to a string
 */
export type View<Model> = (model: Model) => string;

/**
 * Program options
 */
export interface ProgramOptions {
  /**
   * Use alternate screen buffer (full-screen mode)
   */
  altScreen?: boolean;

  /**
   * Request a quit on SIGINT/SIGTERM while running (default: true)
   */
  handleSignals?: boolean;

  /**
   * Terminal session (default: stdin/stdout)
   */
  terminal?: TerminalSession;

  /**
   * Minimum level written by the logger (default: LOG_LEVEL or 'info')
   */
  logLevel?: LogLevel;

  /**
   * JSONL log file (default: LOOPKIT_LOG_FILE, otherwise no file)
   */
  logFile?: string;
}

/**
 * Key message from keyboard input
 */
export interface KeyMsg {
  type: 'key';
  key: string;
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
  meta: boolean;
  sequence: string;
}

export type ProgramStatus = 'idle' | 'running' | 'terminated';
