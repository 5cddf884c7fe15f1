/**
 * Program - The main event loop
 * Implements The Elm Architecture pattern
 */

import type {
  Init,
  Update,
  View,
  KeyMsg,
  Message,
  ProgramOptions,
  ProgramStatus
} from './types.js';
import { expandBatch } from './batch.js';
import { resolveConfig, type ProgramConfig } from './config.js';
import { ProgramStateError, getErrorMessage } from './errors.js';
import { CommandExecutor } from './executor.js';
import { feedInput } from './input.js';
import { logger } from './logger.js';
import { Mailbox } from './mailbox.js';
import { Mutex } from './mutex.js';
import { Renderer } from './renderer.js';
import { QUIT_MSG, classify } from './signals.js';
import type { TerminalSession } from './terminal.js';

const TERMINATION_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

export class Program<Model, Msg> {
  private readonly config: ProgramConfig;
  private readonly terminal: TerminalSession;
  private readonly outputLock = new Mutex();
  private readonly renderer: Renderer<Model>;
  private messages = new Mailbox<Message<Msg | KeyMsg>>();
  private errors = new Mailbox<unknown>();
  private state: ProgramStatus = 'idle';
  private altScreenActive = false;

  constructor(
    private readonly init: Init<Model, Msg>,
    private readonly update: Update<Model, Msg>,
    private readonly view: View<Model>,
    options: ProgramOptions = {}
  ) {
    this.config = resolveConfig(options);
    this.terminal = this.config.terminal;
    this.renderer = new Renderer(this.view, this.terminal, this.outputLock);
  }

  get status(): ProgramStatus {
    return this.state;
  }

  /**
   * Run the program until a quit message arrives. Rejects with the error
   * that terminated it.
   */
  async start(): Promise<void> {
    if (this.state !== 'idle') {
      throw new ProgramStateError(`cannot start a program that is ${this.state}`);
    }

    this.configureLogging();
    this.terminal.enterRawMode();
    this.state = 'running';
    logger.debug('Program started', { altScreen: this.config.altScreen });

    const controller = new AbortController();
    const removeSignalHandlers = this.setupSignalHandlers();

    try {
      await this.loop(controller.signal);
      logger.debug('Program quit');
    } catch (error) {
      logger.error(`Program terminated: ${getErrorMessage(error)}`, error);
      throw error;
    } finally {
      this.state = 'terminated';
      controller.abort();
      this.messages.close();
      this.errors.close();
      removeSignalHandlers();
      await this.cleanup();
    }
  }

  /**
   * Send a message into the program. Dropped unless the program is running.
   */
  send(msg: Message<Msg>): boolean {
    if (this.state !== 'running') {
      return false;
    }
    return this.messages.post(msg);
  }

  /**
   * Ask the program to quit
   */
  quit(): boolean {
    return this.send(QUIT_MSG);
  }

  /**
   * Switch to the alternate screen buffer
   */
  async enterAltScreen(): Promise<void> {
    await this.outputLock.runExclusive(async () => {
      await this.terminal.enterAltScreen();
      this.altScreenActive = true;
    });
  }

  /**
   * Leave the alternate screen buffer
   */
  async exitAltScreen(): Promise<void> {
    await this.outputLock.runExclusive(async () => {
      await this.terminal.exitAltScreen();
      this.altScreenActive = false;
    });
  }

  private async loop(signal: AbortSignal): Promise<void> {
    const executor = new CommandExecutor<Msg | KeyMsg>(
      {
        message: (msg) => this.messages.post(msg),
        error: (error) => this.reportError(error)
      },
      signal
    );

    if (this.config.altScreen) {
      await this.enterAltScreen();
    }

    // Initialize model and run initial command
    let [model, cmd] = this.init();
    executor.dispatch(cmd);

    // Render initial view
    await this.renderer.render(model);

    void feedInput(
      this.terminal,
      {
        message: (key) => this.messages.post(key),
        error: (error) => this.reportError(error)
      },
      signal
    );

    // Errors wake the message mailbox, so one readiness promise covers both
    for (;;) {
      if (this.errors.pending > 0) {
        throw this.errors.take();
      }

      if (this.messages.pending === 0) {
        await this.messages.ready();
        continue;
      }

      const next = classify(this.messages.take());
      switch (next.kind) {
        case 'quit':
          return;

        case 'batch':
          expandBatch(next.cmds, executor);
          break;

        case 'app':
          [model, cmd] = this.update(model, next.msg);
          executor.dispatch(cmd);
          await this.renderer.render(model);
          break;

        default: {
          const unreachable: never = next;
          throw new Error(`Unhandled signal: ${JSON.stringify(unreachable)}`);
        }
      }
    }
  }

  private reportError(error: unknown): void {
    if (this.errors.post(error)) {
      this.messages.notify();
    }
  }

  private configureLogging(): void {
    logger.setLevel(this.config.logLevel);
    if (this.config.logFile) {
      logger.init(this.config.logFile);
    }
  }

  /**
   * Request a quit on termination signals while running
   */
  private setupSignalHandlers(): () => void {
    if (!this.config.handleSignals) {
      return () => {};
    }

    const onSignal = (name: NodeJS.Signals): void => {
      logger.debug('Received signal, quitting', { signal: name });
      this.quit();
    };

    for (const name of TERMINATION_SIGNALS) {
      process.on(name, onSignal);
    }

    return () => {
      for (const name of TERMINATION_SIGNALS) {
        process.removeListener(name, onSignal);
      }
    };
  }

  /**
   * Restore the terminal
   */
  private async cleanup(): Promise<void> {
    try {
      if (this.altScreenActive) {
        await this.exitAltScreen();
      }
    } finally {
      this.terminal.restore();
    }
  }
}
